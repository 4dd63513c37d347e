export { readTable, writeTable, requireColumn, uniqueColumnNames, type Row, type Table } from './csv'
export { TableReadError, MissingColumnError } from '../core/errors'

export * from './outcome'
export * from './execution'
export * from './audit-config'
export * from './reporting'

export { collateRows, summarizeOutcomes, type CollationResult } from './collate'
export {
  CLIReporter,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
} from './reporters'

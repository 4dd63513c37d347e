import { StatusCategory } from '../classify'

export type StatusBreakdown = Record<StatusCategory, number>

// Summary of one audit run
export interface AuditSummary {
  startTime: Date
  endTime: Date
  duration: number
  checked: number
  broken: number
  column: string
  inputPath: string
  outputPath: string
  breakdown: StatusBreakdown
}

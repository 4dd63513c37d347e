import { Outcome } from './outcome'

// Anything read from the URL column; non-strings are treated as empty
export type UrlInput = string | null | undefined

// Task represents one row to probe, identified by its position in the input
export interface Task {
  readonly index: number
  readonly url: UrlInput
}

export interface TaskResult {
  task: Task
  outcome: Outcome
  duration: number
}

export interface UrlProbe {
  check(url: UrlInput, timeoutMs?: number): Promise<Outcome>
}

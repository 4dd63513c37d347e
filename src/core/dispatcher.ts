import { EventEmitter } from 'events'
import { Task, TaskResult } from './types/execution'
import { Outcome, ResultSet, errorOutcome } from './types/outcome'
import { logger } from '../logger'

export interface DispatcherEvents {
  taskStart: (task: Task) => void
  taskComplete: (result: TaskResult) => void
  taskFailed: (task: Task, error: Error) => void
  queueEmpty: () => void
  allTasksComplete: (results: ResultSet) => void
}

export interface DispatcherConfig {
  concurrency: number
}

export type TaskHandler = (task: Task) => Promise<Outcome>

interface PendingRun {
  resolve: (results: ResultSet) => void
  reject: (error: Error) => void
}

export interface DispatcherStatus {
  isRunning: boolean
  queueSize: number
  activeTasks: number
  completedTasks: number
}

/**
 * Fans tasks out over a fixed number of concurrent handlers and collects
 * each outcome under the task's index. Completion order is arbitrary.
 */
export class Dispatcher extends EventEmitter {
  private config: DispatcherConfig
  private queue: Task[] = []
  private activeTasks = new Map<number, Task>()
  private results: ResultSet = new Map()
  private isRunning = false
  private taskHandler?: TaskHandler
  private pending?: PendingRun
  // Bumped whenever a run ends early so late results from it are dropped
  private generation = 0

  constructor(config: DispatcherConfig) {
    super()
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${config.concurrency}`)
    }
    this.config = config
  }

  setTaskHandler(handler: TaskHandler): void {
    this.taskHandler = handler
  }

  addTasks(tasks: readonly Task[]): void {
    this.queue.push(...tasks)
    this.processQueue()
  }

  addTask(task: Task): void {
    this.queue.push(task)
    this.processQueue()
  }

  async run(): Promise<ResultSet> {
    if (this.isRunning) {
      throw new Error('Dispatcher is already running')
    }

    if (!this.taskHandler) {
      throw new Error('Task handler must be set before running dispatcher')
    }

    this.isRunning = true
    this.results = new Map()

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject }
      this.processQueue()
    })
  }

  /**
   * Drops queued and in-flight tasks. A run in progress rejects.
   */
  stop(): void {
    this.abort()?.reject(new Error('Dispatcher stopped before all tasks completed'))
  }

  getStatus(): DispatcherStatus {
    return {
      isRunning: this.isRunning,
      queueSize: this.queue.length,
      activeTasks: this.activeTasks.size,
      completedTasks: this.results.size,
    }
  }

  private processQueue(): void {
    const handler = this.taskHandler
    if (!this.isRunning || !handler) {
      return
    }

    // Fill free worker slots
    while (this.activeTasks.size < this.config.concurrency) {
      const task = this.queue.shift()
      if (!task) break
      this.activeTasks.set(task.index, task)

      const generation = this.generation
      this.processTask(task, handler, generation).catch((error: unknown) => {
        const runError = error instanceof Error ? error : new Error(String(error))
        logger.error(`Unexpected error dispatching row ${task.index}:`, runError)
        // Only the first failure of a run settles it
        if (generation === this.generation) {
          this.abort()?.reject(runError)
        }
      })
    }

    if (this.queue.length === 0 && this.activeTasks.size === 0) {
      this.emit('queueEmpty')
      if (this.isRunning) {
        const pending = this.pending
        this.isRunning = false
        this.pending = undefined
        pending?.resolve(this.results)
        this.emit('allTasksComplete', this.results)
      }
    }
  }

  private abort(): PendingRun | undefined {
    const pending = this.pending
    this.pending = undefined
    this.isRunning = false
    this.queue.length = 0
    this.activeTasks.clear()
    this.generation++
    return pending
  }

  private async processTask(task: Task, handler: TaskHandler, generation: number): Promise<void> {
    const startTime = Date.now()
    this.emit('taskStart', task)

    let outcome: Outcome
    try {
      outcome = await handler(task)
    } catch (error) {
      // A faulty task is recorded, never allowed to abort its siblings
      const taskError = error instanceof Error ? error : new Error(String(error))
      outcome = errorOutcome(faultKind(error))
      this.emit('taskFailed', task, taskError)
    }

    // The run this task belonged to was stopped or failed meanwhile
    if (generation !== this.generation) {
      return
    }
    this.activeTasks.delete(task.index)

    this.results.set(task.index, outcome)
    this.emit('taskComplete', { task, outcome, duration: Date.now() - startTime })

    this.processQueue()
  }
}

/**
 * Stable, readable name for an unexpected fault
 */
export function faultKind(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'Error'
  }
  return typeof error
}

export function createDispatcher(config: DispatcherConfig): Dispatcher {
  return new Dispatcher(config)
}

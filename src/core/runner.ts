import { EventEmitter } from 'events'
import { Task, TaskResult, UrlInput, UrlProbe } from './types/execution'
import { ResultSet } from './types/outcome'
import { Dispatcher, createDispatcher } from './dispatcher'
import { Probe, ProbeConfig, DEFAULT_PROBE_CONFIG } from '../probe/probe'
import { logger } from '../logger'

export interface RunnerEvents {
  runStart: (taskCount: number) => void
  taskStart: (task: Task) => void
  taskComplete: (result: TaskResult) => void
  taskFailed: (task: Task, error: Error) => void
  runComplete: (results: ResultSet) => void
  runError: (error: Error) => void
}

export interface RunnerConfig extends ProbeConfig {
  workers: number
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  ...DEFAULT_PROBE_CONFIG,
  workers: 24,
}

export interface RunnerOptions {
  /** Replaces the HTTP probe, mainly for tests */
  probe?: UrlProbe
}

/**
 * Probes a list of URLs through a bounded worker pool and returns the outcomes by row index
 */
export class Runner extends EventEmitter {
  private config: RunnerConfig
  private dispatcher: Dispatcher
  private probe: UrlProbe

  constructor(config: Partial<RunnerConfig> = {}, options: RunnerOptions = {}) {
    super()
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config }
    this.probe = options.probe ?? new Probe(this.config)

    this.dispatcher = createDispatcher({ concurrency: this.config.workers })
    this.dispatcher.setTaskHandler((task) => this.probe.check(task.url, this.config.timeoutMs))
    this.setupEventForwarding()
  }

  async run(urls: readonly UrlInput[]): Promise<ResultSet> {
    // Task indexes restart at 0 on every run, so two runs cannot share the pool
    if (this.dispatcher.getStatus().isRunning) {
      throw new Error('Runner is already running')
    }
    const tasks = createTasks(urls)

    try {
      logger.debug(`Dispatching ${tasks.length} URL(s) across ${this.config.workers} worker(s)`)
      this.emit('runStart', tasks.length)

      this.dispatcher.addTasks(tasks)
      const results = await this.dispatcher.run()

      if (results.size !== tasks.length) {
        logger.warn(`Expected ${tasks.length} result(s) but collected ${results.size}`)
      }

      this.emit('runComplete', results)
      return results
    } catch (error) {
      const runError = error instanceof Error ? error : new Error(String(error))
      logger.error('URL dispatch failed:', runError)
      this.emit('runError', runError)
      throw runError
    }
  }

  stop(): void {
    this.dispatcher.stop()
  }

  getConfig(): Readonly<RunnerConfig> {
    return this.config
  }

  private setupEventForwarding(): void {
    this.dispatcher.on('taskStart', (task: Task) => this.emit('taskStart', task))
    this.dispatcher.on('taskComplete', (result: TaskResult) => this.emit('taskComplete', result))
    this.dispatcher.on('taskFailed', (task: Task, error: Error) => {
      logger.warn(`Row ${task.index} failed unexpectedly: ${error.message}`)
      this.emit('taskFailed', task, error)
    })
  }
}

export function createTasks(urls: readonly UrlInput[]): Task[] {
  return urls.map((url, index) => Object.freeze({ index, url }))
}

export function createRunner(config?: Partial<RunnerConfig>, options?: RunnerOptions): Runner {
  return new Runner(config, options)
}

/**
 * Probe every URL with at most `workers` requests in flight.
 * The result set holds one outcome per input position.
 */
export async function dispatch(
  urls: readonly UrlInput[],
  workers: number = DEFAULT_RUNNER_CONFIG.workers,
  timeoutMs: number = DEFAULT_RUNNER_CONFIG.timeoutMs,
  options: RunnerOptions = {},
): Promise<ResultSet> {
  return createRunner({ workers, timeoutMs }, options).run(urls)
}

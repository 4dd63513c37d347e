import axios, { AxiosError } from 'axios'
import { Readable } from 'stream'
import { logger } from '../logger'
import { Outcome, EMPTY_OUTCOME, statusOutcome, errorOutcome } from '../core/types/outcome'
import type { UrlInput, UrlProbe } from '../core/types/execution'
import { HttpClient, createHttpClient } from './http-client'

export interface ProbeConfig {
  /** Per-request timeout in milliseconds */
  timeoutMs: number
  /** Attempts after the first one when the transport fails */
  retries: number
  /** Backoff unit; the nth retry waits n * backoffMs */
  backoffMs: number
  maxRedirects: number
  userAgent?: string
}

export interface ProbeOptions {
  client?: HttpClient
  sleep?: (ms: number) => Promise<void>
}

export const DEFAULT_PROBE_CONFIG: ProbeConfig = {
  timeoutMs: 10_000,
  retries: 2,
  backoffMs: 500,
  maxRedirects: 30,
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Checks whether a single URL answers.
 *
 * HEAD goes first. A 405, or any error status other than 404, is re-checked
 * with a streamed GET whose status wins. The first answer received is final,
 * whatever its status; only transport failures are retried.
 */
export class Probe implements UrlProbe {
  private config: ProbeConfig
  private client: HttpClient
  private sleep: (ms: number) => Promise<void>

  constructor(config: Partial<ProbeConfig> = {}, options: ProbeOptions = {}) {
    this.config = { ...DEFAULT_PROBE_CONFIG, ...config }
    this.client =
      options.client ??
      createHttpClient({
        maxRedirects: this.config.maxRedirects,
        userAgent: this.config.userAgent,
      })
    this.sleep = options.sleep ?? defaultSleep
  }

  async check(url: UrlInput, timeoutMs: number = this.config.timeoutMs): Promise<Outcome> {
    if (!isNonBlankString(url)) {
      return EMPTY_OUTCOME
    }

    const target = url.trim()
    const invalid = invalidUrlKind(target)
    if (invalid) {
      return errorOutcome(invalid)
    }

    for (let attempt = 0; ; attempt++) {
      try {
        return statusOutcome(await this.request(target, timeoutMs))
      } catch (error) {
        if (!isTransportError(error)) {
          throw error
        }

        const kind = transportErrorKind(error)
        if (attempt >= this.config.retries) {
          logger.debug(`Giving up on ${target} after ${attempt + 1} attempt(s): ${kind}`)
          return errorOutcome(kind)
        }

        const backoff = this.config.backoffMs * (attempt + 1)
        logger.debug(`Attempt ${attempt + 1} for ${target} failed (${kind}), retrying in ${backoff}ms`)
        await this.sleep(backoff)
      }
    }
  }

  private async request(url: string, timeoutMs: number): Promise<number> {
    const head = await this.client.head(url, { timeout: timeoutMs })
    if (!needsGetFallback(head.status)) {
      return head.status
    }

    const get = await this.client.get(url, { timeout: timeoutMs, responseType: 'stream' })
    discardBody(get.data)
    return get.status
  }
}

export function createProbe(config: Partial<ProbeConfig> = {}, options: ProbeOptions = {}): Probe {
  return new Probe(config, options)
}

export function isNonBlankString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

/**
 * HEAD is trusted for 2xx/3xx and 404. Servers that reject HEAD (405) or
 * fail it with another error status get a second chance through GET.
 */
export function needsGetFallback(status: number): boolean {
  return status === 405 || (status >= 400 && status !== 404)
}

function invalidUrlKind(url: string): string | undefined {
  if (!URL.canParse(url)) {
    return 'ERR_INVALID_URL'
  }
  const { protocol } = new URL(url)
  return protocol === 'http:' || protocol === 'https:' ? undefined : 'ERR_UNSUPPORTED_PROTOCOL'
}

export function isTransportError(error: unknown): error is AxiosError {
  return axios.isAxiosError(error)
}

export function transportErrorKind(error: AxiosError): string {
  return error.code ?? error.name
}

function discardBody(data: unknown): void {
  if (data instanceof Readable) {
    data.destroy()
  }
}

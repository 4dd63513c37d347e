import axios, { AxiosRequestConfig } from 'axios'

export interface HttpResponse {
  status: number
  data?: unknown
}

/**
 * The two verbs a probe needs. An axios instance satisfies this; tests pass fakes.
 */
export interface HttpClient {
  head(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>
  get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>
}

export interface HttpClientOptions {
  maxRedirects?: number
  userAgent?: string
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const client = axios.create({
    maxRedirects: options.maxRedirects ?? 30,
    headers: options.userAgent ? { 'User-Agent': options.userAgent } : undefined,
    // Every status is an answer; only transport failures throw
    validateStatus: () => true,
    transitional: { clarifyTimeoutError: true },
  })

  return {
    head: (url, config) => client.head(url, config),
    get: (url, config) => client.get(url, config),
  }
}

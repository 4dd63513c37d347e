export {
  Probe,
  createProbe,
  DEFAULT_PROBE_CONFIG,
  isNonBlankString,
  needsGetFallback,
  type ProbeConfig,
  type ProbeOptions,
} from './probe'
export { createHttpClient, type HttpClient, type HttpClientOptions, type HttpResponse } from './http-client'

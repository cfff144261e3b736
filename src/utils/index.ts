/**
 * Central export point for utility modules
 */

export { KeyedMutex, Semaphore, TimeoutError, withTimeout } from './concurrency';
export { CookieJar } from './cookie-jar';
export {
  AuthenticationError,
  BaseError,
  ClassificationUnavailableError,
  ConfigurationError,
  ConnectionError,
  ExportError,
  isServiceFatal,
  ProxyAuthenticationError,
  SessionCorruptionError,
  SessionExpiredError,
  TokenizerUnavailableError,
  toError
} from './errors';
export { HttpClient, type HttpClientOptions, HttpRequestError, type HttpResponse, isNetworkError } from './http';
export {
  createCapturingLogger,
  getLogger,
  type LogContext,
  type LogEntry,
  Logger,
  LogLevel
} from './logger';
export {
  type ApiMetrics,
  type EntityOutcome,
  type ExecutionMetrics,
  getMetricsCollector,
  MetricsCollector
} from './metrics';
export { BackoffPolicies, type BackoffPolicy, delayFor, delaySchedule, type RetryConfig, retry, sleep } from './retry';

/**
 * parcel-ledger - order lifecycle ledger and tracking content normalisation
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './types';
export * from './lifecycle';
export * from './content';
export * from './classifier';
export * from './couriers';
export * from './shopify';
export * from './ledger';
export * from './sync';
export {
  loadConfig,
  parseConfig,
  checkSyncReadiness,
  resolveConfigPath,
  resolveStateDir,
  ConfigError,
  type Config,
} from './utils/config';
export {
  withRetry,
  withTimeout,
  getRetryPolicy,
  RetryableError,
  RateLimitError,
  TransientError,
  NonRetryableError,
  AbortedError,
  type RetryOptions,
} from './infra/retry';
export { installHttpClient, configureHttpClient, type HttpClientConfig } from './utils/http';
export { createLogger, type Logger } from './utils/logger';

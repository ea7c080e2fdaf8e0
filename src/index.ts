export * from './services/taxonomy';
export { loadResolutionConfig, validateResolutionConfig } from './config/resolution';
export type { ResolutionConfig } from './config/resolution';
export { DEFAULT_RETRY_POLICY, RetryExhaustedError, PermanentRequestError, withRetry } from './utils/retry';
export type { RetryPolicy, RetryHooks } from './utils/retry';
export { createApp, startServer } from './server';

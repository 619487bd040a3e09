// =============================================================================
// Retry Module Exports
// =============================================================================

export {
  DEFAULT_RETRY_INTERVAL,
  DEFAULT_RETRY_JITTER,
  DEFAULT_MAX_INTERVAL,
  DEFAULT_MULTIPLIER,
  RetryStrategy,
  type LinearBackoffConfig,
  LinearBackoff,
  type ExponentialBackoffConfig,
  ExponentialBackoff,
} from "./strategy";

/**
 * Utility exports
 */

// Formatting utilities
export { formatAge, formatDuration, formatGiB } from "./format";
export type { LogLevel, ScopedLogger } from "./logger";
// Logger
export { debug, error, getLogLevel, info, logger, scoped, setLogLevel, warn } from "./logger";
// Concurrency
export { filterPooled, mapPooled, type PoolOptions } from "./pool";
export {
  backoffDelay,
  DELETE_BACKOFF,
  FILTER_BACKOFF,
  type RetryInfo,
  type RetryPolicy,
  withRetry,
} from "./retry";
// Time
export { addDays, DAY_MS, sleep } from "./time";

/**
 * Cleanup module exports
 */

export { RemovalLog, toRemovalRecord, VolumeDeleter, type VolumeDeleterOptions } from "./deleter";
export {
  type CleanupDeps,
  type CleanupOptions,
  type CleanupResult,
  type CleanupTotals,
  runCleanup,
  summarize,
} from "./orchestrator";
export {
  type CandidateVolume,
  type ConfirmFn,
  confirmMessage,
  rateLimitPolicy,
  RegionCleaner,
  type RegionCleanerOptions,
  type RegionStatus,
  type RegionSummary,
} from "./region-cleaner";
export { resolveAccounts, resolveRegions } from "./targets";

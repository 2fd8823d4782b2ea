/**
 * Core module exports
 */

// Cleanup
export {
  type CandidateVolume,
  type CleanupDeps,
  type CleanupOptions,
  type CleanupResult,
  type CleanupTotals,
  type ConfirmFn,
  type RegionStatus,
  type RegionSummary,
  RegionCleaner,
  RemovalLog,
  resolveAccounts,
  resolveRegions,
  runCleanup,
  summarize,
  VolumeDeleter,
} from "./cleanup";

// Filter
export {
  describeVerdict,
  evaluateMetrics,
  evaluateVolume,
  isCandidate,
  matchesTagRules,
  parseTagRule,
  parseTagRules,
} from "./filter";

// Report
export { serializeReport, writeReport } from "./report";

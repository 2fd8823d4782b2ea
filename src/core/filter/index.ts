/**
 * Eligibility filter exports
 */

export {
  DEFAULT_IDLE_THRESHOLD_SECONDS,
  describeVerdict,
  type EligibilityOptions,
  evaluateMetrics,
  evaluateVolume,
  isCandidate,
  type MetricsLookup,
  type MetricsRuleOptions,
} from "./eligibility";
export {
  findTagMismatch,
  matchesTagRules,
  parseTagRule,
  parseTagRules,
  type TagMismatch,
} from "./tag-rules";

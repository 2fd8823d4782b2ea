/**
 * Centralized type exports for ebs-janitor
 */

// Config types
export type {
  BackoffConfig,
  CredentialsConfig,
  FilterConfig,
  JanitorConfig,
  RetryConfig,
} from "./config";
// Provider types
export type { ICloudProvider } from "./provider";
// Volume types
export type {
  AwsAccount,
  EligibilityReason,
  EligibilityVerdict,
  MetricDatapoint,
  MetricWindow,
  RemovalRecord,
  RemovalReport,
  TagRule,
  Volume,
} from "./volume";

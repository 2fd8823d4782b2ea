/**
 * AWS module exports
 */

export { getCallerAccountId, listOrganizationAccountIds, listRegionNames } from "./accounts";
export {
  errorCode,
  formatAwsError,
  isAccessDenied,
  isOrgAccessDenied,
  isRateLimitError,
  isUnauthorizedOperation,
  RATE_LIMIT_CODES,
} from "./errors";
export { deleteVolume, listAvailableVolumes, toVolume } from "./inventory";
export {
  getIdleTimeMetrics,
  IDLE_TIME_METRIC,
  MAX_DATAPOINTS_PER_REQUEST,
  metricWindow,
  splitWindow,
} from "./metrics";
export { AwsProvider, createAwsProvider } from "./provider";
export {
  type AwsClientConfig,
  type AwsCredentials,
  GLOBAL_REGION,
  roleArn,
  SessionProvider,
} from "./session";

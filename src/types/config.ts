/**
 * Configuration type definitions for ebs-janitor
 */

export interface CredentialsConfig {
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Exponential backoff parameters. The wait after the n-th failed attempt is
 * min(multiplierMs * 2^(n-1), capMs).
 */
export interface BackoffConfig {
  maxAttempts: number;
  multiplierMs: number;
  capMs: number;
}

export interface RetryConfig {
  /** Read-only calls made while filtering (inventory, metrics) */
  filter: BackoffConfig;
  /** Volume deletion calls */
  delete: BackoffConfig;
}

export interface FilterConfig {
  /** Days after which a volume without metrics is considered orphaned; also the metrics lookback */
  ageDays: number;
  /** Tag rules in "key:regex" form, all of which must match */
  tags: string[];
  /** Skip the idle-time lookup and treat every tag-matched volume as a candidate */
  ignoreMetrics: boolean;
  /** Minimum idle seconds per hourly datapoint for a volume to count as idle */
  idleThresholdSeconds: number;
}

export interface JanitorConfig {
  credentials: CredentialsConfig;
  /** IAM role name assumed in every target account */
  role?: string;
  accounts: string[];
  /** Scan every account in the organization (requires role) */
  scrapeOrg: boolean;
  /** Empty means every region the account can see */
  regions: string[];
  poolSize: number;
  /** Skip the confirmation prompt */
  assumeYes: boolean;
  filter: FilterConfig;
  retry: RetryConfig;
  /** Path of the JSON removal report */
  report?: string;
}

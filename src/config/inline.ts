/**
 * Inline configuration parsing and merging utilities
 */

import type { JanitorConfig } from "../types";
import { deepMerge } from "./defaults";
import { ConfigError } from "./errors";
import { validateConfig } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  // Credentials
  accessKeyId?: string;
  secretAccessKey?: string;
  /** IAM role name assumed in each target account */
  role?: string;

  // Targets
  /** Account IDs to scan (can be repeated) */
  account?: string[];
  /** Scan every account of the organization */
  scrapeOrg?: boolean;
  /** Regions to scan (can be repeated) */
  region?: string[];

  // Execution
  /** Skip the confirmation prompt */
  yes?: boolean;
  /** Parallel API calls per phase */
  poolSize?: number;

  // Filtering
  /** Age threshold in days */
  age?: number;
  /** Tag filter rules "key:regex" (can be repeated) */
  tag?: string[];
  /** Skip the idle-time metric lookup */
  ignoreMetrics?: boolean;
  /** Idle seconds per hourly datapoint */
  idleThreshold?: number;

  // Output
  /** Removal report path */
  report?: string;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  // Credentials
  "access-key-id": { type: "string" as const, short: "k" },
  "secret-access-key": { type: "string" as const, short: "s" },
  role: { type: "string" as const },

  // Targets
  account: { type: "string" as const, multiple: true },
  "scrape-org": { type: "boolean" as const },
  region: { type: "string" as const, short: "r", multiple: true },

  // Execution
  yes: { type: "boolean" as const, short: "y" },
  "pool-size": { type: "string" as const, short: "p" },

  // Filtering
  age: { type: "string" as const, short: "a" },
  tag: { type: "string" as const, short: "t", multiple: true },
  "ignore-metrics": { type: "boolean" as const, short: "i" },
  "idle-threshold": { type: "string" as const },

  // Output
  report: { type: "string" as const, short: "o" },
} as const;

/**
 * Parsed values of INLINE_CONFIG_OPTIONS
 */
export interface InlineFlagValues {
  "access-key-id"?: string;
  "secret-access-key"?: string;
  role?: string;
  account?: string[];
  "scrape-org"?: boolean;
  region?: string[];
  yes?: boolean;
  "pool-size"?: string;
  age?: string;
  tag?: string[];
  "ignore-metrics"?: boolean;
  "idle-threshold"?: string;
  report?: string;
}

function parsePositiveIntFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseNonNegativeFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`--${flag} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineFlagValues): InlineConfigOptions {
  return {
    accessKeyId: values["access-key-id"],
    secretAccessKey: values["secret-access-key"],
    role: values.role,
    account: values.account,
    scrapeOrg: values["scrape-org"],
    region: values.region,
    yes: values.yes,
    poolSize: parsePositiveIntFlag("pool-size", values["pool-size"]),
    age: parsePositiveIntFlag("age", values.age),
    tag: values.tag,
    ignoreMetrics: values["ignore-metrics"],
    idleThreshold: parseNonNegativeFlag("idle-threshold", values["idle-threshold"]),
    report: values.report,
  };
}

/**
 * Build a partial config record from inline options. Options that were not
 * given are left out so they don't override the config file.
 */
export function buildInlineConfig(options: InlineConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (options.accessKeyId || options.secretAccessKey) {
    const credentials: Record<string, string> = {};
    if (options.accessKeyId) credentials.accessKeyId = options.accessKeyId;
    if (options.secretAccessKey) credentials.secretAccessKey = options.secretAccessKey;
    config.credentials = credentials;
  }
  if (options.role) config.role = options.role;

  if (options.account && options.account.length > 0) config.accounts = options.account;
  if (options.scrapeOrg) config.scrapeOrg = true;
  if (options.region && options.region.length > 0) config.regions = options.region;

  if (options.yes) config.assumeYes = true;
  if (options.poolSize !== undefined) config.poolSize = options.poolSize;

  const filter: Record<string, unknown> = {
    ...(options.age !== undefined && { ageDays: options.age }),
    ...(options.tag && options.tag.length > 0 && { tags: options.tag }),
    ...(options.ignoreMetrics && { ignoreMetrics: true }),
    ...(options.idleThreshold !== undefined && { idleThresholdSeconds: options.idleThreshold }),
  };
  if (Object.keys(filter).length > 0) config.filter = filter;

  if (options.report) config.report = options.report;

  return config;
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: JanitorConfig,
  inlineOptions: InlineConfigOptions,
): JanitorConfig {
  const merged = deepMerge({ ...baseConfig }, buildInlineConfig(inlineOptions));
  validateConfig(merged);
  return merged;
}

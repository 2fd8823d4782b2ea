/**
 * Default configuration values
 */

import { DEFAULT_IDLE_THRESHOLD_SECONDS } from "../core/filter/eligibility";
import type { JanitorConfig } from "../types";
import { DELETE_BACKOFF, FILTER_BACKOFF } from "../utils/retry";

export const DEFAULT_POOL_SIZE = 10;
export const DEFAULT_AGE_DAYS = 14;

export const DEFAULT_CONFIG: Readonly<JanitorConfig> = {
  credentials: {},
  accounts: [],
  scrapeOrg: false,
  regions: [],
  poolSize: DEFAULT_POOL_SIZE,
  assumeYes: false,
  filter: {
    ageDays: DEFAULT_AGE_DAYS,
    tags: [],
    ignoreMetrics: false,
    idleThresholdSeconds: DEFAULT_IDLE_THRESHOLD_SECONDS,
  },
  retry: {
    filter: { ...FILTER_BACKOFF },
    delete: { ...DELETE_BACKOFF },
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced,
 * not concatenated; undefined source values are ignored.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Fresh, mutable copy of the defaults as a plain record
 */
export function defaultConfigRecord(): Record<string, unknown> {
  return { ...structuredClone(DEFAULT_CONFIG) };
}

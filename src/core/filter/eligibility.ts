/**
 * Volume eligibility rules
 *
 * A volume is a deletion candidate when it matches every tag rule and either
 * metrics are ignored, or its idle-time series shows it idle for the whole
 * lookback window. A volume with no published metrics yet falls back to its
 * age.
 */

import type {
  EligibilityVerdict,
  MetricDatapoint,
  TagRule,
  Volume,
} from "../../types";
import { logger, type ScopedLogger } from "../../utils/logger";
import { addDays } from "../../utils/time";
import { findTagMismatch } from "./tag-rules";

/** Idle seconds per hourly datapoint: idle for (nearly) the full period */
export const DEFAULT_IDLE_THRESHOLD_SECONDS = 299;

export interface MetricsRuleOptions {
  ageThresholdDays: number;
  idleThresholdSeconds?: number;
  now?: Date;
}

export interface EligibilityOptions extends MetricsRuleOptions {
  tagRules: readonly TagRule[];
  ignoreMetrics: boolean;
  logger?: ScopedLogger;
}

export type MetricsLookup = (volume: Volume) => Promise<MetricDatapoint[]>;

/**
 * Decide from an already fetched idle-time series
 */
export function evaluateMetrics(
  volume: Volume,
  datapoints: readonly MetricDatapoint[],
  options: MetricsRuleOptions,
): EligibilityVerdict {
  if (datapoints.length === 0) {
    const now = options.now ?? new Date();
    const expiry = addDays(volume.createTime, options.ageThresholdDays);
    return now.getTime() >= expiry.getTime()
      ? { candidate: true, reason: "no_metrics_expired" }
      : { candidate: false, reason: "no_metrics_recent" };
  }

  const threshold = options.idleThresholdSeconds ?? DEFAULT_IDLE_THRESHOLD_SECONDS;
  const idle = datapoints.every((point) => point.minimum >= threshold);
  return idle ? { candidate: true, reason: "idle" } : { candidate: false, reason: "active" };
}

export async function evaluateVolume(
  volume: Volume,
  options: EligibilityOptions,
  lookupMetrics: MetricsLookup,
): Promise<EligibilityVerdict> {
  const log = options.logger ?? logger;
  const mismatch = findTagMismatch(volume, options.tagRules);
  if (mismatch) {
    if (mismatch.value === undefined) {
      log.debug(`Volume ${volume.volumeId} has no tag ${mismatch.rule.key}`);
    } else {
      log.debug(
        `Volume ${volume.volumeId} with tag ${mismatch.rule.key}=${mismatch.value} doesn't match regex ${mismatch.rule.pattern}`,
      );
    }
    return { candidate: false, reason: "tag_mismatch" };
  }

  if (options.ignoreMetrics) {
    return { candidate: true, reason: "metrics_ignored" };
  }

  const datapoints = await lookupMetrics(volume);
  return evaluateMetrics(volume, datapoints, options);
}

export async function isCandidate(
  volume: Volume,
  options: EligibilityOptions,
  lookupMetrics: MetricsLookup,
): Promise<boolean> {
  const verdict = await evaluateVolume(volume, options, lookupMetrics);
  return verdict.candidate;
}

export function describeVerdict(verdict: EligibilityVerdict, ageThresholdDays: number): string {
  switch (verdict.reason) {
    case "tag_mismatch":
      return "tags don't match";
    case "metrics_ignored":
      return "metrics ignored";
    case "no_metrics_expired":
      return `no metrics yet, older than ${ageThresholdDays} days`;
    case "no_metrics_recent":
      return `no metrics yet, younger than ${ageThresholdDays} days`;
    case "active":
      return "recently active";
    case "idle":
      return `idle for ${ageThresholdDays} days`;
  }
}

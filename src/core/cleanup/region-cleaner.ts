/**
 * Filter, confirm and delete within one account and region
 */

import { isRateLimitError } from "../../aws/errors";
import { metricWindow } from "../../aws/metrics";
import type {
  AwsAccount,
  BackoffConfig,
  EligibilityVerdict,
  ICloudProvider,
  JanitorConfig,
  RemovalRecord,
  TagRule,
  Volume,
} from "../../types";
import { formatDuration } from "../../utils/format";
import { logger, type ScopedLogger } from "../../utils/logger";
import { filterPooled, mapPooled } from "../../utils/pool";
import { type RetryPolicy, withRetry } from "../../utils/retry";
import {
  describeVerdict,
  type EligibilityOptions,
  evaluateVolume,
  type MetricsLookup,
} from "../filter/eligibility";
import { VolumeDeleter } from "./deleter";

export type ConfirmFn = (message: string) => Promise<boolean>;

export type RegionStatus =
  | "removed"
  | "nothing_to_do"
  | "declined"
  | "dry_run"
  | "unauthorized"
  | "account_denied";

export interface CandidateVolume {
  volume: Volume;
  verdict: EligibilityVerdict;
}

export interface RegionSummary {
  accountId: string;
  region: string;
  status: RegionStatus;
  scanned: number;
  candidates: CandidateVolume[];
  removed: RemovalRecord[];
}

export interface RegionCleanerOptions {
  provider: ICloudProvider;
  account: AwsAccount;
  region: string;
  config: JanitorConfig;
  tagRules: readonly TagRule[];
  confirm: ConfirmFn;
  /** Stop after filtering */
  dryRun?: boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export function confirmMessage(count: number, accountId: string, region: string): string {
  return `Do you want to remove ${count} Volumes in Account ${accountId} Region ${region}?`;
}

/**
 * Retry policy for AWS calls that only retries rate limiting
 */
export function rateLimitPolicy(
  backoff: BackoffConfig,
  label: string,
  log: ScopedLogger,
  sleep?: (ms: number) => Promise<void>,
): RetryPolicy {
  return {
    ...backoff,
    shouldRetry: isRateLimitError,
    label,
    sleep,
    onRetry: ({ attempt, maxAttempts, delayMs }) =>
      log.debug(
        `AWS API request limit exceeded while ${label}, retrying in ${formatDuration(delayMs)} (attempt ${attempt}/${maxAttempts})`,
      ),
  };
}

export class RegionCleaner {
  readonly deleter: VolumeDeleter;
  private readonly log: ScopedLogger;

  constructor(private readonly options: RegionCleanerOptions) {
    this.log = logger.scoped(`in Account ${options.account.accountId} Region ${options.region}`);
    this.deleter = new VolumeDeleter({
      provider: options.provider,
      account: options.account,
      region: options.region,
      policy: rateLimitPolicy(
        options.config.retry.delete,
        "removing volume",
        this.log,
        options.sleep,
      ),
      logger: this.log,
      now: options.now,
    });
  }

  async run(): Promise<RegionSummary> {
    const { account, region, config } = this.options;
    const { scanned, candidates } = await this.findCandidates();
    const summary = {
      accountId: account.accountId,
      region,
      scanned,
      candidates,
    };

    if (candidates.length === 0) {
      this.log.info("Not doing anything");
      return { ...summary, status: "nothing_to_do", removed: [] };
    }

    if (this.options.dryRun) {
      return { ...summary, status: "dry_run", removed: [] };
    }

    const confirmed =
      config.assumeYes ||
      (await this.options.confirm(confirmMessage(candidates.length, account.accountId, region)));
    if (!confirmed) {
      this.log.info("Not doing anything");
      return { ...summary, status: "declined", removed: [] };
    }

    await this.removeCandidates(candidates.map((candidate) => candidate.volume));
    return { ...summary, status: "removed", removed: this.deleter.removalLog.records() };
  }

  /**
   * Phase 1: list unattached volumes and keep the eligible ones
   */
  async findCandidates(): Promise<{ scanned: number; candidates: CandidateVolume[] }> {
    const { provider, account, region, config, tagRules } = this.options;
    const now = this.options.now?.() ?? new Date();

    this.log.info("Finding unused Volumes");
    const volumes = await withRetry(
      () => provider.listAvailableVolumes(account, region),
      rateLimitPolicy(config.retry.filter, "listing volumes", this.log, this.options.sleep),
    );
    this.log.debug(`Found ${volumes.length} unattached Volumes`);

    const window = metricWindow(now, config.filter.ageDays);
    const lookup: MetricsLookup = (volume) => {
      this.log.debug(`Retrieving Metrics for Volume ${volume.volumeId}`);
      return withRetry(
        () => provider.getIdleTimeMetrics(account, region, volume.volumeId, window),
        rateLimitPolicy(config.retry.filter, "retrieving metrics", this.log, this.options.sleep),
      );
    };
    const eligibility: EligibilityOptions = {
      tagRules,
      ignoreMetrics: config.filter.ignoreMetrics,
      ageThresholdDays: config.filter.ageDays,
      idleThresholdSeconds: config.filter.idleThresholdSeconds,
      now,
      logger: this.log,
    };

    const candidates = await filterPooled(
      volumes,
      config.poolSize,
      async (volume): Promise<CandidateVolume | null> => {
        const verdict = await evaluateVolume(volume, eligibility, lookup);
        const reason = describeVerdict(verdict, config.filter.ageDays);
        if (!verdict.candidate) {
          this.log.debug(`Volume ${volume.volumeId} is not a candidate (${reason})`);
          return null;
        }
        this.log.debug(`Volume ${volume.volumeId} is a candidate (${reason})`);
        return { volume, verdict };
      },
      {
        onError: (error, index) =>
          this.log.error(`Failed to evaluate Volume ${volumes[index]?.volumeId ?? "?"}`, error),
      },
    );

    this.log.info(`Found ${candidates.length} of ${volumes.length} Volumes eligible for removal`);
    return { scanned: volumes.length, candidates };
  }

  /**
   * Phase 2: delete the confirmed candidates
   */
  async removeCandidates(volumes: readonly Volume[]): Promise<RemovalRecord[]> {
    this.log.info(`Removing ${volumes.length} Volumes`);
    await mapPooled(volumes, this.options.config.poolSize, (volume) => this.deleter.remove(volume), {
      onError: (error, index) =>
        this.log.error(`Failed to remove Volume ${volumes[index]?.volumeId ?? "?"}`, error),
    });
    return this.deleter.removalLog.records();
  }
}

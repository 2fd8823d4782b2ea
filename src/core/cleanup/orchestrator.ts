/**
 * Cleanup orchestration
 *
 * Accounts and regions are processed one at a time; parallelism lives inside
 * a region's filter and delete phases only.
 */

import { formatAwsError, isAccessDenied, isUnauthorizedOperation } from "../../aws/errors";
import type {
  AwsAccount,
  ICloudProvider,
  JanitorConfig,
  RemovalRecord,
  RemovalReport,
} from "../../types";
import { logger } from "../../utils/logger";
import { parseTagRules } from "../filter/tag-rules";
import { writeReport as defaultWriteReport } from "../report";
import { type ConfirmFn, RegionCleaner, type RegionSummary } from "./region-cleaner";
import { resolveAccounts, resolveRegions } from "./targets";

export interface CleanupDeps {
  provider: ICloudProvider;
  confirm: ConfirmFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  writeReport?: (path: string, report: RemovalReport) => Promise<void>;
}

export interface CleanupOptions {
  /** Filter only: no confirmation, no deletion, no report */
  dryRun?: boolean;
}

export interface CleanupTotals {
  accounts: number;
  regions: number;
  scanned: number;
  candidates: number;
  removed: number;
  removedGiB: number;
}

export interface CleanupResult {
  report: RemovalReport;
  regions: RegionSummary[];
  /** Accounts whose remaining regions were skipped after access was denied */
  skippedAccounts: string[];
  totals: CleanupTotals;
}

export function summarize(
  accounts: readonly AwsAccount[],
  regions: readonly RegionSummary[],
): CleanupTotals {
  return regions.reduce<CleanupTotals>(
    (totals, region) => ({
      ...totals,
      scanned: totals.scanned + region.scanned,
      candidates: totals.candidates + region.candidates.length,
      removed: totals.removed + region.removed.length,
      removedGiB: totals.removedGiB + region.removed.reduce((sum, record) => sum + record.size, 0),
    }),
    {
      accounts: accounts.length,
      regions: regions.length,
      scanned: 0,
      candidates: 0,
      removed: 0,
      removedGiB: 0,
    },
  );
}

function skippedRegion(
  account: AwsAccount,
  region: string,
  status: "unauthorized" | "account_denied",
  cleaner?: RegionCleaner,
): RegionSummary {
  return {
    accountId: account.accountId,
    region,
    status,
    scanned: 0,
    candidates: [],
    removed: cleaner?.deleter.removalLog.records() ?? [],
  };
}

export async function runCleanup(
  config: JanitorConfig,
  deps: CleanupDeps,
  options: CleanupOptions = {},
): Promise<CleanupResult> {
  const tagRules = parseTagRules(config.filter.tags);
  const dryRun = options.dryRun ?? false;
  const writeReport = deps.writeReport ?? defaultWriteReport;

  const report: RemovalReport = {};
  const regions: RegionSummary[] = [];
  const skippedAccounts: string[] = [];
  let accounts: AwsAccount[] = [];

  const persistReport = async (): Promise<void> => {
    if (!config.report || dryRun) return;
    await writeReport(config.report, report);
    logger.info(`Removal report written to ${config.report}`);
  };

  try {
    accounts = await resolveAccounts(config, deps.provider);
    const regionNames = await resolveRegions(config, deps.provider);

    for (const account of accounts) {
      const accountReport: Record<string, RemovalRecord[]> = {};
      report[account.accountId] = accountReport;

      for (const [index, region] of regionNames.entries()) {
        const cleaner = new RegionCleaner({
          provider: deps.provider,
          account,
          region,
          config,
          tagRules,
          confirm: deps.confirm,
          dryRun,
          sleep: deps.sleep,
          now: deps.now,
        });

        try {
          const summary = await cleaner.run();
          regions.push(summary);
          accountReport[region] = summary.removed;
        } catch (error) {
          const partial = cleaner.deleter.removalLog;
          if (partial.size > 0) {
            accountReport[region] = partial.records();
          }

          if (isUnauthorizedOperation(error)) {
            logger.warn(
              `Not authorized to collect resources in Account ${account.accountId} Region ${region}`,
            );
            regions.push(skippedRegion(account, region, "unauthorized", cleaner));
            continue;
          }

          if (isAccessDenied(error)) {
            logger.error(
              `Access denied in Account ${account.accountId}, skipping its remaining regions`,
              formatAwsError(error),
            );
            regions.push(skippedRegion(account, region, "account_denied", cleaner));
            for (const rest of regionNames.slice(index + 1)) {
              regions.push(skippedRegion(account, rest, "account_denied"));
            }
            skippedAccounts.push(account.accountId);
            break;
          }

          throw error;
        }
      }
    }
  } catch (error) {
    if (Object.keys(report).length === 0) throw error;
    try {
      await persistReport();
    } catch (writeError) {
      logger.error("Failed to write partial removal report", writeError);
    }
    throw error;
  }

  await persistReport();

  return {
    report,
    regions,
    skippedAccounts,
    totals: summarize(accounts, regions),
  };
}

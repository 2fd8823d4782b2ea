/**
 * Volume deletion with audit records
 */

import type { AwsAccount, ICloudProvider, RemovalRecord, Volume } from "../../types";
import { logger, type ScopedLogger } from "../../utils/logger";
import { type RetryPolicy, withRetry } from "../../utils/retry";

export function toRemovalRecord(volume: Volume, removedAt: Date): RemovalRecord {
  return {
    volume_id: volume.volumeId,
    volume_type: volume.volumeType,
    size: volume.size,
    create_time: volume.createTime.toISOString(),
    removal_time: removedAt.toISOString(),
  };
}

/**
 * Append-only list of removal records. Order follows completion, not input.
 */
export class RemovalLog {
  private readonly entries: RemovalRecord[] = [];

  append(record: RemovalRecord): void {
    this.entries.push(record);
  }

  records(): RemovalRecord[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

export interface VolumeDeleterOptions {
  provider: ICloudProvider;
  account: AwsAccount;
  region: string;
  policy: RetryPolicy;
  removalLog?: RemovalLog;
  logger?: ScopedLogger;
  now?: () => Date;
}

export class VolumeDeleter {
  readonly removalLog: RemovalLog;
  private readonly attempted = new Set<string>();
  private readonly log: ScopedLogger;

  constructor(private readonly options: VolumeDeleterOptions) {
    this.removalLog = options.removalLog ?? new RemovalLog();
    this.log = options.logger ?? logger;
  }

  /**
   * Delete a volume and record it. Returns null when the volume was already
   * attempted in this run.
   */
  async remove(volume: Volume): Promise<RemovalRecord | null> {
    if (this.attempted.has(volume.volumeId)) {
      this.log.debug(`Volume ${volume.volumeId} was already attempted, skipping`);
      return null;
    }
    this.attempted.add(volume.volumeId);

    const { provider, account, region, policy } = this.options;
    this.log.debug(`Removing Volume ${volume.volumeId}`);
    await withRetry(() => provider.deleteVolume(account, region, volume.volumeId), policy);

    const record = toRemovalRecord(volume, this.options.now?.() ?? new Date());
    this.removalLog.append(record);
    this.log.info(`Removed Volume ${volume.volumeId} (${volume.size} GiB ${volume.volumeType})`);
    return record;
  }
}

/**
 * Volume and audit record type definitions
 */

export interface AwsAccount {
  accountId: string;
  /** Role name to assume in the account; absent means the base credentials are used */
  role?: string;
}

export interface Volume {
  volumeId: string;
  /** Size in GiB */
  size: number;
  volumeType: string;
  createTime: Date;
  tags: Record<string, string>;
  state: string;
}

export interface TagRule {
  key: string;
  pattern: string;
  regex: RegExp;
}

export interface MetricDatapoint {
  timestamp: Date;
  /** Minimum idle seconds observed in the sampling period */
  minimum: number;
}

export interface MetricWindow {
  start: Date;
  end: Date;
}

export interface RemovalRecord {
  volume_id: string;
  volume_type: string;
  size: number;
  create_time: string;
  removal_time: string;
}

/** account id -> region -> removal records */
export type RemovalReport = Record<string, Record<string, RemovalRecord[]>>;

export type EligibilityReason =
  | "tag_mismatch"
  | "metrics_ignored"
  | "no_metrics_expired"
  | "no_metrics_recent"
  | "active"
  | "idle";

export interface EligibilityVerdict {
  candidate: boolean;
  reason: EligibilityReason;
}

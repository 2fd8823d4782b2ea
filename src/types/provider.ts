/**
 * Cloud provider interface
 */

import type { AwsAccount, MetricDatapoint, MetricWindow, Volume } from "./volume";

export interface ICloudProvider {
  /** Account id of the base credentials */
  currentAccountId(): Promise<string>;
  /** Every account id in the organization, or an empty list when listing is not permitted */
  listOrganizationAccounts(): Promise<string[]>;
  listRegions(): Promise<string[]>;
  /** Volumes in the "available" (unattached) state */
  listAvailableVolumes(account: AwsAccount, region: string): Promise<Volume[]>;
  getIdleTimeMetrics(
    account: AwsAccount,
    region: string,
    volumeId: string,
    window: MetricWindow,
  ): Promise<MetricDatapoint[]>;
  deleteVolume(account: AwsAccount, region: string, volumeId: string): Promise<void>;
}

/**
 * AWS implementation of the cloud provider
 */

import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { EC2Client } from "@aws-sdk/client-ec2";
import { OrganizationsClient } from "@aws-sdk/client-organizations";
import { STSClient } from "@aws-sdk/client-sts";
import type { AwsAccount, ICloudProvider, MetricDatapoint, MetricWindow, Volume } from "../types";
import { getCallerAccountId, listOrganizationAccountIds, listRegionNames } from "./accounts";
import { deleteVolume, listAvailableVolumes } from "./inventory";
import { getIdleTimeMetrics } from "./metrics";
import { GLOBAL_REGION, type AwsClientConfig, SessionProvider } from "./session";

interface DestroyableClient {
  destroy(): void;
}

/**
 * Build a client, run `fn` with it, and release its connections
 */
async function withClient<C extends DestroyableClient, T>(
  create: () => C,
  fn: (client: C) => Promise<T>,
): Promise<T> {
  const client = create();
  try {
    return await fn(client);
  } finally {
    client.destroy();
  }
}

/**
 * Every call builds its own client, so concurrent workers never share one.
 */
export class AwsProvider implements ICloudProvider {
  constructor(private readonly sessions: SessionProvider) {}

  async currentAccountId(): Promise<string> {
    const config = await this.config(undefined, GLOBAL_REGION);
    return withClient(() => new STSClient(config), getCallerAccountId);
  }

  async listOrganizationAccounts(): Promise<string[]> {
    const config = await this.config(undefined, GLOBAL_REGION);
    return withClient(() => new OrganizationsClient(config), listOrganizationAccountIds);
  }

  async listRegions(): Promise<string[]> {
    const config = await this.config(undefined, GLOBAL_REGION);
    return withClient(() => new EC2Client(config), listRegionNames);
  }

  async listAvailableVolumes(account: AwsAccount, region: string): Promise<Volume[]> {
    const config = await this.config(account, region);
    return withClient(() => new EC2Client(config), listAvailableVolumes);
  }

  async getIdleTimeMetrics(
    account: AwsAccount,
    region: string,
    volumeId: string,
    window: MetricWindow,
  ): Promise<MetricDatapoint[]> {
    const config = await this.config(account, region);
    return withClient(
      () => new CloudWatchClient(config),
      (client) => getIdleTimeMetrics(client, volumeId, window),
    );
  }

  async deleteVolume(account: AwsAccount, region: string, volumeId: string): Promise<void> {
    const config = await this.config(account, region);
    await withClient(
      () => new EC2Client(config),
      (client) => deleteVolume(client, volumeId),
    );
  }

  private config(account: AwsAccount | undefined, region: string): Promise<AwsClientConfig> {
    return this.sessions.clientConfig(account, region);
  }
}

export function createAwsProvider(sessions: SessionProvider): AwsProvider {
  return new AwsProvider(sessions);
}

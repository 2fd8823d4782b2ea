/**
 * Credentials for the base identity and for roles assumed in target accounts
 */

import { randomUUID } from "node:crypto";
import { AssumeRoleCommand, STSClient } from "@aws-sdk/client-sts";
import type { AwsAccount, CredentialsConfig } from "../types";
import { logger } from "../utils/logger";

/** Region for global services (STS, Organizations, region discovery) */
export const GLOBAL_REGION = "us-east-1";

const EXPIRY_MARGIN_MS = 5 * 60 * 1000;

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

export interface AwsClientConfig {
  region?: string;
  /** Undefined lets the SDK resolve its default credential chain */
  credentials?: AwsCredentials;
}

export function roleArn(accountId: string, role: string): string {
  return `arn:aws:iam::${accountId}:role/${role}`;
}

function isExpiring(credentials: AwsCredentials, now: number): boolean {
  return credentials.expiration !== undefined && credentials.expiration.getTime() - now < EXPIRY_MARGIN_MS;
}

export class SessionProvider {
  private readonly assumed = new Map<string, Promise<AwsCredentials>>();

  constructor(private readonly config: CredentialsConfig) {}

  /** Static keys from config, or undefined for the SDK default chain */
  baseCredentials(): AwsCredentials | undefined {
    const { accessKeyId, secretAccessKey } = this.config;
    if (accessKeyId && secretAccessKey) {
      return { accessKeyId, secretAccessKey };
    }
    return undefined;
  }

  /**
   * Credentials for an account. Accounts with a role get assumed-role
   * credentials, shared by concurrent callers and renewed shortly before
   * they expire.
   */
  async credentialsFor(account?: AwsAccount): Promise<AwsCredentials | undefined> {
    if (!account?.role) {
      return this.baseCredentials();
    }

    const key = `${account.accountId}/${account.role}`;
    const pending = this.assumed.get(key);
    if (pending) {
      const credentials = await pending;
      if (!isExpiring(credentials, Date.now())) {
        return credentials;
      }
    }

    const request = this.assumeRole(account.accountId, account.role);
    this.assumed.set(key, request);
    try {
      return await request;
    } catch (error) {
      if (this.assumed.get(key) === request) {
        this.assumed.delete(key);
      }
      throw error;
    }
  }

  async clientConfig(account?: AwsAccount, region?: string): Promise<AwsClientConfig> {
    return { region, credentials: await this.credentialsFor(account) };
  }

  private async assumeRole(accountId: string, role: string): Promise<AwsCredentials> {
    const arn = roleArn(accountId, role);
    logger.debug(`Assuming role ${arn}`);

    const client = new STSClient({ region: GLOBAL_REGION, credentials: this.baseCredentials() });
    try {
      const response = await client.send(
        new AssumeRoleCommand({
          RoleArn: arn,
          RoleSessionName: `${accountId}-${randomUUID()}`,
        }),
      );

      const credentials = response.Credentials;
      if (!credentials?.AccessKeyId || !credentials.SecretAccessKey) {
        throw new Error(`Failed to assume role ${arn}: no credentials returned`);
      }

      return {
        accessKeyId: credentials.AccessKeyId,
        secretAccessKey: credentials.SecretAccessKey,
        sessionToken: credentials.SessionToken,
        expiration: credentials.Expiration,
      };
    } finally {
      client.destroy();
    }
  }
}

/**
 * Account and region selection
 */

import type { AwsAccount, ICloudProvider, JanitorConfig } from "../../types";
import { logger } from "../../utils/logger";

/**
 * Accounts to clean:
 * - organization scan: every member account with the role, plus the current
 *   account with the base credentials
 * - explicit list: those accounts, with the role if one is configured
 * - neither: the current account
 */
export async function resolveAccounts(
  config: JanitorConfig,
  provider: ICloudProvider,
): Promise<AwsAccount[]> {
  if (config.scrapeOrg) {
    const currentId = await provider.currentAccountId();
    const memberIds = await provider.listOrganizationAccounts();
    const members = memberIds
      .filter((accountId) => accountId !== currentId)
      .map((accountId): AwsAccount => ({ accountId, role: config.role }));
    logger.info(`Found ${members.length} other accounts in the organization`);
    return [...members, { accountId: currentId }];
  }

  if (config.accounts.length > 0) {
    return config.accounts.map((accountId) => ({ accountId, role: config.role }));
  }

  logger.info("Account not specified, assuming default account");
  return [{ accountId: await provider.currentAccountId() }];
}

export async function resolveRegions(
  config: JanitorConfig,
  provider: ICloudProvider,
): Promise<string[]> {
  if (config.regions.length > 0) {
    return [...config.regions];
  }
  logger.info("Region not specified, assuming all regions");
  return provider.listRegions();
}

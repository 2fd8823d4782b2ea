/**
 * Account and region discovery
 */

import { DescribeRegionsCommand, type EC2Client } from "@aws-sdk/client-ec2";
import { ListAccountsCommand, type OrganizationsClient } from "@aws-sdk/client-organizations";
import { GetCallerIdentityCommand, type STSClient } from "@aws-sdk/client-sts";
import { logger } from "../utils/logger";
import { isOrgAccessDenied } from "./errors";

export async function getCallerAccountId(client: STSClient): Promise<string> {
  const response = await client.send(new GetCallerIdentityCommand({}));
  if (!response.Account) {
    throw new Error("GetCallerIdentity returned no account ID");
  }
  return response.Account;
}

/**
 * Account IDs of the organization. Missing permissions are logged and end the
 * listing with whatever was collected so far.
 */
export async function listOrganizationAccountIds(client: OrganizationsClient): Promise<string[]> {
  const ids: string[] = [];
  let nextToken: string | undefined;

  try {
    do {
      const response = await client.send(
        new ListAccountsCommand({ ...(nextToken && { NextToken: nextToken }) }),
      );
      for (const account of response.Accounts ?? []) {
        if (account.Id) {
          ids.push(account.Id);
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);
  } catch (error) {
    if (!isOrgAccessDenied(error)) {
      throw error;
    }
    logger.error("Missing permissions to list organization accounts");
  }

  for (const id of ids) {
    logger.debug(`Found organization account ${id}`);
  }
  return ids;
}

export async function listRegionNames(client: EC2Client): Promise<string[]> {
  const response = await client.send(new DescribeRegionsCommand({}));
  return (response.Regions ?? [])
    .map((region) => region.RegionName)
    .filter((name): name is string => typeof name === "string");
}

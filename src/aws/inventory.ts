/**
 * EC2 volume inventory
 */

import {
  DeleteVolumeCommand,
  DescribeVolumesCommand,
  type EC2Client,
  type Volume as Ec2Volume,
} from "@aws-sdk/client-ec2";
import type { Volume } from "../types";
import { logger } from "../utils/logger";

/**
 * Map an SDK volume. Volumes without an id or creation time can't be judged
 * and are left out.
 */
export function toVolume(raw: Ec2Volume): Volume | null {
  if (!raw.VolumeId || !raw.CreateTime) {
    logger.debug(`Skipping volume without id or creation time: ${raw.VolumeId ?? "<unknown>"}`);
    return null;
  }

  const tags: Record<string, string> = {};
  for (const tag of raw.Tags ?? []) {
    if (tag.Key !== undefined && !Object.hasOwn(tags, tag.Key)) {
      tags[tag.Key] = tag.Value ?? "";
    }
  }

  return {
    volumeId: raw.VolumeId,
    size: raw.Size ?? 0,
    volumeType: raw.VolumeType ?? "unknown",
    createTime: raw.CreateTime,
    tags,
    state: raw.State ?? "unknown",
  };
}

/**
 * Every volume in the "available" (unattached) state
 */
export async function listAvailableVolumes(client: EC2Client): Promise<Volume[]> {
  const volumes: Volume[] = [];
  let nextToken: string | undefined;

  do {
    const response = await client.send(
      new DescribeVolumesCommand({
        Filters: [{ Name: "status", Values: ["available"] }],
        ...(nextToken && { NextToken: nextToken }),
      }),
    );

    for (const raw of response.Volumes ?? []) {
      const volume = toVolume(raw);
      if (volume) {
        volumes.push(volume);
      }
    }

    nextToken = response.NextToken;
  } while (nextToken);

  return volumes;
}

export async function deleteVolume(client: EC2Client, volumeId: string): Promise<void> {
  await client.send(new DeleteVolumeCommand({ VolumeId: volumeId }));
}

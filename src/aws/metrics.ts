/**
 * CloudWatch idle-time metrics for EBS volumes
 */

import { type CloudWatchClient, GetMetricStatisticsCommand } from "@aws-sdk/client-cloudwatch";
import type { MetricDatapoint, MetricWindow } from "../types";
import { addDays } from "../utils/time";

export const IDLE_TIME_METRIC = {
  namespace: "AWS/EBS",
  name: "VolumeIdleTime",
  periodSeconds: 3600,
} as const;

/** CloudWatch returns at most this many datapoints per request */
export const MAX_DATAPOINTS_PER_REQUEST = 1440;

/**
 * Lookback window of `ageDays` ending one day after `now`. The extra day
 * tolerates clock skew and late metric publication.
 */
export function metricWindow(now: Date, ageDays: number): MetricWindow {
  const end = addDays(now, 1);
  return { start: addDays(end, -ageDays), end };
}

/**
 * Split a window into consecutive chunks that each fit in one request
 */
export function splitWindow(
  window: MetricWindow,
  periodSeconds: number = IDLE_TIME_METRIC.periodSeconds,
  maxDatapoints: number = MAX_DATAPOINTS_PER_REQUEST,
): MetricWindow[] {
  const span = periodSeconds * 1000 * maxDatapoints;
  const endTime = window.end.getTime();
  const chunks: MetricWindow[] = [];

  for (let start = window.start.getTime(); start < endTime; start += span) {
    chunks.push({ start: new Date(start), end: new Date(Math.min(start + span, endTime)) });
  }

  return chunks;
}

/**
 * Hourly minimum idle seconds for a volume. A datapoint without a minimum is
 * counted as 0 (not idle).
 */
export async function getIdleTimeMetrics(
  client: CloudWatchClient,
  volumeId: string,
  window: MetricWindow,
): Promise<MetricDatapoint[]> {
  const datapoints: MetricDatapoint[] = [];

  for (const chunk of splitWindow(window)) {
    const response = await client.send(
      new GetMetricStatisticsCommand({
        Namespace: IDLE_TIME_METRIC.namespace,
        MetricName: IDLE_TIME_METRIC.name,
        Dimensions: [{ Name: "VolumeId", Value: volumeId }],
        Period: IDLE_TIME_METRIC.periodSeconds,
        StartTime: chunk.start,
        EndTime: chunk.end,
        Statistics: ["Minimum"],
        Unit: "Seconds",
      }),
    );

    for (const point of response.Datapoints ?? []) {
      datapoints.push({
        timestamp: point.Timestamp ?? chunk.start,
        minimum: point.Minimum ?? 0,
      });
    }
  }

  return datapoints;
}

import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { RemovalLog, toRemovalRecord, VolumeDeleter } from "../../../src/core/cleanup/deleter";
import type { RetryPolicy } from "../../../src/utils/retry";
import { awsError, FakeProvider, makeVolume } from "../../helpers/fake-provider";

const ACCOUNT = { accountId: "111111111111" };
const REMOVED_AT = new Date("2026-03-01T12:00:00.000Z");

function policy(): RetryPolicy {
  return {
    maxAttempts: 3,
    multiplierMs: 10,
    capMs: 100,
    shouldRetry: (error) => error instanceof Error && error.name === "RequestLimitExceeded",
    sleep: async () => {},
  };
}

describe("deleter", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  test("toRemovalRecord uses ISO timestamps", () => {
    const volume = makeVolume("vol-1", { size: 100, volumeType: "io2" });

    expect(toRemovalRecord(volume, REMOVED_AT)).toEqual({
      volume_id: "vol-1",
      volume_type: "io2",
      size: 100,
      create_time: "2026-01-01T00:00:00.000Z",
      removal_time: "2026-03-01T12:00:00.000Z",
    });
  });

  test("RemovalLog returns copies of its records", () => {
    const log = new RemovalLog();
    log.append(toRemovalRecord(makeVolume("vol-1"), REMOVED_AT));

    log.records().pop();

    expect(log.size).toBe(1);
    expect(log.records()).toHaveLength(1);
  });

  test("deletes the volume and records it", async () => {
    const provider = new FakeProvider();
    const deleter = new VolumeDeleter({
      provider,
      account: ACCOUNT,
      region: "eu-west-1",
      policy: policy(),
      now: () => REMOVED_AT,
    });

    const record = await deleter.remove(makeVolume("vol-1"));

    expect(provider.deleted).toEqual(["vol-1"]);
    expect(record?.volume_id).toBe("vol-1");
    expect(deleter.removalLog.records()).toEqual([record]);
  });

  test("retries a rate-limited deletion", async () => {
    const provider = new FakeProvider();
    provider.deleteFailures.set("vol-1", [awsError("RequestLimitExceeded"), awsError("RequestLimitExceeded")]);
    const deleter = new VolumeDeleter({ provider, account: ACCOUNT, region: "eu-west-1", policy: policy() });

    await deleter.remove(makeVolume("vol-1"));

    expect(provider.deleteCalls).toEqual(["vol-1", "vol-1", "vol-1"]);
    expect(deleter.removalLog.size).toBe(1);
  });

  test("a failed deletion leaves no record", async () => {
    const provider = new FakeProvider();
    const inUse = awsError("VolumeInUse");
    provider.deleteFailures.set("vol-1", [inUse]);
    const deleter = new VolumeDeleter({ provider, account: ACCOUNT, region: "eu-west-1", policy: policy() });

    await expect(deleter.remove(makeVolume("vol-1"))).rejects.toBe(inUse);
    expect(deleter.removalLog.size).toBe(0);
  });

  test("attempts each volume at most once", async () => {
    const provider = new FakeProvider();
    const deleter = new VolumeDeleter({ provider, account: ACCOUNT, region: "eu-west-1", policy: policy() });
    const volume = makeVolume("vol-1");

    await deleter.remove(volume);
    const again = await deleter.remove(volume);

    expect(again).toBeNull();
    expect(provider.deleteCalls).toEqual(["vol-1"]);
    expect(deleter.removalLog.size).toBe(1);
  });

  test("appends to a shared removal log", async () => {
    const provider = new FakeProvider();
    const removalLog = new RemovalLog();
    const deleter = new VolumeDeleter({
      provider,
      account: ACCOUNT,
      region: "eu-west-1",
      policy: policy(),
      removalLog,
    });

    await deleter.remove(makeVolume("vol-1"));

    expect(removalLog.size).toBe(1);
    expect(deleter.removalLog).toBe(removalLog);
  });
});

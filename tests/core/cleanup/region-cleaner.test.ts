import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  confirmMessage,
  RegionCleaner,
  type RegionCleanerOptions,
} from "../../../src/core/cleanup/region-cleaner";
import { parseTagRules } from "../../../src/core/filter/tag-rules";
import { addDays } from "../../../src/utils/time";
import { testConfig } from "../../helpers/config";
import { awsError, FakeProvider, idleSeries, makeVolume } from "../../helpers/fake-provider";

const ACCOUNT = { accountId: "111111111111" };
const REGION = "eu-west-1";
const NOW = new Date("2026-03-01T12:00:00.000Z");

function seededProvider(): FakeProvider {
  const provider = new FakeProvider();
  provider.setVolumes(ACCOUNT.accountId, REGION, [
    makeVolume("vol-idle", { createTime: addDays(NOW, -60), tags: { team: "infra" } }),
    makeVolume("vol-busy", { createTime: addDays(NOW, -60), tags: { team: "infra" } }),
    makeVolume("vol-new", { createTime: addDays(NOW, -2), tags: { team: "web" } }),
    makeVolume("vol-old", { createTime: addDays(NOW, -30), tags: { team: "web" } }),
  ]);
  provider.metrics.set("vol-idle", idleSeries([300, 3600, 299]));
  provider.metrics.set("vol-busy", idleSeries([3600, 12, 3600]));
  return provider;
}

describe("region cleaner", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  function cleaner(provider: FakeProvider, overrides: Partial<RegionCleanerOptions> = {}) {
    const confirm = vi.fn(async (_message: string) => true);
    const instance = new RegionCleaner({
      provider,
      account: ACCOUNT,
      region: REGION,
      config: testConfig({ poolSize: 2 }),
      tagRules: [],
      confirm,
      sleep: async () => {},
      now: () => NOW,
      ...overrides,
    });
    return { instance, confirm };
  }

  test("finds idle volumes and old volumes without metrics", async () => {
    const provider = seededProvider();
    const { instance } = cleaner(provider);

    const { scanned, candidates } = await instance.findCandidates();

    expect(scanned).toBe(4);
    expect(candidates.map(({ volume, verdict }) => [volume.volumeId, verdict.reason])).toEqual([
      ["vol-idle", "idle"],
      ["vol-old", "no_metrics_expired"],
    ]);
  });

  test("queries metrics over the lookback window ending a day after now", async () => {
    const provider = seededProvider();
    const { instance } = cleaner(provider);

    await instance.findCandidates();

    expect(provider.metricCalls).toHaveLength(4);
    expect(provider.metricCalls[0]?.window).toEqual({
      start: new Date("2026-02-16T12:00:00.000Z"),
      end: new Date("2026-03-02T12:00:00.000Z"),
    });
  });

  test("tag rules skip the metrics lookup for non-matching volumes", async () => {
    const provider = seededProvider();
    const { instance } = cleaner(provider, { tagRules: parseTagRules(["team:^infra$"]) });

    const { candidates } = await instance.findCandidates();

    expect(candidates.map(({ volume }) => volume.volumeId)).toEqual(["vol-idle"]);
    expect(provider.metricCalls.map((call) => call.volumeId).sort()).toEqual(["vol-busy", "vol-idle"]);
  });

  test("ignoring metrics makes every tag-matched volume a candidate", async () => {
    const provider = seededProvider();
    const { instance } = cleaner(provider, {
      config: testConfig({ filter: { ignoreMetrics: true } }),
    });

    const { candidates } = await instance.findCandidates();

    expect(candidates).toHaveLength(4);
    expect(provider.metricCalls).toHaveLength(0);
  });

  test("asks for confirmation only after filtering, then removes the candidates", async () => {
    const provider = seededProvider();
    const { instance, confirm } = cleaner(provider);
    confirm.mockImplementation(async () => {
      expect(provider.metricCalls).toHaveLength(4);
      expect(provider.deleteCalls).toHaveLength(0);
      return true;
    });

    const summary = await instance.run();

    expect(confirm).toHaveBeenCalledWith(
      "Do you want to remove 2 Volumes in Account 111111111111 Region eu-west-1?",
    );
    expect(summary.status).toBe("removed");
    expect(provider.deleted.sort()).toEqual(["vol-idle", "vol-old"]);
    expect(summary.removed.map((record) => record.volume_id).sort()).toEqual(["vol-idle", "vol-old"]);
    expect(summary.removed[0]?.removal_time).toBe("2026-03-01T12:00:00.000Z");
  });

  test("a declined confirmation deletes nothing", async () => {
    const provider = seededProvider();
    const { instance, confirm } = cleaner(provider);
    confirm.mockResolvedValue(false);

    const summary = await instance.run();

    expect(summary.status).toBe("declined");
    expect(summary.candidates).toHaveLength(2);
    expect(summary.removed).toEqual([]);
    expect(provider.deleteCalls).toEqual([]);
  });

  test("assumeYes skips the confirmation", async () => {
    const provider = seededProvider();
    const { instance, confirm } = cleaner(provider, { config: testConfig({ assumeYes: true }) });

    const summary = await instance.run();

    expect(confirm).not.toHaveBeenCalled();
    expect(summary.removed).toHaveLength(2);
  });

  test("zero candidates skips confirmation and deletion", async () => {
    const provider = new FakeProvider();
    provider.setVolumes(ACCOUNT.accountId, REGION, [makeVolume("vol-new", { createTime: addDays(NOW, -1) })]);
    const { instance, confirm } = cleaner(provider);

    const summary = await instance.run();

    expect(summary).toEqual({
      accountId: "111111111111",
      region: "eu-west-1",
      status: "nothing_to_do",
      scanned: 1,
      candidates: [],
      removed: [],
    });
    expect(confirm).not.toHaveBeenCalled();
  });

  test("a dry run stops after filtering", async () => {
    const provider = seededProvider();
    const { instance, confirm } = cleaner(provider, { dryRun: true });

    const summary = await instance.run();

    expect(summary.status).toBe("dry_run");
    expect(summary.candidates).toHaveLength(2);
    expect(confirm).not.toHaveBeenCalled();
    expect(provider.deleteCalls).toEqual([]);
  });

  test("retries a rate-limited volume listing", async () => {
    const provider = seededProvider();
    provider.listFailures.set(`${ACCOUNT.accountId}/${REGION}`, [awsError("RequestLimitExceeded")]);
    const { instance } = cleaner(provider);

    const { scanned } = await instance.findCandidates();

    expect(scanned).toBe(4);
    expect(provider.listCalls).toHaveLength(2);
  });

  test("retries rate-limited metrics calls", async () => {
    const provider = seededProvider();
    provider.metricFailures.set("vol-idle", [awsError("Throttling"), awsError("Throttling")]);
    const { instance } = cleaner(provider);

    const { candidates } = await instance.findCandidates();

    expect(candidates.map(({ volume }) => volume.volumeId)).toEqual(["vol-idle", "vol-old"]);
    expect(provider.metricCalls.filter((call) => call.volumeId === "vol-idle")).toHaveLength(3);
  });

  test("authorization errors propagate", async () => {
    const provider = seededProvider();
    const denied = awsError("UnauthorizedOperation");
    provider.listFailures.set(`${ACCOUNT.accountId}/${REGION}`, [denied]);
    const { instance } = cleaner(provider);

    await expect(instance.run()).rejects.toBe(denied);
  });

  test("a failed deletion still lets the other deletions finish", async () => {
    const provider = seededProvider();
    const inUse = awsError("VolumeInUse");
    provider.deleteFailures.set("vol-idle", [inUse]);
    const { instance } = cleaner(provider, { config: testConfig({ assumeYes: true }) });

    await expect(instance.run()).rejects.toBe(inUse);
    expect(provider.deleted).toEqual(["vol-old"]);
    expect(instance.deleter.removalLog.records().map((record) => record.volume_id)).toEqual(["vol-old"]);
  });

  test("confirmMessage", () => {
    expect(confirmMessage(3, "222222222222", "us-east-1")).toBe(
      "Do you want to remove 3 Volumes in Account 222222222222 Region us-east-1?",
    );
  });
});

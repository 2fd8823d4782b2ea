import { describe, expect, test, vi } from "vitest";
import {
  describeVerdict,
  type EligibilityOptions,
  evaluateMetrics,
  evaluateVolume,
  isCandidate,
} from "../../../src/core/filter/eligibility";
import { parseTagRules } from "../../../src/core/filter/tag-rules";
import type { MetricDatapoint } from "../../../src/types";
import { addDays } from "../../../src/utils/time";
import { idleSeries, makeVolume } from "../../helpers/fake-provider";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function options(overrides: Partial<EligibilityOptions> = {}): EligibilityOptions {
  return {
    tagRules: [],
    ignoreMetrics: false,
    ageThresholdDays: 14,
    now: NOW,
    ...overrides,
  };
}

function lookup(datapoints: MetricDatapoint[]) {
  return vi.fn(async () => datapoints);
}

describe("eligibility", () => {
  describe("tag rules", () => {
    test("a matching volume with metrics ignored is a candidate", async () => {
      const volume = makeVolume("vol-a", { tags: { Name: "integration-test-1" } });
      const metrics = lookup([]);

      const verdict = await evaluateVolume(
        volume,
        options({ tagRules: parseTagRules(["Name:^integration-test"]), ignoreMetrics: true }),
        metrics,
      );

      expect(verdict).toEqual({ candidate: true, reason: "metrics_ignored" });
      expect(metrics).not.toHaveBeenCalled();
    });

    test("a non-matching volume is rejected without a metrics lookup", async () => {
      const volume = makeVolume("vol-b", { tags: { Name: "prod-db" } });
      const metrics = lookup(idleSeries([3600]));

      const verdict = await evaluateVolume(
        volume,
        options({ tagRules: parseTagRules(["Name:^integration-test"]) }),
        metrics,
      );

      expect(verdict).toEqual({ candidate: false, reason: "tag_mismatch" });
      expect(metrics).not.toHaveBeenCalled();
    });

    test("a tag mismatch wins over every metrics and age setting", async () => {
      const volume = makeVolume("vol-b", { createTime: addDays(NOW, -365), tags: {} });
      const rules = parseTagRules(["team:infra"]);

      for (const ignoreMetrics of [true, false]) {
        expect(await isCandidate(volume, options({ tagRules: rules, ignoreMetrics }), lookup([]))).toBe(
          false,
        );
      }
    });
  });

  describe("volumes without metrics", () => {
    test("older than the age threshold is a candidate", async () => {
      const volume = makeVolume("vol-c", { createTime: addDays(NOW, -20) });

      const verdict = await evaluateVolume(volume, options(), lookup([]));

      expect(verdict).toEqual({ candidate: true, reason: "no_metrics_expired" });
    });

    test("younger than the age threshold is not a candidate", async () => {
      const volume = makeVolume("vol-d", { createTime: addDays(NOW, -5) });

      const verdict = await evaluateVolume(volume, options(), lookup([]));

      expect(verdict).toEqual({ candidate: false, reason: "no_metrics_recent" });
    });

    test("exactly at the age threshold is a candidate", () => {
      const volume = makeVolume("vol-e", { createTime: addDays(NOW, -14) });

      expect(evaluateMetrics(volume, [], { ageThresholdDays: 14, now: NOW }).candidate).toBe(true);
    });

    test("one millisecond short of the threshold is not a candidate", () => {
      const volume = makeVolume("vol-e", {
        createTime: new Date(addDays(NOW, -14).getTime() + 1),
      });

      expect(evaluateMetrics(volume, [], { ageThresholdDays: 14, now: NOW }).candidate).toBe(false);
    });
  });

  describe("volumes with metrics", () => {
    const volume = makeVolume("vol-m", { createTime: addDays(NOW, -2) });

    test("every minimum at or above 299 is a candidate", () => {
      const verdict = evaluateMetrics(volume, idleSeries([400, 299, 500]), options());

      expect(verdict).toEqual({ candidate: true, reason: "idle" });
    });

    test("a single minimum of 298 disqualifies the volume", () => {
      const verdict = evaluateMetrics(volume, idleSeries([400, 298, 500]), options());

      expect(verdict).toEqual({ candidate: false, reason: "active" });
    });

    test("age does not matter once metrics exist", () => {
      const old = makeVolume("vol-old", { createTime: addDays(NOW, -400) });

      expect(evaluateMetrics(old, idleSeries([3600, 0]), options()).candidate).toBe(false);
    });

    test("honours a custom idle threshold", () => {
      const series = idleSeries([100, 150]);

      expect(evaluateMetrics(volume, series, options({ idleThresholdSeconds: 100 })).candidate).toBe(
        true,
      );
      expect(evaluateMetrics(volume, series, options({ idleThresholdSeconds: 101 })).candidate).toBe(
        false,
      );
    });

    test("looks the series up once per evaluation", async () => {
      const metrics = lookup(idleSeries([3600]));

      await evaluateVolume(volume, options(), metrics);

      expect(metrics).toHaveBeenCalledTimes(1);
      expect(metrics).toHaveBeenCalledWith(volume);
    });
  });

  test("the same inputs always give the same verdict", async () => {
    const volume = makeVolume("vol-i", { tags: { env: "dev" } });
    const opts = options({ tagRules: parseTagRules(["env:^dev$"]) });
    const series = idleSeries([299, 300, 298]);

    const first = await evaluateVolume(volume, opts, lookup(series));
    const second = await evaluateVolume(volume, opts, lookup(series));

    expect(second).toEqual(first);
    expect(first.candidate).toBe(false);
  });

  describe("describeVerdict", () => {
    test("explains each reason", () => {
      expect(describeVerdict({ candidate: true, reason: "idle" }, 14)).toBe("idle for 14 days");
      expect(describeVerdict({ candidate: true, reason: "no_metrics_expired" }, 14)).toBe(
        "no metrics yet, older than 14 days",
      );
      expect(describeVerdict({ candidate: true, reason: "metrics_ignored" }, 14)).toBe("metrics ignored");
      expect(describeVerdict({ candidate: false, reason: "active" }, 14)).toBe("recently active");
    });
  });
});

import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import { ConfigError } from "../../src/config/errors";
import {
  buildInlineConfig,
  extractInlineOptions,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "../../src/config/inline";
import type { JanitorConfig } from "../../src/types";

function baseConfig(): JanitorConfig {
  return structuredClone(DEFAULT_CONFIG);
}

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("maps flag names to options and parses numbers", () => {
      const options = extractInlineOptions({
        "access-key-id": "test-key-id",
        "secret-access-key": "test-secret",
        region: ["eu-west-1", "us-east-1"],
        "pool-size": "4",
        age: "30",
        tag: ["team:infra"],
        "ignore-metrics": true,
        "idle-threshold": "120",
        report: "out.json",
      });

      expect(options).toMatchObject({
        accessKeyId: "test-key-id",
        secretAccessKey: "test-secret",
        region: ["eu-west-1", "us-east-1"],
        poolSize: 4,
        age: 30,
        tag: ["team:infra"],
        ignoreMetrics: true,
        idleThreshold: 120,
        report: "out.json",
      });
    });

    test("rejects a non-positive age", () => {
      expect(() => extractInlineOptions({ age: "0" })).toThrow(ConfigError);
      expect(() => extractInlineOptions({ age: "0" })).toThrow('--age must be a positive integer, got "0"');
    });

    test("rejects a non-numeric pool size", () => {
      expect(() => extractInlineOptions({ "pool-size": "many" })).toThrow(
        '--pool-size must be a positive integer, got "many"',
      );
    });

    test("rejects a negative idle threshold", () => {
      expect(() => extractInlineOptions({ "idle-threshold": "-5" })).toThrow(
        '--idle-threshold must be a non-negative number, got "-5"',
      );
    });
  });

  describe("buildInlineConfig", () => {
    test("leaves out options that were not given", () => {
      expect(buildInlineConfig({})).toEqual({});
    });

    test("builds nested sections", () => {
      const options: InlineConfigOptions = {
        role: "VolumeJanitor",
        account: ["123456789012"],
        scrapeOrg: true,
        yes: true,
        age: 7,
        tag: ["env:dev"],
      };

      expect(buildInlineConfig(options)).toEqual({
        role: "VolumeJanitor",
        accounts: ["123456789012"],
        scrapeOrg: true,
        assumeYes: true,
        filter: { ageDays: 7, tags: ["env:dev"] },
      });
    });
  });

  describe("mergeInlineConfig", () => {
    test("flags override file values and keep the rest", () => {
      const base = baseConfig();
      base.regions = ["eu-west-1"];
      base.filter.tags = ["team:infra"];

      const merged = mergeInlineConfig(base, { age: 30, poolSize: 2 });

      expect(merged.regions).toEqual(["eu-west-1"]);
      expect(merged.filter).toEqual({
        ageDays: 30,
        tags: ["team:infra"],
        ignoreMetrics: false,
        idleThresholdSeconds: 299,
      });
      expect(merged.poolSize).toBe(2);
    });

    test("repeated flags replace the file's list", () => {
      const base = baseConfig();
      base.regions = ["eu-west-1"];

      expect(mergeInlineConfig(base, { region: ["us-east-2"] }).regions).toEqual(["us-east-2"]);
    });

    test("validates the merged result", () => {
      expect(() => mergeInlineConfig(baseConfig(), { scrapeOrg: true })).toThrow(
        "Scanning the organization requires a role to assume in member accounts",
      );
      expect(() => mergeInlineConfig(baseConfig(), { tag: ["broken"] })).toThrow(
        'Malformed tag filter "broken"',
      );
    });

    test("does not modify the base config", () => {
      const base = baseConfig();

      mergeInlineConfig(base, { age: 3 });

      expect(base.filter.ageDays).toBe(14);
    });
  });
});

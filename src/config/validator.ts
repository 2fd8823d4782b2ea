/**
 * Configuration validation
 */

import { parseTagRules } from "../core/filter/tag-rules";
import type { JanitorConfig } from "../types";
import { isPlainObject } from "./defaults";
import { ConfigError } from "./errors";

export { ConfigError } from "./errors";

type Validator = (config: Record<string, unknown>) => void;

const ACCOUNT_ID_PATTERN = /^\d{12}$/;

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function validateBackoff(name: string, value: unknown): void {
  if (!isPlainObject(value)) {
    throw new ConfigError(`retry.${name} must be an object`);
  }
  for (const field of ["maxAttempts", "multiplierMs", "capMs"]) {
    if (!isPositiveInteger(value[field])) {
      throw new ConfigError(`retry.${name}.${field} must be a positive integer`);
    }
  }
}

const validators = {
  credentials: (c) => {
    if (!isPlainObject(c.credentials)) {
      throw new ConfigError("credentials must be an object");
    }
    const { accessKeyId, secretAccessKey } = c.credentials;
    if (accessKeyId !== undefined && typeof accessKeyId !== "string") {
      throw new ConfigError("credentials.accessKeyId must be a string");
    }
    if (secretAccessKey !== undefined && typeof secretAccessKey !== "string") {
      throw new ConfigError("credentials.secretAccessKey must be a string");
    }
    if (Boolean(accessKeyId) !== Boolean(secretAccessKey)) {
      throw new ConfigError("Access key ID and secret access key must be given together");
    }
  },

  role: (c) => {
    if (c.role !== undefined && (typeof c.role !== "string" || c.role === "")) {
      throw new ConfigError("role must be a non-empty string");
    }
  },

  accounts: (c) => {
    if (!isStringArray(c.accounts)) {
      throw new ConfigError("accounts must be an array of account IDs");
    }
    for (const account of c.accounts) {
      if (!ACCOUNT_ID_PATTERN.test(account)) {
        throw new ConfigError(`Invalid account ID "${account}", expected 12 digits`);
      }
    }
  },

  scrapeOrg: (c) => {
    if (typeof c.scrapeOrg !== "boolean") {
      throw new ConfigError("scrapeOrg must be a boolean");
    }
    if (c.scrapeOrg && !c.role) {
      throw new ConfigError("Scanning the organization requires a role to assume in member accounts");
    }
  },

  regions: (c) => {
    if (!isStringArray(c.regions)) {
      throw new ConfigError("regions must be an array of region names");
    }
  },

  poolSize: (c) => {
    if (!isPositiveInteger(c.poolSize)) {
      throw new ConfigError("poolSize must be a positive integer");
    }
  },

  assumeYes: (c) => {
    if (typeof c.assumeYes !== "boolean") {
      throw new ConfigError("assumeYes must be a boolean");
    }
  },

  filter: (c) => {
    if (!isPlainObject(c.filter)) {
      throw new ConfigError("filter must be an object");
    }
    const filter = c.filter;
    if (!isPositiveInteger(filter.ageDays)) {
      throw new ConfigError("filter.ageDays must be a positive integer");
    }
    if (!isStringArray(filter.tags)) {
      throw new ConfigError("filter.tags must be an array of \"key:regex\" strings");
    }
    parseTagRules(filter.tags);
    if (typeof filter.ignoreMetrics !== "boolean") {
      throw new ConfigError("filter.ignoreMetrics must be a boolean");
    }
    if (
      typeof filter.idleThresholdSeconds !== "number" ||
      !Number.isFinite(filter.idleThresholdSeconds) ||
      filter.idleThresholdSeconds < 0
    ) {
      throw new ConfigError("filter.idleThresholdSeconds must be a non-negative number");
    }
  },

  retry: (c) => {
    if (!isPlainObject(c.retry)) {
      throw new ConfigError("retry must be an object");
    }
    validateBackoff("filter", c.retry.filter);
    validateBackoff("delete", c.retry.delete);
  },

  report: (c) => {
    if (c.report !== undefined && (typeof c.report !== "string" || c.report === "")) {
      throw new ConfigError("report must be a file path");
    }
  },
} satisfies Record<string, Validator>;

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is JanitorConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}

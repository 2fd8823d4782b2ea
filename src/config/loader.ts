/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { JanitorConfig } from "../types";
import { logger } from "../utils/logger";
import { deepMerge, defaultConfigRecord, isPlainObject } from "./defaults";
import { ConfigError } from "./errors";
import { type InlineConfigOptions, mergeInlineConfig } from "./inline";
import { resolvePaths } from "./resolver";
import { validateConfig } from "./validator";

export { ConfigError } from "./errors";
export {
  buildInlineConfig,
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineFlagValues,
  mergeInlineConfig,
} from "./inline";

export const CONFIG_FILE_NAMES = [
  "ebs-janitor.config.yaml",
  "ebs-janitor.config.yml",
  "ebs-janitor.config.json",
];

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<JanitorConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const ext = path.extname(absolutePath).toLowerCase();

  // An empty file parses to undefined and means "all defaults"
  const parsed = parseConfigContent(content, ext) ?? {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge(defaultConfigRecord(), parsed);
  validateConfig(merged);

  return resolvePaths(merged, configPath);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Load the given config file, or the one found in the working directory.
 * Without either, the defaults are used.
 */
export async function findAndLoadConfig(configPath?: string): Promise<JanitorConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (found) {
    logger.debug(`Using config file ${found}`);
    return loadConfig(found);
  }

  const defaults = defaultConfigRecord();
  validateConfig(defaults);
  return defaults;
}

/**
 * Config file (if any) with CLI flags applied on top
 */
export async function resolveConfig(
  configPath: string | undefined,
  inline: InlineConfigOptions,
): Promise<JanitorConfig> {
  const base = await findAndLoadConfig(configPath);
  return mergeInlineConfig(base, inline);
}

/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { JanitorConfig } from "../types";

/**
 * Resolve relative paths in a config file against the file's directory
 */
export function resolvePaths(config: JanitorConfig, configPath: string): JanitorConfig {
  const configDir = path.dirname(path.resolve(configPath));

  if (config.report && !path.isAbsolute(config.report)) {
    return { ...config, report: path.resolve(configDir, config.report) };
  }

  return config;
}

/**
 * Removal report writer
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { isPlainObject } from "../config/defaults";
import type { RemovalReport } from "../types";

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function sortKeys(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => compareKeys(a, b)),
  );
}

/**
 * JSON with every object's keys sorted and a 4-space indent
 */
export function serializeReport(report: RemovalReport): string {
  return `${JSON.stringify(report, sortKeys, 4)}\n`;
}

export async function writeReport(path: string, report: RemovalReport): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeReport(report), "utf-8");
}

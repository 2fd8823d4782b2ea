/**
 * Table and summary formatters
 */

import color from "picocolors";

export const TABLE_WIDTHS = {
  account: 12,
  region: 14,
  volumeId: 21,
  volumeType: 8,
  size: 9,
  age: 9,
  reason: 36,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const present = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(...present.map((i) => i.label.length));
  return present.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Table, CSV and summary formatters
 */

import color from "picocolors";

export const TABLE_WIDTHS = {
  archiveName: 40,
  created: 19,
  size: 12,
  sealed: 6,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Quote a CSV field when it contains a separator, a quote or a line break.
 */
export function csvField(value: string | number | boolean): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(values: Array<string | number | boolean>): string {
  return values.map(csvField).join(",");
}

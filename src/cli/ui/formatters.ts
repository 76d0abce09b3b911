/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { SnapshotRecord } from "../../types";
import { formatBytes } from "../../utils/format";

export const TABLE_WIDTHS = {
  fileName: 52,
  category: 8,
  created: 19,
  size: 10,
  ratio: 5,
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
 * Local "YYYY-MM-DD HH:MM:SS" for an ISO timestamp, the raw value if unparsable
 */
export function formatTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return timestamp;

  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * One select option per snapshot, labelled for pickers
 */
export function snapshotOption(record: SnapshotRecord): { value: string; label: string; hint: string } {
  return {
    value: record.file_path,
    label: record.file_name,
    hint: `${record.backup_type}, ${formatTimestamp(record.timestamp)}, ${formatBytes(record.size)}`,
  };
}

/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { RetentionAction } from "../../types";

export const TABLE_WIDTHS = {
  action: 10,
  hash: 12,
  ageDays: 8,
  ratio: 8,
  projected: 10,
  name: 48,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Cut `value` to `width` characters, marking the cut with an ellipsis
 */
export function truncate(value: string, width: number): string {
  if (value.length <= width) {
    return value;
  }
  return width <= 1 ? value.slice(0, width) : `${value.slice(0, width - 1)}…`;
}

export function formatAction(action: RetentionAction, simulate: boolean): string {
  switch (action) {
    case "too_young":
      return color.dim("too young");
    case "keep":
      return color.green("keep");
    case "remove":
      return simulate ? color.yellow("would rm") : color.red("remove");
  }
}

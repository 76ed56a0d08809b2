/**
 * Utility functions for formatting and display.
 */

/** Trim and uppercase a client or procedure label. Idempotent. */
export function normalizeLabel(value: string): string {
  return value.trim().toUpperCase();
}

/** Code-unit string order, independent of locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Format a number compactly (K/M suffixes above 10,000). */
export function formatNum(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 10_000) return `${(n / 1_000).toFixed(1)}K`;
  return n.toLocaleString("en-US");
}

/** Format an integer in full with comma separators. */
export function formatInt(n: number): string {
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

/** Format a percentage. */
export function formatPct(value: number, total: number): string {
  if (total === 0) return "0.0%";
  return `${((value / total) * 100).toFixed(1)}%`;
}

/** Pad a string to a given width. */
export function padRight(s: string, width: number): string {
  return s.length >= width ? s : s + " ".repeat(width - s.length);
}

/** Pad a string on the left to a given width. */
export function padLeft(s: string, width: number): string {
  return s.length >= width ? s : " ".repeat(width - s.length) + s;
}

/** Create a simple horizontal bar using block characters. */
export function bar(value: number, max: number, width: number = 30): string {
  if (max === 0) return "░".repeat(width);
  const filled = Math.round((value / max) * width);
  return "█".repeat(filled) + "░".repeat(width - filled);
}

/** Split comma-separated, possibly repeated CLI values into a flat list. */
export function splitList(values: readonly string[]): string[] {
  return values
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

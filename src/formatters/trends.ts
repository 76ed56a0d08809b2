/**
 * Terminal trend renderer with ASCII bar charts.
 */

import type { TimeSeriesPoint } from "../trends.js";
import { OTHER_KEY } from "../trends.js";
import { EMPTY_NOTICE } from "../dashboard.js";
import { formatNum, padRight, padLeft, bar } from "../utils.js";

const COLORS = [
  "\x1b[36m", // cyan
  "\x1b[33m", // yellow
  "\x1b[32m", // green
  "\x1b[35m", // magenta
  "\x1b[34m", // blue
  "\x1b[31m", // red
];
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const BAR_WIDTH = 30;

/** Format a single trend line (no breakdown). */
export function formatTrendLine(
  point: TimeSeriesPoint,
  maxValue: number,
  barWidth: number = BAR_WIDTH,
  labelWidth: number = 10,
): string {
  if (point.value === 0) {
    return `  ${padRight(point.label, labelWidth)}  ${DIM}${"░".repeat(barWidth)}${RESET}  ${DIM}       —${RESET}`;
  }
  return `  ${padRight(point.label, labelWidth)}  ${bar(point.value, maxValue, barWidth)}  ${padLeft(formatNum(point.value), 8)}`;
}

/** Format a trend line with breakdown (stacked bars). */
function formatBreakdownLine(
  point: TimeSeriesPoint,
  maxValue: number,
  sortedKeys: string[],
  labelWidth: number,
): string {
  if (!point.breakdown || point.value === 0) {
    return formatTrendLine(point, maxValue, BAR_WIDTH, labelWidth);
  }

  let barStr = "";
  let remaining = BAR_WIDTH;

  sortedKeys.forEach((key, i) => {
    const val = point.breakdown?.get(key) ?? 0;
    if (val === 0 || remaining === 0) return;
    const width = Math.max(1, Math.round((val / maxValue) * BAR_WIDTH));
    const clamped = Math.min(width, remaining);
    barStr += `${COLORS[i % COLORS.length]}${"█".repeat(clamped)}${RESET}`;
    remaining -= clamped;
  });

  if (remaining > 0) {
    barStr += `${DIM}${"░".repeat(remaining)}${RESET}`;
  }

  return `  ${padRight(point.label, labelWidth)}  ${barStr}  ${padLeft(formatNum(point.value), 8)}`;
}

/** Compute summary stats from a time series. */
export function formatTrendSummary(series: TimeSeriesPoint[]): {
  total: number;
  avg: number;
  peak: { value: number; label: string };
} {
  if (series.length === 0) {
    return { total: 0, avg: 0, peak: { value: 0, label: "" } };
  }

  const total = series.reduce((sum, p) => sum + p.value, 0);
  const avg = total / series.length;
  const peak = series.reduce((max, p) => (p.value > max.value ? p : max), series[0]);

  return { total, avg, peak: { value: peak.value, label: peak.label } };
}

/** Breakdown keys ordered by overall total, with OTHER always last. */
export function breakdownKeyOrder(series: TimeSeriesPoint[]): string[] {
  const totals = new Map<string, number>();
  for (const p of series) {
    for (const [key, val] of p.breakdown ?? []) {
      totals.set(key, (totals.get(key) ?? 0) + val);
    }
  }
  const keys = [...totals.entries()]
    .filter(([key]) => key !== OTHER_KEY)
    .sort(([, a], [, b]) => b - a)
    .map(([k]) => k);
  return totals.has(OTHER_KEY) ? [...keys, OTHER_KEY] : keys;
}

/** Print a complete trend chart to the terminal. */
export function printTrend(series: TimeSeriesPoint[], title: string): void {
  console.log(`\n  ${title}\n`);

  if (series.length === 0) {
    console.log(`  ${EMPTY_NOTICE}\n`);
    return;
  }

  const maxValue = Math.max(...series.map((p) => p.value));
  const labelWidth = Math.max(5, ...series.map((p) => p.label.length));
  const sortedKeys = breakdownKeyOrder(series);
  const hasBreakdown = sortedKeys.length > 0;

  for (const point of series) {
    console.log(hasBreakdown
      ? formatBreakdownLine(point, maxValue, sortedKeys, labelWidth)
      : formatTrendLine(point, maxValue, BAR_WIDTH, labelWidth));
  }

  // Summary
  const summary = formatTrendSummary(series);
  const blank = " ".repeat(BAR_WIDTH);
  console.log(`  ${" ".repeat(labelWidth)}  ${"─".repeat(BAR_WIDTH + 10)}`);
  console.log(`  ${padRight("Total", labelWidth)}  ${blank}  ${padLeft(formatNum(summary.total), 8)}`);
  console.log(`  ${padRight("Avg", labelWidth)}  ${blank}  ${padLeft(formatNum(Math.round(summary.avg)), 8)}`);
  console.log(`  ${padRight("Peak", labelWidth)}  ${blank}  ${padLeft(formatNum(summary.peak.value), 8)}  (${summary.peak.label})`);

  if (hasBreakdown) {
    const legend = sortedKeys.map((key, i) => `${COLORS[i % COLORS.length]}■${RESET} ${key}`).join("  ");
    console.log(`\n  Legend: ${legend}`);
  }

  console.log();
}

/**
 * Aggregation over a filtered view.
 * Every function is a group-by + sum of quantity and never touches its input.
 */

import { compareText } from "./utils.js";
import type { ClientTotal, DatePoint, ProcedureTotal, Summary, VisitRecord, VisitTable } from "./types.js";

export const DEFAULT_TOP_PROCEDURES = 10;

/** Sum quantity per key, keeping first-seen key order. */
function sumBy(view: VisitTable, key: (r: VisitRecord) => string): Map<string, number> {
  const totals = new Map<string, number>();
  for (const record of view) {
    const k = key(record);
    totals.set(k, (totals.get(k) ?? 0) + record.quantity);
  }
  return totals;
}

export function getSummary(view: VisitTable): Summary {
  return {
    totalQuantity: view.reduce((sum, r) => sum + r.quantity, 0),
    recordCount: view.length,
  };
}

/** Quantity per exact date, oldest first. */
export function getTimeSeries(view: VisitTable): DatePoint[] {
  return [...sumBy(view, (r) => r.date)]
    .map(([date, quantity]) => ({ date, quantity }))
    .sort((a, b) => compareText(a.date, b.date));
}

/** All procedure totals, largest first; equal totals ordered by name. */
export function getProcedureTotals(view: VisitTable): ProcedureTotal[] {
  return [...sumBy(view, (r) => r.procedure)]
    .map(([procedure, quantity]) => ({ procedure, quantity }))
    .sort((a, b) => b.quantity - a.quantity || compareText(a.procedure, b.procedure));
}

/**
 * The `n` procedures with the largest totals, returned in ascending order
 * (the reverse of their rank) so a horizontal bar chart puts the largest on top.
 */
export function getTopProcedures(view: VisitTable, n: number = DEFAULT_TOP_PROCEDURES): ProcedureTotal[] {
  return getProcedureTotals(view).slice(0, Math.max(0, n)).reverse();
}

/** Quantity per client, every client, ordered by name. */
export function getClientDistribution(view: VisitTable): ClientTotal[] {
  return [...sumBy(view, (r) => r.client)]
    .map(([client, quantity]) => ({ client, quantity }))
    .sort((a, b) => compareText(a.client, b.client));
}

/** Find the top item by a numeric property. */
export function topBy<T>(items: readonly T[], value: (item: T) => number): T | null {
  let top: T | null = null;
  for (const item of items) {
    if (top === null || value(item) > value(top)) top = item;
  }
  return top;
}

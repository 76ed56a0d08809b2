/**
 * JSON output formatter.
 * Converts dashboard views to serializable JSON.
 */

import type { DashboardView } from "../dashboard.js";
import { EMPTY_NOTICE } from "../dashboard.js";
import { projectionToObjects } from "../projection.js";
import type { FilterOptions, FilterSelection } from "../types.js";
import type { TimeSeriesPoint } from "../trends.js";

export type JsonCommand = "summary" | "procedures" | "clients" | "details";

export function selectionToJson(selection: FilterSelection): Record<string, (number | string)[]> {
  return {
    years: [...selection.years],
    months: [...selection.months],
    procedures: [...selection.procedures],
    clients: [...selection.clients],
  };
}

/** Convert a dashboard view to the JSON document for a command. */
export function toJsonObject(
  dashboard: DashboardView,
  selection: FilterSelection,
  command: JsonCommand,
  opts: { limit?: number } = {},
): Record<string, unknown> {
  const base: Record<string, unknown> = {
    filters: { label: dashboard.label, ...selectionToJson(selection) },
    summary: dashboard.summary,
  };
  if (dashboard.empty) base.notice = EMPTY_NOTICE;

  switch (command) {
    case "summary":
      return {
        ...base,
        timeSeries: dashboard.timeSeries,
        topProcedures: dashboard.topProcedures,
        clients: dashboard.clients,
      };

    case "procedures":
      return { ...base, topProcedures: [...dashboard.topProcedures].reverse() };

    case "clients":
      return {
        ...base,
        clients: dashboard.clients.map((c) => ({
          ...c,
          share: dashboard.summary.totalQuantity > 0 ? c.quantity / dashboard.summary.totalQuantity : 0,
        })),
      };

    case "details": {
      const rows = projectionToObjects(dashboard.details);
      return {
        ...base,
        columns: dashboard.details.columns,
        rows: opts.limit === undefined ? rows : rows.slice(0, opts.limit),
      };
    }
  }
}

/** Convert stats to a JSON-serializable object and print to stdout. */
export function printJson(
  dashboard: DashboardView,
  selection: FilterSelection,
  command: JsonCommand,
  opts: { limit?: number } = {},
): void {
  console.log(JSON.stringify(toJsonObject(dashboard, selection, command, opts), null, 2));
}

export function trendToJson(series: TimeSeriesPoint[]): Record<string, unknown>[] {
  return series.map((p) => ({
    date: p.date.toISOString().slice(0, 10),
    label: p.label,
    value: p.value,
    breakdown: p.breakdown ? Object.fromEntries(p.breakdown) : undefined,
  }));
}

export function printOptionsJson(options: FilterOptions): void {
  console.log(JSON.stringify(options, null, 2));
}

/**
 * The full pipeline behind one dashboard render:
 * filter, then aggregate, then project.
 */

import { getFilteredView, getFilterOptions, describeSelection } from "./filters.js";
import {
  DEFAULT_TOP_PROCEDURES,
  getClientDistribution,
  getSummary,
  getTimeSeries,
  getTopProcedures,
} from "./aggregator.js";
import { getDetailRows, type DetailColumn, type Projection } from "./projection.js";
import type {
  ClientTotal,
  DatePoint,
  FilterSelection,
  ProcedureTotal,
  Summary,
  VisitTable,
} from "./types.js";

export const EMPTY_NOTICE = "No data found for the selected filters.";

export interface DashboardView {
  /** Human-readable description of the selection. */
  label: string;
  view: VisitTable;
  summary: Summary;
  timeSeries: DatePoint[];
  topProcedures: ProcedureTotal[];
  clients: ClientTotal[];
  details: Projection<DetailColumn>;
  /** True when the selection matches no records. Not an error. */
  empty: boolean;
}

export interface DashboardOptions {
  top?: number;
}

export function buildDashboardView(
  table: VisitTable,
  selection: FilterSelection,
  opts: DashboardOptions = {},
): DashboardView {
  const view = getFilteredView(table, selection);
  return {
    label: describeSelection(selection, getFilterOptions(table)),
    view,
    summary: getSummary(view),
    timeSeries: getTimeSeries(view),
    topProcedures: getTopProcedures(view, opts.top ?? DEFAULT_TOP_PROCEDURES),
    clients: getClientDistribution(view),
    details: getDetailRows(view),
    empty: view.length === 0,
  };
}

/**
 * Multi-dimensional filtering over year, month, procedure and client.
 */

import type {
  Dimension,
  FilterOptions,
  FilterSelection,
  SelectionInput,
  VisitTable,
} from "./types.js";
import { compareText, normalizeLabel } from "./utils.js";

function distinct<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

/** Distinct values per dimension. Years most recent first, everything else ascending. */
export function getFilterOptions(table: VisitTable): FilterOptions {
  return {
    year: distinct(table.map((r) => r.year)).sort((a, b) => b - a),
    month: distinct(table.map((r) => r.month)).sort((a, b) => a - b),
    procedure: distinct(table.map((r) => r.procedure)).sort(compareText),
    client: distinct(table.map((r) => r.client)).sort(compareText),
  };
}

export function getDimensionOptions<D extends Dimension>(table: VisitTable, dimension: D): FilterOptions[D] {
  return getFilterOptions(table)[dimension];
}

/** Every available value selected: the view before any user interaction. */
export function defaultSelection(table: VisitTable): FilterSelection {
  const options = getFilterOptions(table);
  return {
    years: new Set(options.year),
    months: new Set(options.month),
    procedures: new Set(options.procedure),
    clients: new Set(options.client),
  };
}

/**
 * Start from the default selection and replace each dimension the caller
 * supplied. Labels are normalized the same way the loader normalizes them.
 */
export function buildSelection(table: VisitTable, input: SelectionInput = {}): FilterSelection {
  const defaults = defaultSelection(table);
  return {
    years: input.years ? new Set(input.years) : defaults.years,
    months: input.months ? new Set(input.months) : defaults.months,
    procedures: input.procedures ? new Set([...input.procedures].map(normalizeLabel)) : defaults.procedures,
    clients: input.clients ? new Set([...input.clients].map(normalizeLabel)) : defaults.clients,
  };
}

/**
 * Keep records whose year, month, procedure and client are all selected.
 * Source order is preserved; an empty set in any dimension matches nothing.
 */
export function getFilteredView(table: VisitTable, selection: FilterSelection): VisitTable {
  return table.filter((r) =>
    selection.years.has(r.year) &&
    selection.months.has(r.month) &&
    selection.procedures.has(r.procedure) &&
    selection.clients.has(r.client)
  );
}

function describeDimension<T extends number | string>(
  title: string,
  selected: ReadonlySet<T>,
  available: readonly T[],
): string | null {
  const unknown = [...selected].filter((v) => !available.includes(v));
  if (unknown.length === 0 && available.every((v) => selected.has(v))) return null;
  if (selected.size === 0) return `${title} none`;
  const chosen = available.filter((v) => selected.has(v));
  return `${title} ${[...chosen, ...unknown].join(", ")}`;
}

/** Get the display label for a selection, e.g. "Years 2024 · Clients CONVENIO A". */
export function describeSelection(selection: FilterSelection, options: FilterOptions): string {
  const parts = [
    describeDimension("Years", selection.years, options.year),
    describeDimension("Months", selection.months, options.month),
    describeDimension("Procedures", selection.procedures, options.procedure),
    describeDimension("Clients", selection.clients, options.client),
  ].filter((p): p is string => p !== null);

  return parts.length > 0 ? parts.join(" · ") : "All records";
}

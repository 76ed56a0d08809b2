/**
 * Column projection for the detail table.
 */

import type { VisitRecord, VisitTable } from "./types.js";

export type VisitColumn = keyof VisitRecord;

/** A table restricted to an ordered set of columns. */
export interface Projection<K extends VisitColumn = VisitColumn> {
  readonly columns: readonly K[];
  readonly rows: readonly (readonly VisitRecord[K][])[];
}

export const DETAIL_COLUMNS = ["year", "month", "client", "procedure", "quantity", "date"] as const;

export type DetailColumn = (typeof DETAIL_COLUMNS)[number];

/** Header names used by the source file. */
export const COLUMN_HEADERS: Record<VisitColumn, string> = {
  date: "Data",
  year: "Ano",
  month: "Mes",
  client: "Cliente",
  procedure: "Procedimento",
  quantity: "Quantidade",
};

/** Restrict `table` to exactly `columns`, in that order. */
export function project<K extends VisitColumn>(table: VisitTable, columns: readonly K[]): Projection<K> {
  return {
    columns: [...columns],
    rows: table.map((record) => columns.map((column) => record[column])),
  };
}

export function getDetailRows(view: VisitTable): Projection<DetailColumn> {
  return project(view, DETAIL_COLUMNS);
}

/** Projection rows as plain objects keyed by column, for JSON output. */
export function projectionToObjects<K extends VisitColumn>(projection: Projection<K>): Record<string, string | number>[] {
  return projection.rows.map((row) =>
    Object.fromEntries(projection.columns.map((column, i) => [column, row[i]]))
  );
}

/**
 * CSV export of projected rows, in the same `;`-delimited layout the loader reads.
 */

import Papa from "papaparse";
import { COLUMN_HEADERS, type Projection, type VisitColumn } from "../projection.js";

export function toCsv<K extends VisitColumn>(projection: Projection<K>): string {
  return Papa.unparse(
    {
      fields: projection.columns.map((c) => COLUMN_HEADERS[c]),
      data: projection.rows.map((row) => [...row]),
    },
    { delimiter: ";", newline: "\n" },
  );
}

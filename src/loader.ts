/**
 * CSV loader for the consolidated clinic statistics file.
 * Parses `;`-delimited rows, validates them and normalizes labels.
 */

import { readFileSync } from "node:fs";
import Papa from "papaparse";
import { z } from "zod";
import { format, isValid, parse, parseISO } from "date-fns";
import { TableCache } from "./cache.js";
import { FileNotFoundError, LoadError, ParseError } from "./errors.js";
import { debug } from "./logger.js";
import { normalizeLabel } from "./utils.js";
import type { VisitRecord, VisitTable } from "./types.js";

export const DEFAULT_DATA_FILE = "estatisticas_consolidadas_clinica.csv";

export const REQUIRED_COLUMNS = ["Data", "Ano", "Mes", "Cliente", "Procedimento", "Quantidade"] as const;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?$/;
const DAY_FIRST_DATE = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

/**
 * Parse a date field into a YYYY-MM-DD calendar date.
 * Accepts ISO dates/date-times and day-first dd/MM/yyyy; returns null otherwise.
 */
export function parseCalendarDate(value: string): string | null {
  const text = value.trim();
  let parsed: Date;
  if (ISO_DATE.test(text)) {
    parsed = parseISO(text.replace(" ", "T"));
  } else if (DAY_FIRST_DATE.test(text)) {
    parsed = parse(text, "d/M/yyyy", new Date());
  } else {
    return null;
  }
  return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : null;
}

const integerField = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "expected an integer")
  // "-0" reads as 0
  .transform((text) => Number(text) + 0)
  .pipe(z.number().safe("integer out of range"));

export const visitRowSchema = z.object({
  Data: z.string().transform((value, ctx) => {
    const date = parseCalendarDate(value);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable date "${value}"` });
      return z.NEVER;
    }
    return date;
  }),
  Ano: integerField,
  Mes: integerField.pipe(
    z.number().int().min(1, "month must be between 1 and 12").max(12, "month must be between 1 and 12"),
  ),
  Cliente: z.string().transform(normalizeLabel),
  Procedimento: z.string().transform(normalizeLabel),
  Quantidade: integerField.pipe(z.number().int().nonnegative("quantity must not be negative")),
});

type RawRow = Record<string, string | undefined>;

function toRecord(row: RawRow, rowNumber: number, source: string): VisitRecord {
  const result = visitRowSchema.safeParse(row);
  if (!result.success) {
    const issue = result.error.issues[0];
    const column = issue?.path[0];
    throw new ParseError(source, issue?.message ?? "invalid row", {
      row: rowNumber,
      column: typeof column === "string" ? column : undefined,
    });
  }

  const { Data, Ano, Mes, Cliente, Procedimento, Quantidade } = result.data;
  return Object.freeze({
    date: Data,
    year: Ano,
    month: Mes,
    client: Cliente,
    procedure: Procedimento,
    quantity: Quantidade,
  });
}

/** Parse CSV text into a frozen table. `source` is only used in error messages. */
export function parseVisits(content: string, source: string = "<input>"): VisitTable {
  const parsed = Papa.parse<RawRow>(content, {
    header: true,
    delimiter: ";",
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new ParseError(source, `missing required column(s) ${missing.join(", ")}`);
  }

  const [firstError] = parsed.errors;
  if (firstError) {
    throw new ParseError(source, firstError.message, {
      row: firstError.row === undefined ? undefined : firstError.row + 1,
    });
  }

  return Object.freeze(parsed.data.map((row, i) => toRecord(row, i + 1, source)));
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function readSource(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR" || err.code === "EISDIR")) {
      throw new FileNotFoundError(path, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new LoadError(path, `Could not read ${path}: ${reason}`, { cause: err });
  }
}

const sharedCache = new TableCache();

/**
 * Load a statistics file. Tables are cached per resolved path for the
 * lifetime of the process; a repeated call does not touch the file.
 */
export function loadVisits(path: string, cache: TableCache = sharedCache): VisitTable {
  const cached = cache.get(path);
  if (cached) {
    debug(`using cached table for ${path} (${cached.length} records)`);
    return cached;
  }

  const table = parseVisits(readSource(path), path);
  cache.set(path, table);
  debug(`loaded ${table.length} records from ${path} (${cache.size} cached)`);
  return table;
}

export type LoadResult =
  | { ok: true; table: VisitTable }
  | { ok: false; error: LoadError };

/** Like loadVisits, but returns load failures instead of throwing them. */
export function tryLoadVisits(path: string, cache?: TableCache): LoadResult {
  try {
    return { ok: true, table: loadVisits(path, cache) };
  } catch (err) {
    if (err instanceof LoadError) return { ok: false, error: err };
    throw err;
  }
}

/** Forget every table loaded through the shared cache. */
export function clearLoadCache(): void {
  sharedCache.clear();
}

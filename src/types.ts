/**
 * Core types for clinic visit statistics.
 */

// --- Records ---

/** One row of the consolidated clinic statistics file. */
export interface VisitRecord {
  /** Calendar date as YYYY-MM-DD. */
  readonly date: string;
  readonly year: number;
  readonly month: number;
  /** Payer / insurance type, trimmed and uppercased. */
  readonly client: string;
  /** Trimmed and uppercased. */
  readonly procedure: string;
  readonly quantity: number;
}

/** The loaded dataset, or any view derived from it. Never mutated. */
export type VisitTable = readonly VisitRecord[];

// --- Filter Types ---

export type Dimension = "year" | "month" | "procedure" | "client";

/** Distinct values available per dimension, in display order. */
export interface FilterOptions {
  year: number[];
  month: number[];
  procedure: string[];
  client: string[];
}

export interface FilterSelection {
  years: ReadonlySet<number>;
  months: ReadonlySet<number>;
  procedures: ReadonlySet<string>;
  clients: ReadonlySet<string>;
}

/** Caller-supplied overrides; an omitted dimension keeps every value selected. */
export interface SelectionInput {
  years?: Iterable<number>;
  months?: Iterable<number>;
  procedures?: Iterable<string>;
  clients?: Iterable<string>;
}

// --- Aggregated Views ---

export interface Summary {
  totalQuantity: number;
  recordCount: number;
}

export interface DatePoint {
  date: string;
  quantity: number;
}

export interface ProcedureTotal {
  procedure: string;
  quantity: number;
}

export interface ClientTotal {
  client: string;
  quantity: number;
}

/**
 * Command-line option parsers and the mapping from parsed options to a
 * filter selection.
 */

import { InvalidArgumentError } from "commander";
import type { SelectionInput } from "./types.js";
import { splitList } from "./utils.js";

function toInteger(value: string): number {
  const text = value.trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return Number(text);
}

/** Accumulate repeatable, comma-separated text values. */
export function collectList(value: string, previous: string[]): string[] {
  return [...previous, ...splitList([value])];
}

/** Accumulate repeatable, comma-separated integers. */
export function collectIntegers(value: string, previous: number[]): number[] {
  return [...previous, ...splitList([value]).map(toInteger)];
}

/** Parse a count such as --limit or --top. Zero is allowed. */
export function parseCount(value: string): number {
  const n = toInteger(value);
  if (n < 0) throw new InvalidArgumentError(`"${value}" must not be negative.`);
  return n;
}

/** Build a parser that only accepts one of `choices`. */
export function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(", ")}.`);
    }
    return match;
  };
}

export interface SelectionOpts {
  year: number[];
  month: number[];
  procedure: string[];
  client: string[];
}

/** Dimensions given on the command line replace the default; empty lists mean "all". */
export function selectionInputFrom(opts: SelectionOpts): SelectionInput {
  return {
    years: opts.year.length > 0 ? opts.year : undefined,
    months: opts.month.length > 0 ? opts.month : undefined,
    procedures: opts.procedure.length > 0 ? opts.procedure : undefined,
    clients: opts.client.length > 0 ? opts.client : undefined,
  };
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { clearLoadCache, loadVisits, parseCalendarDate, parseVisits, tryLoadVisits, REQUIRED_COLUMNS } from "./loader.js";
import { TableCache } from "./cache.js";
import { FileNotFoundError, LoadError, ParseError } from "./errors.js";

const FIXTURES = fileURLToPath(new URL("./fixtures", import.meta.url));
const HEADER = REQUIRED_COLUMNS.join(";");

function csv(...rows: string[]): string {
  return [HEADER, ...rows].join("\n") + "\n";
}

describe("parseCalendarDate", () => {
  it("accepts ISO dates", () => {
    expect(parseCalendarDate("2024-01-05")).toBe("2024-01-05");
  });

  it("drops the time of ISO date-times", () => {
    expect(parseCalendarDate("2024-01-06T09:30:00")).toBe("2024-01-06");
    expect(parseCalendarDate("2024-01-06 09:30")).toBe("2024-01-06");
  });

  it("reads slash dates day first", () => {
    expect(parseCalendarDate("05/01/2024")).toBe("2024-01-05");
    expect(parseCalendarDate("5/1/2024")).toBe("2024-01-05");
  });

  it("trims surrounding whitespace", () => {
    expect(parseCalendarDate("  2024-03-09 ")).toBe("2024-03-09");
  });

  it("rejects text and impossible dates", () => {
    expect(parseCalendarDate("yesterday")).toBeNull();
    expect(parseCalendarDate("")).toBeNull();
    expect(parseCalendarDate("2024-02-30")).toBeNull();
    expect(parseCalendarDate("31/02/2024")).toBeNull();
  });
});

describe("parseVisits", () => {
  it("normalizes client and procedure labels", () => {
    const table = parseVisits(csv(
      "2024-01-05;2024;1;convenio a; consulta ;3",
      "2024-01-06;2024;1;CONVENIO A;CONSULTA;2",
    ));

    expect(table).toEqual([
      { date: "2024-01-05", year: 2024, month: 1, client: "CONVENIO A", procedure: "CONSULTA", quantity: 3 },
      { date: "2024-01-06", year: 2024, month: 1, client: "CONVENIO A", procedure: "CONSULTA", quantity: 2 },
    ]);
  });

  it("returns frozen records in a frozen table", () => {
    const table = parseVisits(csv("2024-01-05;2024;1;A;B;1"));
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table[0])).toBe(true);
  });

  it("returns an empty table for a header-only file", () => {
    expect(parseVisits(`${HEADER}\n`)).toEqual([]);
  });

  it("tolerates padded header names", () => {
    const table = parseVisits("Data ; Ano;Mes;Cliente;Procedimento;Quantidade\n2024-01-05;2024;1;a;b;7\n");
    expect(table[0].quantity).toBe(7);
  });

  it("reports every missing column", () => {
    expect(() => parseVisits("Data;Ano;Mes;Cliente\n2024-01-05;2024;1;A\n", "stats.csv"))
      .toThrow("Could not parse stats.csv: missing required column(s) Procedimento, Quantidade");
  });

  it("rejects a negative quantity with row and column", () => {
    const content = csv("2024-01-05;2024;1;A;B;1", "2024-01-06;2024;1;A;B;-2");
    let caught: unknown;
    try {
      parseVisits(content, "stats.csv");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toBeInstanceOf(LoadError);
    expect(caught).toMatchObject({
      path: "stats.csv",
      row: 2,
      column: "Quantidade",
      message: "Could not parse stats.csv: row 2, column Quantidade: quantity must not be negative",
    });
  });

  it("rejects a blank quantity", () => {
    expect(() => parseVisits(csv("2024-01-05;2024;1;A;B; ")))
      .toThrow("Could not parse <input>: row 1, column Quantidade: expected an integer");
  });

  it("rejects a fractional quantity", () => {
    expect(() => parseVisits(csv("2024-01-05;2024;1;A;B;1.5")))
      .toThrow("row 1, column Quantidade: expected an integer");
  });

  it("rejects integers beyond the safe range", () => {
    expect(() => parseVisits(csv("2024-01-05;2024;1;A;B;99999999999999999999")))
      .toThrow("row 1, column Quantidade: integer out of range");
    expect(() => parseVisits(csv("2024-01-05;9007199254740993;1;A;B;1")))
      .toThrow("row 1, column Ano: integer out of range");
  });

  it("reads a negative zero quantity as zero", () => {
    const [record] = parseVisits(csv("2024-01-05;2024;1;A;B;-0"));
    expect(Object.is(record.quantity, 0)).toBe(true);
  });

  it("rejects a month outside 1-12", () => {
    expect(() => parseVisits(csv("2024-01-05;2024;13;A;B;1")))
      .toThrow("row 1, column Mes: month must be between 1 and 12");
  });

  it("rejects an unparseable date", () => {
    expect(() => parseVisits(csv("someday;2024;1;A;B;1")))
      .toThrow('row 1, column Data: unparseable date "someday"');
  });

  it("rejects rows with missing fields", () => {
    expect(() => parseVisits(csv("2024-01-05;2024;1;A;B"))).toThrow(ParseError);
  });
});

describe("loadVisits", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "visitstats-loader-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the fixture file, skipping blank lines", () => {
    const table = loadVisits(join(FIXTURES, "visits.csv"), new TableCache());

    expect(table.map((r) => [r.date, r.client, r.procedure, r.quantity])).toEqual([
      ["2023-12-28", "PARTICULAR", "RAIO-X", 4],
      ["2024-01-05", "CONVENIO A", "CONSULTA", 3],
      ["2024-01-06", "CONVENIO B", "ULTRASSOM", 1],
      ["2024-02-10", "PARTICULAR", "CONSULTA", 6],
    ]);
  });

  it("throws FileNotFoundError for a missing path", () => {
    const path = join(dir, "nope.csv");
    const cache = new TableCache();

    expect(() => loadVisits(path, cache)).toThrow(FileNotFoundError);
    expect(() => loadVisits(path, cache)).toThrow(`Statistics file not found: ${path}`);
    expect(cache.size).toBe(0);
  });

  it("throws FileNotFoundError for a directory", () => {
    const sub = join(dir, "sub");
    mkdirSync(sub);
    expect(() => loadVisits(sub, new TableCache())).toThrow(FileNotFoundError);
  });

  it("does not cache a file that fails to parse", () => {
    const cache = new TableCache();
    expect(() => loadVisits(join(FIXTURES, "missing-column.csv"), cache)).toThrow(ParseError);
    expect(cache.size).toBe(0);
  });

  it("returns the cached table without reading the file again", () => {
    const path = join(dir, "stats.csv");
    writeFileSync(path, csv("2024-01-05;2024;1;A;B;1"));
    const cache = new TableCache();

    const first = loadVisits(path, cache);
    rmSync(path);
    const second = loadVisits(path, cache);

    expect(second).toBe(first);
  });
});

describe("tryLoadVisits", () => {
  it("returns the table on success", () => {
    const result = tryLoadVisits(join(FIXTURES, "normalization.csv"), new TableCache());
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.table).toHaveLength(2);
  });

  it("returns load errors instead of throwing", () => {
    const result = tryLoadVisits(join(FIXTURES, "missing-column.csv"), new TableCache());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.message).toContain("missing required column(s) Procedimento");
    }
  });
});

describe("shared cache", () => {
  afterEach(() => {
    clearLoadCache();
  });

  it("is used when no cache is passed and can be cleared", () => {
    const path = join(FIXTURES, "normalization.csv");
    const first = loadVisits(path);
    expect(loadVisits(path)).toBe(first);

    clearLoadCache();
    const reloaded = loadVisits(path);
    expect(reloaded).not.toBe(first);
    expect(reloaded).toEqual(first);
  });
});

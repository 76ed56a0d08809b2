import { describe, it, expect } from "vitest";
import { toCsv } from "./csv.js";
import { parseVisits } from "../loader.js";
import { getDetailRows, project } from "../projection.js";
import type { VisitTable } from "../types.js";

const VIEW: VisitTable = [
  { date: "2024-01-05", year: 2024, month: 1, client: "CONVENIO A", procedure: "CONSULTA", quantity: 3 },
  { date: "2024-01-06", year: 2024, month: 1, client: "PARTICULAR", procedure: "RAIO-X", quantity: 2 },
];

describe("toCsv", () => {
  it("writes source headers and semicolon-delimited rows", () => {
    expect(toCsv(project(VIEW, ["date", "client", "quantity"]))).toBe(
      "Data;Cliente;Quantidade\n2024-01-05;CONVENIO A;3\n2024-01-06;PARTICULAR;2",
    );
  });

  it("quotes values containing the delimiter", () => {
    const view: VisitTable = [{ ...VIEW[0], procedure: "A;B" }];
    expect(toCsv(project(view, ["procedure"]))).toBe('Procedimento\n"A;B"');
  });

  it("produces a file the loader reads back", () => {
    expect(parseVisits(toCsv(getDetailRows(VIEW)))).toEqual(VIEW);
  });
});

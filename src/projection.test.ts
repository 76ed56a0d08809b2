import { describe, it, expect } from "vitest";
import { DETAIL_COLUMNS, getDetailRows, project, projectionToObjects } from "./projection.js";
import type { VisitTable } from "./types.js";

const VIEW: VisitTable = [
  { date: "2024-01-05", year: 2024, month: 1, client: "CONVENIO A", procedure: "CONSULTA", quantity: 3 },
  { date: "2024-01-06", year: 2024, month: 1, client: "PARTICULAR", procedure: "RAIO-X", quantity: 2 },
];

describe("project", () => {
  it("keeps exactly the requested columns in order", () => {
    const projection = project(VIEW, ["quantity", "client"]);
    expect(projection.columns).toEqual(["quantity", "client"]);
    expect(projection.rows).toEqual([[3, "CONVENIO A"], [2, "PARTICULAR"]]);
  });

  it("keeps rows in view order", () => {
    expect(project(VIEW, ["date"]).rows).toEqual([["2024-01-05"], ["2024-01-06"]]);
  });

  it("returns no rows for an empty view", () => {
    expect(project([], ["date"])).toEqual({ columns: ["date"], rows: [] });
  });
});

describe("getDetailRows", () => {
  it("uses the detail column order", () => {
    const details = getDetailRows(VIEW);
    expect(details.columns).toEqual([...DETAIL_COLUMNS]);
    expect(details.rows[0]).toEqual([2024, 1, "CONVENIO A", "CONSULTA", 3, "2024-01-05"]);
  });
});

describe("projectionToObjects", () => {
  it("keys values by column name", () => {
    expect(projectionToObjects(project(VIEW, ["client", "quantity"]))).toEqual([
      { client: "CONVENIO A", quantity: 3 },
      { client: "PARTICULAR", quantity: 2 },
    ]);
  });
});

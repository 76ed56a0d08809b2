import { describe, it, expect } from "vitest";
import { selectionToJson, toJsonObject, trendToJson } from "./json.js";
import { buildDashboardView } from "../dashboard.js";
import { buildSelection, defaultSelection } from "../filters.js";
import { EMPTY_NOTICE } from "../dashboard.js";
import type { VisitTable } from "../types.js";

const TABLE: VisitTable = [
  { date: "2024-01-05", year: 2024, month: 1, client: "CONVENIO A", procedure: "CONSULTA", quantity: 3 },
  { date: "2024-01-06", year: 2024, month: 1, client: "PARTICULAR", procedure: "RAIO-X", quantity: 1 },
];

describe("selectionToJson", () => {
  it("turns sets into arrays", () => {
    expect(selectionToJson(defaultSelection(TABLE))).toEqual({
      years: [2024],
      months: [1],
      procedures: ["CONSULTA", "RAIO-X"],
      clients: ["CONVENIO A", "PARTICULAR"],
    });
  });
});

describe("toJsonObject", () => {
  const selection = defaultSelection(TABLE);
  const dashboard = buildDashboardView(TABLE, selection);

  it("lists procedures largest first", () => {
    const json = toJsonObject(dashboard, selection, "procedures");
    expect(json.topProcedures).toEqual([
      { procedure: "CONSULTA", quantity: 3 },
      { procedure: "RAIO-X", quantity: 1 },
    ]);
    expect(json.summary).toEqual({ totalQuantity: 4, recordCount: 2 });
  });

  it("adds each client's share", () => {
    const json = toJsonObject(dashboard, selection, "clients");
    expect(json.clients).toEqual([
      { client: "CONVENIO A", quantity: 3, share: 0.75 },
      { client: "PARTICULAR", quantity: 1, share: 0.25 },
    ]);
  });

  it("limits detail rows", () => {
    const json = toJsonObject(dashboard, selection, "details", { limit: 1 });
    expect(json.rows).toEqual([
      { year: 2024, month: 1, client: "CONVENIO A", procedure: "CONSULTA", quantity: 3, date: "2024-01-05" },
    ]);
  });

  it("includes the notice for an empty selection", () => {
    const empty = buildSelection(TABLE, { clients: ["NOBODY"] });
    const json = toJsonObject(buildDashboardView(TABLE, empty), empty, "summary");
    expect(json.notice).toBe(EMPTY_NOTICE);
    expect(json.timeSeries).toEqual([]);
  });
});

describe("trendToJson", () => {
  it("serializes dates and breakdowns", () => {
    expect(trendToJson([
      { date: new Date("2024-01-01T00:00:00Z"), label: "Jan 2024", value: 4, breakdown: new Map([["A", 4]]) },
    ])).toEqual([{ date: "2024-01-01", label: "Jan 2024", value: 4, breakdown: { A: 4 } }]);
  });
});

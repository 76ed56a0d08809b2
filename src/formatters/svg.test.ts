import { describe, it, expect } from "vitest";
import {
  CHART_COLORS,
  CHART_SIZES,
  clientDonut,
  donutGeometry,
  escapeHtml,
  labelIndices,
  procedureChart,
  tickStep,
  trendChart,
} from "./svg.js";

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&#39;");
  });
});

describe("tickStep", () => {
  it("rounds to 1, 2 or 5 times a power of ten", () => {
    expect(tickStep(7, 4)).toBe(2);
    expect(tickStep(1000, 4)).toBe(200);
  });

  it("never goes below one", () => {
    expect(tickStep(0, 4)).toBe(1);
  });
});

describe("labelIndices", () => {
  it("labels every point when they fit", () => {
    expect([...labelIndices(5, 12)]).toEqual([0, 1, 2, 3, 4]);
  });

  it("thins labels and always keeps the last", () => {
    expect([...labelIndices(30, 12)]).toEqual([0, 3, 6, 9, 12, 15, 18, 21, 24, 27, 29]);
  });

  it("is empty for no points", () => {
    expect(labelIndices(0, 12).size).toBe(0);
  });
});

describe("trendChart", () => {
  it("draws an area line and a marker per date", () => {
    const svg = trendChart([
      { date: "2024-01-05", quantity: 3 },
      { date: "2024-01-06", quantity: 1_250 },
    ]);
    expect(svg).toContain("<polyline");
    expect(svg).toContain("<polygon");
    expect(svg.match(/<circle /g)).toHaveLength(2);
    expect(svg).toContain("<title>2024-01-06: 1,250</title>");
    expect(svg).toContain(`height="${CHART_SIZES.trend.height}"`);
  });

  it("centers a single point without a line", () => {
    const svg = trendChart([{ date: "2024-01-05", quantity: 3 }]);
    expect(svg).not.toContain("<polyline");
    expect(svg).toContain('<circle cx="337.5"');
  });

  it("shows no data for an empty series", () => {
    expect(trendChart([])).toContain("No data");
  });
});

describe("procedureChart", () => {
  const top = [
    { procedure: "CONSULTA", quantity: 1 },
    { procedure: "RAIO-X <2>", quantity: 5 },
  ];

  it("draws the largest procedure first", () => {
    const svg = procedureChart(top);
    expect(svg.match(/<rect /g)).toHaveLength(2);
    expect(svg.indexOf("RAIO-X &lt;2&gt;")).toBeLessThan(svg.indexOf("CONSULTA"));
  });

  it("scales bars to the largest quantity", () => {
    const svg = procedureChart(top);
    expect(svg).toContain('<rect x="80" y="6" width="490"');
    expect(svg).toContain('<rect x="80" y="30" width="98"');
    expect(svg).toContain('height="54"');
  });

  it("uses a single color", () => {
    const fills = procedureChart(top).match(/fill="#[0-9a-f]{6}"/g);
    expect(new Set(fills)).toEqual(new Set([`fill="${CHART_COLORS[0]}"`]));
  });

  it("shows no data for an empty ranking", () => {
    expect(procedureChart([])).toContain("No data");
  });
});

describe("donutGeometry", () => {
  it("places the stroke between the hole and the outer edge", () => {
    const { radius, thickness } = donutGeometry(200, 0.4);
    expect(radius).toBeCloseTo(67.2);
    expect(thickness).toBeCloseTo(57.6);
  });
});

describe("clientDonut", () => {
  it("draws a colored segment per client with its share", () => {
    const svg = clientDonut([
      { client: "ACME", quantity: 3 },
      { client: "BETA", quantity: 1 },
    ]);
    expect(svg.match(/<circle /g)).toHaveLength(2);
    expect(svg).toContain(`stroke="${CHART_COLORS[0]}"`);
    expect(svg).toContain(`stroke="${CHART_COLORS[1]}"`);
    expect(svg).toContain("<title>ACME: 3 (75.0%)</title>");
    expect(svg).toContain("<title>BETA: 1 (25.0%)</title>");
    expect(svg).toContain('font-weight="700">4</text>');
  });

  it("shows no data without clients", () => {
    expect(clientDonut([])).toContain("No data");
  });
});

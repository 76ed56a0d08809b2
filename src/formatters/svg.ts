/**
 * SVG charts for the dashboard: quantity per day, the procedure ranking
 * and the share of each client. Pure functions returning markup strings.
 */

import type { ClientTotal, DatePoint, ProcedureTotal } from "../types.js";
import { formatInt, formatNum, formatPct } from "../utils.js";

export const CHART_COLORS = [
  "#0ea5e9", "#22c55e", "#eab308", "#ef4444", "#6366f1",
  "#f97316", "#8b5cf6", "#ec4899", "#14b8a6", "#64748b",
];

/**
 * Chart geometry. The report's browser script reads the same values, so
 * re-rendered charts line up with the pre-rendered ones.
 */
export const CHART_SIZES = {
  trend: { width: 640, height: 220, maxLabels: 12, padTop: 25, padRight: 20, padBottom: 30, padLeft: 55 },
  procedures: { width: 640, barHeight: 18, gap: 6, valueSpace: 70 },
  /** `hole` is the inner radius as a fraction of the outer one. */
  clients: { size: 200, hole: 0.4 },
} as const;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function emptyChart(width: number, height: number): string {
  return `<svg viewBox="0 0 ${width} ${height}" width="${width}" height="${height}"><text x="${width / 2}" y="${height / 2}" text-anchor="middle" fill="var(--fg2)" font-size="12">No data</text></svg>`;
}

/** Step between y-axis ticks: 1, 2 or 5 times a power of ten, at least 1. */
export function tickStep(max: number, ticks: number): number {
  const rough = Math.max(max, 1) / ticks;
  const magnitude = Math.pow(10, Math.floor(Math.log10(rough)));
  const scaled = rough / magnitude;
  const step = (scaled <= 1.5 ? 1 : scaled <= 3 ? 2 : scaled <= 7 ? 5 : 10) * magnitude;
  // Quantities are whole numbers
  return Math.max(1, step);
}

/** Indices that get an x-axis label: evenly spaced, always including the last. */
export function labelIndices(count: number, maxLabels: number): Set<number> {
  const indices = new Set<number>();
  if (count === 0) return indices;
  const step = Math.max(1, Math.ceil(count / Math.max(1, maxLabels)));
  for (let i = 0; i < count; i += step) indices.add(i);
  indices.add(count - 1);
  return indices;
}

// ═══════════════════════════════════════
// Quantity over time
// ═══════════════════════════════════════

/** Area line of quantity per date. `points` must be in date order. */
export function trendChart(points: readonly DatePoint[]): string {
  const { width, height, maxLabels, padTop, padRight, padBottom, padLeft } = CHART_SIZES.trend;
  if (points.length === 0) return emptyChart(width, height);

  const plotW = width - padLeft - padRight;
  const plotH = height - padTop - padBottom;
  const peak = Math.max(...points.map((p) => p.quantity));
  const step = tickStep(peak, 4);
  const top = Math.ceil(Math.max(peak, 1) / step) * step;

  const x = (i: number) => (points.length === 1 ? padLeft + plotW / 2 : padLeft + (i / (points.length - 1)) * plotW);
  const y = (q: number) => padTop + plotH - (q / top) * plotH;
  const baseline = y(0);

  const parts: string[] = [];
  for (let tick = 0; tick <= top; tick += step) {
    parts.push(`<line x1="${padLeft}" y1="${y(tick)}" x2="${width - padRight}" y2="${y(tick)}" stroke="var(--border)" stroke-width="0.5"${tick === 0 ? "" : ' stroke-dasharray="4"'}/>`);
    parts.push(`<text x="${padLeft - 8}" y="${y(tick) + 4}" text-anchor="end" fill="var(--fg2)" font-size="10">${formatNum(tick)}</text>`);
  }

  if (points.length > 1) {
    const line = points.map((p, i) => `${x(i)},${y(p.quantity)}`).join(" ");
    parts.push(`<polygon points="${line} ${x(points.length - 1)},${baseline} ${x(0)},${baseline}" fill="${CHART_COLORS[0]}" opacity="0.1"/>`);
    parts.push(`<polyline points="${line}" fill="none" stroke="${CHART_COLORS[0]}" stroke-width="2" stroke-linejoin="round"/>`);
  }

  const labelled = labelIndices(points.length, maxLabels);
  points.forEach((p, i) => {
    parts.push(`<circle cx="${x(i)}" cy="${y(p.quantity)}" r="3" fill="${CHART_COLORS[0]}"><title>${p.date}: ${formatInt(p.quantity)}</title></circle>`);
    if (labelled.has(i)) {
      parts.push(`<text x="${x(i)}" y="${baseline + 18}" text-anchor="middle" fill="var(--fg2)" font-size="10">${p.date}</text>`);
    }
  });

  return `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">\n${parts.join("\n")}\n</svg>`;
}

// ═══════════════════════════════════════
// Procedure ranking
// ═══════════════════════════════════════

/** Width reserved for procedure names, from the longest one. */
export function procedureLabelWidth(top: readonly ProcedureTotal[]): number {
  return Math.min(220, Math.max(80, ...top.map((p) => p.procedure.length * 7)));
}

/**
 * Horizontal bars for the top procedures. `top` comes ascending, as the
 * aggregator returns it; the largest is drawn first, at the top.
 */
export function procedureChart(top: readonly ProcedureTotal[]): string {
  const { width, barHeight, gap, valueSpace } = CHART_SIZES.procedures;
  if (top.length === 0) return emptyChart(width, 40);

  const labelWidth = procedureLabelWidth(top);
  const barSpace = width - labelWidth - valueSpace;
  const ranked = [...top].reverse();
  const largest = ranked[0].quantity;
  const height = ranked.length * (barHeight + gap) + gap;

  const rows = ranked.map((p, i) => {
    const rowY = gap + i * (barHeight + gap);
    const textY = rowY + barHeight * 0.72;
    const length = largest > 0 ? Math.max(2, (p.quantity / largest) * barSpace) : 0;
    return [
      `<text x="${labelWidth - 8}" y="${textY}" text-anchor="end" fill="var(--fg)" font-size="12">${escapeHtml(p.procedure)}</text>`,
      `<rect x="${labelWidth}" y="${rowY}" width="${length}" height="${barHeight}" rx="3" fill="${CHART_COLORS[0]}"><title>${escapeHtml(p.procedure)}: ${formatInt(p.quantity)}</title></rect>`,
      `<text x="${labelWidth + length + 8}" y="${textY}" fill="var(--fg2)" font-size="11">${formatInt(p.quantity)}</text>`,
    ].join("\n");
  });

  return `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">\n${rows.join("\n")}\n</svg>`;
}

// ═══════════════════════════════════════
// Client distribution
// ═══════════════════════════════════════

export interface DonutGeometry {
  /** Radius of the stroked circle, halfway between the inner and outer edge. */
  radius: number;
  thickness: number;
}

export function donutGeometry(size: number, hole: number): DonutGeometry {
  const outer = size / 2 - 4;
  const inner = outer * hole;
  return { radius: (outer + inner) / 2, thickness: outer - inner };
}

export function clientColor(index: number): string {
  return CHART_COLORS[index % CHART_COLORS.length];
}

/** Donut of quantity per client, colored by position in `clients`. */
export function clientDonut(clients: readonly ClientTotal[]): string {
  const { size, hole } = CHART_SIZES.clients;
  if (clients.length === 0) return emptyChart(size, size);

  const center = size / 2;
  const { radius, thickness } = donutGeometry(size, hole);
  const circumference = 2 * Math.PI * radius;
  const total = clients.reduce((sum, c) => sum + c.quantity, 0);

  const parts: string[] = [];
  let start = 0;
  clients.forEach((c, i) => {
    const arc = total > 0 ? (c.quantity / total) * circumference : 0;
    parts.push(
      `<circle cx="${center}" cy="${center}" r="${radius}" fill="none" stroke="${clientColor(i)}" stroke-width="${thickness}" ` +
      `stroke-dasharray="${arc} ${circumference - arc}" stroke-dashoffset="${-start}" transform="rotate(-90 ${center} ${center})">` +
      `<title>${escapeHtml(c.client)}: ${formatInt(c.quantity)} (${formatPct(c.quantity, total)})</title></circle>`,
    );
    start += arc;
  });
  parts.push(`<text x="${center}" y="${center - 2}" text-anchor="middle" fill="var(--fg)" font-size="14" font-weight="700">${formatNum(total)}</text>`);
  parts.push(`<text x="${center}" y="${center + 14}" text-anchor="middle" fill="var(--fg2)" font-size="10">procedures</text>`);

  return `<svg viewBox="0 0 ${size} ${size}" width="${size}" height="${size}">\n${parts.join("\n")}\n</svg>`;
}

/**
 * Terminal table formatter.
 * Hand-rolled, no dependencies.
 */

import type { DashboardView } from "../dashboard.js";
import { EMPTY_NOTICE } from "../dashboard.js";
import { COLUMN_HEADERS, type Projection, type VisitColumn } from "../projection.js";
import type { ClientTotal, FilterOptions, ProcedureTotal } from "../types.js";
import { topBy } from "../aggregator.js";
import { formatInt, formatNum, formatPct, padLeft, padRight, bar } from "../utils.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export type Align = "left" | "right";

/** Lay out rows under a header with a rule line. Returns lines without trailing newline. */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[], align: readonly Align[]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const cell = (value: string, i: number) =>
    align[i] === "right" ? padLeft(value, widths[i]) : padRight(value, widths[i]);

  const header = `  ${headers.map(cell).join("  ")}`.trimEnd();
  const lines = [header, `  ${"─".repeat(header.length - 2)}`];
  for (const row of rows) {
    lines.push(`  ${row.map(cell).join("  ")}`.trimEnd());
  }
  return lines;
}

function printTitle(title: string, label: string): void {
  console.log(`\n  ${title} — ${label}\n`);
}

/** Print the notice shown instead of charts and tables when nothing matches. */
export function printEmptyNotice(label: string): void {
  printTitle("visitstats", label);
  console.log(`  ${EMPTY_NOTICE}\n`);
}

/** Print the summary overview. */
export function printSummary(dashboard: DashboardView): void {
  if (dashboard.empty) {
    printEmptyNotice(dashboard.label);
    return;
  }

  const { summary } = dashboard;
  printTitle("visitstats", dashboard.label);
  console.log(`  ${"─".repeat(60)}`);
  console.log(`  Procedures performed  ${padLeft(formatInt(summary.totalQuantity), 12)}`);
  console.log(`  Records analyzed      ${padLeft(formatInt(summary.recordCount), 12)}`);

  const first = dashboard.timeSeries[0];
  const last = dashboard.timeSeries[dashboard.timeSeries.length - 1];
  if (first && last) {
    console.log(`  Date range            ${first.date} – ${last.date} (${dashboard.timeSeries.length} days with visits)`);
  }

  // Top items
  const topProcedure = topBy(dashboard.topProcedures, (p) => p.quantity);
  const topClient = topBy(dashboard.clients, (c) => c.quantity);
  const busiestDay = topBy(dashboard.timeSeries, (d) => d.quantity);

  console.log();
  if (topProcedure) console.log(`  Top procedure         ${topProcedure.procedure} (${formatInt(topProcedure.quantity)})`);
  if (topClient) console.log(`  Top client            ${topClient.client} (${formatPct(topClient.quantity, summary.totalQuantity)})`);
  if (busiestDay) console.log(`  Busiest day           ${busiestDay.date} (${formatInt(busiestDay.quantity)})`);

  console.log();
}

/** Procedure ranking rows, largest first. */
export function procedureRows(ranked: readonly ProcedureTotal[], total: number): string[][] {
  const max = ranked[0]?.quantity ?? 0;
  return ranked.map((p, i) => [
    String(i + 1),
    p.procedure,
    formatInt(p.quantity),
    formatPct(p.quantity, total),
    bar(p.quantity, max, 20),
  ]);
}

/** Print the top procedures table. `top` is in chart order (ascending). */
export function printProcedures(dashboard: DashboardView): void {
  if (dashboard.empty) {
    printEmptyNotice(dashboard.label);
    return;
  }

  const ranked = [...dashboard.topProcedures].reverse();
  printTitle(`Top ${ranked.length} procedures`, dashboard.label);
  const lines = renderTable(
    ["#", "Procedure", "Quantity", "Share", ""],
    procedureRows(ranked, dashboard.summary.totalQuantity),
    ["right", "left", "right", "right", "left"],
  );
  for (const line of lines) console.log(line);
  console.log();
}

/** Client distribution rows, in the order given. */
export function clientRows(clients: readonly ClientTotal[], total: number): string[][] {
  return clients.map((c) => [c.client, formatInt(c.quantity), formatPct(c.quantity, total)]);
}

/** Print the per-client distribution. */
export function printClients(dashboard: DashboardView): void {
  if (dashboard.empty) {
    printEmptyNotice(dashboard.label);
    return;
  }

  printTitle("Clients", dashboard.label);
  const lines = renderTable(
    ["Client", "Quantity", "Share"],
    clientRows(dashboard.clients, dashboard.summary.totalQuantity),
    ["left", "right", "right"],
  );
  for (const line of lines) console.log(line);
  console.log(`  ${DIM}${dashboard.clients.length} clients · ${formatNum(dashboard.summary.totalQuantity)} procedures${RESET}`);
  console.log();
}

/** Detail rows as display strings, headed by the source column names. */
export function detailLines<K extends VisitColumn>(projection: Projection<K>, limit: number): string[] {
  const headers = projection.columns.map((c) => COLUMN_HEADERS[c]);
  const align = projection.columns.map((c): Align =>
    c === "year" || c === "month" || c === "quantity" ? "right" : "left"
  );
  const rows = projection.rows.slice(0, limit).map((row) => row.map((v) => String(v)));
  return renderTable(headers, rows, align);
}

/** Print the filtered detail table. */
export function printDetails(dashboard: DashboardView, limit: number = 20): void {
  if (dashboard.empty) {
    printEmptyNotice(dashboard.label);
    return;
  }

  const total = dashboard.details.rows.length;
  const showing = total > limit ? ` (showing ${limit} of ${total})` : "";
  printTitle("Records", `${dashboard.label}${showing}`);
  for (const line of detailLines(dashboard.details, limit)) console.log(line);
  console.log();
}

/** Print the values available for each filter. */
export function printOptions(options: FilterOptions): void {
  console.log("\n  Filter options\n");
  console.log(`  Years       ${options.year.join(", ")}`);
  console.log(`  Months      ${options.month.join(", ")}`);
  console.log(`  Procedures  ${options.procedure.length}`);
  for (const p of options.procedure) console.log(`    ${p}`);
  console.log(`  Clients     ${options.client.length}`);
  for (const c of options.client) console.log(`    ${c}`);
  console.log();
}

/**
 * Self-contained HTML dashboard generator.
 * Produces a single-file dashboard with inline CSS, SVG charts, and the
 * records embedded as JSON so the sidebar filters re-run the pipeline
 * in the browser.
 */

import { buildDashboardView, EMPTY_NOTICE, type DashboardView } from "../dashboard.js";
import { DEFAULT_TOP_PROCEDURES } from "../aggregator.js";
import { getFilterOptions } from "../filters.js";
import { COLUMN_HEADERS, DETAIL_COLUMNS } from "../projection.js";
import type { FilterSelection, VisitTable } from "../types.js";
import { formatInt, formatPct } from "../utils.js";
import { CHART_COLORS, CHART_SIZES, clientColor, clientDonut, escapeHtml, procedureChart, trendChart } from "./svg.js";

// ═══════════════════════════════════════
// Dashboard data structure
// ═══════════════════════════════════════

/** date, year, month, client, procedure, quantity */
export type RecordTuple = [string, number, number, string, string, number];

export interface DashboardData {
  records: RecordTuple[];
  top: number;
  source: string;
  generatedAt: string;
}

export interface HtmlOptions {
  top?: number;
  /** Shown in the subtitle, usually the CSV path. */
  source?: string;
}

const MONTH_NAMES = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

export function buildDashboardData(table: VisitTable, opts: HtmlOptions = {}): DashboardData {
  return {
    records: table.map((r): RecordTuple => [r.date, r.year, r.month, r.client, r.procedure, r.quantity]),
    top: opts.top ?? DEFAULT_TOP_PROCEDURES,
    source: opts.source ?? "",
    generatedAt: new Date().toISOString(),
  };
}

/** JSON safe to inline inside a <script> element. */
export function inlineJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

// ═══════════════════════════════════════
// Pre-rendered sections
// ═══════════════════════════════════════

function filterSelect<T extends number | string>(
  id: string,
  title: string,
  options: readonly T[],
  selected: ReadonlySet<T>,
  label: (value: T) => string = String,
): string {
  const items = options
    .map((v) => `<option value="${escapeHtml(String(v))}"${selected.has(v) ? " selected" : ""}>${escapeHtml(label(v))}</option>`)
    .join("\n        ");
  return `
    <div class="filter">
      <div class="filter-head">
        <label for="${id}">${title}</label>
        <span class="filter-actions">
          <button type="button" onclick="selectAll('${id}', true)">All</button>
          <button type="button" onclick="selectAll('${id}', false)">None</button>
        </span>
      </div>
      <select id="${id}" multiple size="${Math.min(8, Math.max(3, options.length))}" onchange="render()">
        ${items}
      </select>
    </div>`;
}

function renderClientRows(dashboard: DashboardView): string {
  return dashboard.clients.map((c, i) => `
    <tr>
      <td><span class="color-dot" style="background:${clientColor(i)}"></span></td>
      <td>${escapeHtml(c.client)}</td>
      <td class="num">${formatInt(c.quantity)}</td>
      <td class="num">${formatPct(c.quantity, dashboard.summary.totalQuantity)}</td>
    </tr>`).join("");
}

function renderDetailRows(dashboard: DashboardView): string {
  return dashboard.details.rows
    .map((row) => `<tr>${row.map((v) => `<td${typeof v === "number" ? ' class="num"' : ""}>${escapeHtml(String(v))}</td>`).join("")}</tr>`)
    .join("\n");
}

// ═══════════════════════════════════════
// Generate HTML
// ═══════════════════════════════════════

export function generateHtml(table: VisitTable, selection: FilterSelection, opts: HtmlOptions = {}): string {
  const data = buildDashboardData(table, opts);
  const options = getFilterOptions(table);
  const dashboard = buildDashboardView(table, selection, { top: data.top });

  const detailHeaders = DETAIL_COLUMNS.map((c, i) => {
    const type = c === "client" || c === "procedure" || c === "date" ? "str" : "num";
    const cls = type === "num" ? ' class="num"' : "";
    return `<th${cls} onclick="sortTable(this,${i},'${type}')">${COLUMN_HEADERS[c]} <span class="sort-indicator"></span></th>`;
  }).join("\n          ");

  const source = data.source ? `${escapeHtml(data.source)} · ` : "";

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>visitstats — clinic visit analytics</title>
<style>
${CSS}
</style>
</head>
<body>

<aside id="sidebar">
  <h2>Filters</h2>
  ${filterSelect("f-year", "Years", options.year, selection.years)}
  ${filterSelect("f-month", "Months", options.month, selection.months, (m) => `${String(m).padStart(2, "0")} · ${MONTH_NAMES[m - 1] ?? ""}`)}
  ${filterSelect("f-procedure", "Procedures", options.procedure, selection.procedures)}
  ${filterSelect("f-client", "Clients", options.client, selection.clients)}
  <p class="dim small">Built from consolidated clinic data.</p>
</aside>

<main>
<header>
  <h1>Clinic visit analytics</h1>
  <p class="subtitle">${source}${formatInt(table.length)} records loaded · Generated ${new Date().toLocaleDateString("en-US", { month: "short", day: "numeric", year: "numeric" })}</p>
</header>

<div class="notice" id="notice"${dashboard.empty ? "" : " hidden"}>${EMPTY_NOTICE}</div>

<div id="content"${dashboard.empty ? " hidden" : ""}>
  <!-- Summary Cards -->
  <div class="cards" id="cards">
    <div class="card">
      <div class="card-label">Procedures performed</div>
      <div class="card-value" data-field="total">${formatInt(dashboard.summary.totalQuantity)}</div>
    </div>
    <div class="card">
      <div class="card-label">Records analyzed</div>
      <div class="card-value" data-field="records">${formatInt(dashboard.summary.recordCount)}</div>
    </div>
  </div>

  <div class="section">
    <h2>Visits over time</h2>
    <div class="chart-container" id="trend-chart">${trendChart(dashboard.timeSeries)}</div>
  </div>

  <div class="grid">
    <div class="section">
      <h2 id="procedure-title">Top ${dashboard.topProcedures.length} procedures by quantity</h2>
      <div class="chart-container" id="procedure-chart">${procedureChart(dashboard.topProcedures)}</div>
    </div>

    <div class="section">
      <h2>Distribution by client</h2>
      <div class="clients-layout">
        <div id="client-chart">${clientDonut(dashboard.clients)}</div>
        <table id="client-table">
          <thead><tr><th></th><th>Client</th><th class="num">Quantity</th><th class="num">Share</th></tr></thead>
          <tbody>${renderClientRows(dashboard)}</tbody>
        </table>
      </div>
    </div>
  </div>

  <div class="section">
    <h2>Filtered records</h2>
    <table id="detail-table" data-sortable>
      <thead>
        <tr>
          ${detailHeaders}
        </tr>
      </thead>
      <tbody>${renderDetailRows(dashboard)}</tbody>
    </table>
  </div>
</div>

<footer>Generated by visitstats</footer>
</main>

<script>
const VISIT_DATA = ${inlineJson(data)};
const COLORS = ${JSON.stringify(CHART_COLORS)};
const SIZES = ${JSON.stringify(CHART_SIZES)};

function fmtNum(n) {
  if (n >= 1e6) return (n / 1e6).toFixed(1) + 'M';
  if (n >= 1e4) return (n / 1e3).toFixed(1) + 'K';
  return n.toLocaleString('en-US');
}
function fmtInt(n) { return n.toLocaleString('en-US', { maximumFractionDigits: 0 }); }
function fmtPct(v, t) { return t === 0 ? '0.0%' : ((v / t) * 100).toFixed(1) + '%'; }
function esc(s) { return String(s).replace(/&/g,'&amp;').replace(/</g,'&lt;').replace(/>/g,'&gt;').replace(/"/g,'&quot;').replace(/'/g,'&#39;'); }
function cmp(a, b) { return a < b ? -1 : a > b ? 1 : 0; }
function el(id) { return document.getElementById(id); }
function color(i) { return COLORS[i % COLORS.length]; }
function svg(w, h, width, body) { return '<svg viewBox="0 0 '+w+' '+h+'" width="'+width+'" height="'+h+'">\\n'+body.join('\\n')+'\\n</svg>'; }
function emptyChart(w, h) {
  return '<svg viewBox="0 0 '+w+' '+h+'" width="'+w+'" height="'+h+'"><text x="'+(w/2)+'" y="'+(h/2)+'" text-anchor="middle" fill="var(--fg2)" font-size="12">No data</text></svg>';
}

function tickStep(max, ticks) {
  const rough = Math.max(max, 1) / ticks, mag = Math.pow(10, Math.floor(Math.log10(rough))), scaled = rough / mag;
  return Math.max(1, (scaled <= 1.5 ? 1 : scaled <= 3 ? 2 : scaled <= 7 ? 5 : 10) * mag);
}

function selectAll(id, on) {
  Array.from(el(id).options).forEach(o => { o.selected = on; });
  render();
}

function selectedValues(id, numeric) {
  return new Set(Array.from(el(id).selectedOptions).map(o => numeric ? Number(o.value) : o.value));
}

// [key, quantity] pairs in first-seen order
function sumBy(view, idx) {
  const m = new Map();
  view.forEach(r => m.set(r[idx], (m.get(r[idx]) || 0) + r[5]));
  return Array.from(m.entries());
}

// Same rules as the CLI: AND across filters, ranking ties by name, clients by name
function compute() {
  const years = selectedValues('f-year', true), months = selectedValues('f-month', true);
  const procs = selectedValues('f-procedure', false), clients = selectedValues('f-client', false);
  const view = VISIT_DATA.records.filter(r =>
    years.has(r[1]) && months.has(r[2]) && clients.has(r[3]) && procs.has(r[4]));
  return {
    view,
    total: view.reduce((s, r) => s + r[5], 0),
    series: sumBy(view, 0).sort((a, b) => cmp(a[0], b[0])),
    ranked: sumBy(view, 4).sort((a, b) => b[1] - a[1] || cmp(a[0], b[0])).slice(0, Math.max(0, VISIT_DATA.top)),
    clients: sumBy(view, 3).sort((a, b) => cmp(a[0], b[0])),
  };
}

function trendChart(series) {
  const T = SIZES.trend;
  if (series.length === 0) return emptyChart(T.width, T.height);
  const plotW = T.width - T.padLeft - T.padRight, plotH = T.height - T.padTop - T.padBottom;
  const peak = Math.max(...series.map(p => p[1]));
  const step = tickStep(peak, 4), top = Math.ceil(Math.max(peak, 1) / step) * step;
  const x = (i) => series.length === 1 ? T.padLeft + plotW / 2 : T.padLeft + (i / (series.length - 1)) * plotW;
  const y = (q) => T.padTop + plotH - (q / top) * plotH;
  const base = y(0), every = Math.max(1, Math.ceil(series.length / T.maxLabels));
  const parts = [];
  for (let tick = 0; tick <= top; tick += step) {
    parts.push('<line x1="'+T.padLeft+'" y1="'+y(tick)+'" x2="'+(T.width-T.padRight)+'" y2="'+y(tick)+'" stroke="var(--border)" stroke-width="0.5"'+(tick === 0 ? '' : ' stroke-dasharray="4"')+'/>');
    parts.push('<text x="'+(T.padLeft-8)+'" y="'+(y(tick)+4)+'" text-anchor="end" fill="var(--fg2)" font-size="10">'+fmtNum(tick)+'</text>');
  }
  if (series.length > 1) {
    const line = series.map((p, i) => x(i)+','+y(p[1])).join(' ');
    parts.push('<polygon points="'+line+' '+x(series.length-1)+','+base+' '+x(0)+','+base+'" fill="'+COLORS[0]+'" opacity="0.1"/>');
    parts.push('<polyline points="'+line+'" fill="none" stroke="'+COLORS[0]+'" stroke-width="2" stroke-linejoin="round"/>');
  }
  series.forEach((p, i) => {
    parts.push('<circle cx="'+x(i)+'" cy="'+y(p[1])+'" r="3" fill="'+COLORS[0]+'"><title>'+p[0]+': '+fmtInt(p[1])+'</title></circle>');
    if (i % every === 0 || i === series.length - 1) {
      parts.push('<text x="'+x(i)+'" y="'+(base+18)+'" text-anchor="middle" fill="var(--fg2)" font-size="10">'+p[0]+'</text>');
    }
  });
  return svg(T.width, T.height, '100%', parts);
}

// ranked: largest first
function procedureChart(ranked) {
  const P = SIZES.procedures;
  if (ranked.length === 0) return emptyChart(P.width, 40);
  const labelWidth = Math.min(220, Math.max(80, ...ranked.map(p => p[0].length * 7)));
  const barSpace = P.width - labelWidth - P.valueSpace, largest = ranked[0][1];
  const height = ranked.length * (P.barHeight + P.gap) + P.gap;
  const parts = [];
  ranked.forEach((p, i) => {
    const rowY = P.gap + i * (P.barHeight + P.gap), textY = rowY + P.barHeight * 0.72;
    const length = largest > 0 ? Math.max(2, (p[1] / largest) * barSpace) : 0;
    parts.push('<text x="'+(labelWidth-8)+'" y="'+textY+'" text-anchor="end" fill="var(--fg)" font-size="12">'+esc(p[0])+'</text>');
    parts.push('<rect x="'+labelWidth+'" y="'+rowY+'" width="'+length+'" height="'+P.barHeight+'" rx="3" fill="'+COLORS[0]+'"><title>'+esc(p[0])+': '+fmtInt(p[1])+'</title></rect>');
    parts.push('<text x="'+(labelWidth+length+8)+'" y="'+textY+'" fill="var(--fg2)" font-size="11">'+fmtInt(p[1])+'</text>');
  });
  return svg(P.width, height, '100%', parts);
}

function clientDonut(clients) {
  const C = SIZES.clients;
  if (clients.length === 0) return emptyChart(C.size, C.size);
  const center = C.size / 2, outer = C.size / 2 - 4, inner = outer * C.hole;
  const radius = (outer + inner) / 2, thickness = outer - inner, circ = 2 * Math.PI * radius;
  const total = clients.reduce((s, c) => s + c[1], 0);
  const parts = [];
  let start = 0;
  clients.forEach((c, i) => {
    const arc = total > 0 ? (c[1] / total) * circ : 0;
    parts.push('<circle cx="'+center+'" cy="'+center+'" r="'+radius+'" fill="none" stroke="'+color(i)+'" stroke-width="'+thickness+'" '
      + 'stroke-dasharray="'+arc+' '+(circ-arc)+'" stroke-dashoffset="'+(-start)+'" transform="rotate(-90 '+center+' '+center+')">'
      + '<title>'+esc(c[0])+': '+fmtInt(c[1])+' ('+fmtPct(c[1], total)+')</title></circle>');
    start += arc;
  });
  parts.push('<text x="'+center+'" y="'+(center-2)+'" text-anchor="middle" fill="var(--fg)" font-size="14" font-weight="700">'+fmtNum(total)+'</text>');
  parts.push('<text x="'+center+'" y="'+(center+14)+'" text-anchor="middle" fill="var(--fg2)" font-size="10">procedures</text>');
  return svg(C.size, C.size, C.size, parts);
}

function renderClientTable(target, clients, total) {
  target.querySelector('tbody').innerHTML = clients.map((c, i) =>
    '<tr><td><span class="color-dot" style="background:'+color(i)+'"></span></td><td>'+esc(c[0])+'</td><td class="num">'+fmtInt(c[1])+'</td><td class="num">'+fmtPct(c[1], total)+'</td></tr>'
  ).join('');
}

function renderDetails(target, view) {
  // year, month, client, procedure, quantity, date
  target.querySelector('tbody').innerHTML = view.map(r =>
    '<tr><td class="num">'+r[1]+'</td><td class="num">'+r[2]+'</td><td>'+esc(r[3])+'</td><td>'+esc(r[4])+'</td><td class="num">'+r[5]+'</td><td>'+r[0]+'</td></tr>'
  ).join('\\n');
  target.querySelectorAll('.sort-indicator').forEach(s => { s.className = 'sort-indicator'; });
  target.querySelectorAll('th[data-sort-dir]').forEach(th => { delete th.dataset.sortDir; });
}

function render() {
  const s = compute();
  const empty = s.view.length === 0;
  el('notice').hidden = !empty;
  el('content').hidden = empty;
  if (empty) return;

  const cards = el('cards');
  cards.querySelector('[data-field="total"]').textContent = fmtInt(s.total);
  cards.querySelector('[data-field="records"]').textContent = fmtInt(s.view.length);

  el('trend-chart').innerHTML = trendChart(s.series);
  el('procedure-title').textContent = 'Top ' + s.ranked.length + ' procedures by quantity';
  el('procedure-chart').innerHTML = procedureChart(s.ranked);
  el('client-chart').innerHTML = clientDonut(s.clients);
  renderClientTable(el('client-table'), s.clients, s.total);
  renderDetails(el('detail-table'), s.view);
}

function sortTable(th, colIdx, type) {
  const table = th.closest('table');
  const tbody = table.querySelector('tbody');
  const rows = Array.from(tbody.querySelectorAll('tr'));
  const indicator = th.querySelector('.sort-indicator');

  table.querySelectorAll('.sort-indicator').forEach(s => { s.className = 'sort-indicator'; });

  const asc = th.dataset.sortDir !== 'asc';
  th.dataset.sortDir = asc ? 'asc' : 'desc';
  indicator.className = 'sort-indicator ' + (asc ? 'asc' : 'desc');

  rows.sort((a, b) => {
    const va = a.cells[colIdx]?.textContent?.trim() || '';
    const vb = b.cells[colIdx]?.textContent?.trim() || '';
    if (type === 'num') {
      const pn = (s) => parseFloat(s.replace(/,/g, '')) || 0;
      return asc ? pn(va) - pn(vb) : pn(vb) - pn(va);
    }
    return asc ? va.localeCompare(vb) : vb.localeCompare(va);
  });
  rows.forEach(r => tbody.appendChild(r));
}
</script>

</body>
</html>`;
}

// ═══════════════════════════════════════
// Inline CSS
// ═══════════════════════════════════════

const CSS = `
:root {
  --bg: #f7f8fa; --bg2: #fff; --fg: #172033; --fg2: #5b6475;
  --border: #e1e4ea; --accent: #0ea5e9;
  --card-shadow: 0 1px 3px rgba(0,0,0,0.08);
  --radius: 8px;
}
@media (prefers-color-scheme: dark) {
  :root {
    --bg: #0d1117; --bg2: #161b22; --fg: #e6edf3; --fg2: #9aa4b2;
    --border: #2a313c; --accent: #38bdf8;
    --card-shadow: 0 1px 3px rgba(0,0,0,0.3);
  }
}
* { box-sizing: border-box; margin: 0; padding: 0; }
body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif;
  background: var(--bg); color: var(--fg); line-height: 1.6; display: flex; min-height: 100vh; }
aside { width: 280px; flex-shrink: 0; background: var(--bg2); border-right: 1px solid var(--border);
  padding: 1.5rem 1rem; position: sticky; top: 0; height: 100vh; overflow-y: auto; }
main { flex: 1; padding: 2rem; max-width: 1200px; }
header { margin-bottom: 1.5rem; }
h1 { font-size: 1.5rem; font-weight: 600; }
h2 { font-size: 1.05rem; font-weight: 600; margin-bottom: 1rem; }
.subtitle, .dim { color: var(--fg2); }
.subtitle { font-size: 0.875rem; }
.small { font-size: 0.75rem; margin-top: 1rem; }

.filter { margin-bottom: 1.25rem; }
.filter-head { display: flex; justify-content: space-between; align-items: center; margin-bottom: 0.25rem; }
.filter label { font-size: 0.8rem; font-weight: 600; text-transform: uppercase; letter-spacing: 0.04em; color: var(--fg2); }
.filter-actions button { font-size: 0.7rem; padding: 0.1rem 0.45rem; border: 1px solid var(--border);
  border-radius: 4px; background: var(--bg); color: var(--fg); cursor: pointer; }
.filter select { width: 100%; font-size: 0.8rem; padding: 0.25rem; border: 1px solid var(--border);
  border-radius: var(--radius); background: var(--bg2); color: var(--fg); }

.notice { padding: 1rem 1.25rem; border-radius: var(--radius); border: 1px solid #eab308;
  background: #eab30822; margin-bottom: 1.5rem; }

.cards { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 1rem; margin-bottom: 1.5rem; }
.card { background: var(--bg2); border: 1px solid var(--border); border-radius: var(--radius);
  padding: 1.25rem; box-shadow: var(--card-shadow); }
.card-label { font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.05em; color: var(--fg2); }
.card-value { font-size: 1.75rem; font-weight: 700; color: var(--accent); }

.grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(420px, 1fr)); gap: 1.5rem; }
.section { background: var(--bg2); border: 1px solid var(--border); border-radius: var(--radius);
  padding: 1.5rem; margin-bottom: 1.5rem; box-shadow: var(--card-shadow); }
.chart-container { overflow-x: auto; }
.clients-layout { display: flex; gap: 1.5rem; align-items: start; flex-wrap: wrap; }
.clients-layout table { flex: 1; min-width: 200px; margin-top: 0; }

table { width: 100%; border-collapse: collapse; font-size: 0.85rem; margin-top: 1rem; }
th { text-align: left; padding: 0.5rem 0.75rem; border-bottom: 2px solid var(--border);
  color: var(--fg2); font-weight: 500; font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.03em; }
td { padding: 0.4rem 0.75rem; border-bottom: 1px solid var(--border); }
tr:last-child td { border-bottom: none; }
.num { text-align: right; font-variant-numeric: tabular-nums; }
.color-dot { display: inline-block; width: 10px; height: 10px; border-radius: 2px; }

footer { text-align: center; color: var(--fg2); font-size: 0.75rem; margin-top: 2rem; padding: 1rem 0; }

th[onclick] { cursor: pointer; user-select: none; }
th[onclick]:hover { color: var(--accent); }
.sort-indicator { font-size: 0.65rem; opacity: 0.4; }
.sort-indicator.asc::after { content: ' ▲'; opacity: 1; }
.sort-indicator.desc::after { content: ' ▼'; opacity: 1; }

svg text { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif; }

@media print { aside { display: none; } .section { break-inside: avoid; } }
@media (max-width: 900px) { body { flex-direction: column; } aside { width: auto; height: auto; position: static; } }
`;

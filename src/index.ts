#!/usr/bin/env node

/**
 * visitstats — Analytics for consolidated clinic visit statistics.
 */

import { Command } from "commander";
import { writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execFileSync } from "node:child_process";
import { DEFAULT_DATA_FILE, tryLoadVisits } from "./loader.js";
import { buildSelection, getFilteredView, getFilterOptions, describeSelection } from "./filters.js";
import { buildDashboardView } from "./dashboard.js";
import { DEFAULT_TOP_PROCEDURES } from "./aggregator.js";
import { debug, setVerbose, warn } from "./logger.js";
import {
  collectIntegers,
  collectList,
  parseChoice,
  parseCount,
  selectionInputFrom,
  type SelectionOpts,
} from "./options.js";
import { printSummary, printProcedures, printClients, printDetails, printOptions } from "./formatters/table.js";
import { printJson, printOptionsJson, selectionToJson, trendToJson } from "./formatters/json.js";
import { printTrend } from "./formatters/trends.js";
import { toCsv } from "./formatters/csv.js";
import { generateHtml } from "./formatters/html.js";
import {
  autoBucketSize,
  buildTrend,
  BREAKDOWN_DIMENSIONS,
  BUCKET_SIZES,
  type BreakdownDimension,
  type BucketSize,
} from "./trends.js";
import type { FilterSelection, VisitTable } from "./types.js";

type OutputFormat = "table" | "json";
type DetailFormat = OutputFormat | "csv";

const program = new Command();

program
  .name("visitstats")
  .description("Analytics for consolidated clinic visit statistics")
  .version("0.1.0");

// Shared options
function addCommonOptions(cmd: Command): Command {
  return cmd
    .option("--file <path>", "Statistics CSV file", process.env.VISITSTATS_FILE ?? DEFAULT_DATA_FILE)
    .option("-y, --year <years>", "Filter by year (comma-separated or repeatable)", collectIntegers, [])
    .option("-m, --month <months>", "Filter by month 1-12 (comma-separated or repeatable)", collectIntegers, [])
    .option("-p, --procedure <names>", "Filter by procedure (comma-separated or repeatable)", collectList, [])
    .option("-c, --client <names>", "Filter by client (comma-separated or repeatable)", collectList, [])
    .option("-l, --limit <n>", "Max rows in tables", parseCount, 20)
    .option("--verbose", "Print diagnostics to stderr");
}

function addFormatOption(cmd: Command): Command {
  return cmd.option("-f, --format <format>", "Output format: table, json", parseChoice<OutputFormat>(["table", "json"]), "table");
}

interface CommonOpts extends SelectionOpts {
  file: string;
  limit: number;
  verbose?: boolean;
}

function warnUnknown(name: string, requested: readonly number[], available: readonly number[]): void {
  for (const value of requested) {
    if (!available.includes(value)) warn(`no records for ${name} ${value}`);
  }
}

interface Session {
  table: VisitTable;
  selection: FilterSelection;
}

/**
 * Load the file and resolve the selection. On a load failure the error is
 * reported, the exit code set, and the command does nothing else.
 */
function openSession(opts: CommonOpts): Session | null {
  if (opts.verbose) setVerbose(true);

  const result = tryLoadVisits(opts.file);
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    process.exitCode = 1;
    return null;
  }

  const options = getFilterOptions(result.table);
  warnUnknown("year", opts.year, options.year);
  warnUnknown("month", opts.month, options.month);

  const selection = buildSelection(result.table, selectionInputFrom(opts));
  debug(`selection: ${describeSelection(selection, options)}`);
  return { table: result.table, selection };
}

// summary (default)
addFormatOption(addCommonOptions(
  program
    .command("summary", { isDefault: true })
    .description("Overview stats")
    .option("--top <n>", "Procedures in the ranking", parseCount, DEFAULT_TOP_PROCEDURES)
)).action((opts: CommonOpts & { format: OutputFormat; top: number }) => {
  const session = openSession(opts);
  if (!session) return;
  const dashboard = buildDashboardView(session.table, session.selection, { top: opts.top });
  if (opts.format === "json") {
    printJson(dashboard, session.selection, "summary");
  } else {
    printSummary(dashboard);
  }
});

// procedures
addFormatOption(addCommonOptions(
  program
    .command("procedures")
    .description("Top procedures by quantity")
    .option("--top <n>", "Procedures in the ranking", parseCount, DEFAULT_TOP_PROCEDURES)
)).action((opts: CommonOpts & { format: OutputFormat; top: number }) => {
  const session = openSession(opts);
  if (!session) return;
  const dashboard = buildDashboardView(session.table, session.selection, { top: opts.top });
  if (opts.format === "json") {
    printJson(dashboard, session.selection, "procedures");
  } else {
    printProcedures(dashboard);
  }
});

// clients
addFormatOption(addCommonOptions(
  program
    .command("clients")
    .description("Distribution by client")
)).action((opts: CommonOpts & { format: OutputFormat }) => {
  const session = openSession(opts);
  if (!session) return;
  const dashboard = buildDashboardView(session.table, session.selection);
  if (opts.format === "json") {
    printJson(dashboard, session.selection, "clients");
  } else {
    printClients(dashboard);
  }
});

// details
addCommonOptions(
  program
    .command("details")
    .description("Filtered records")
    .option("-f, --format <format>", "Output format: table, json, csv", parseChoice<DetailFormat>(["table", "json", "csv"]), "table")
).action((opts: CommonOpts & { format: DetailFormat }) => {
  const session = openSession(opts);
  if (!session) return;
  const dashboard = buildDashboardView(session.table, session.selection);
  if (opts.format === "csv") {
    // Exports every filtered row
    console.log(toCsv(dashboard.details));
  } else if (opts.format === "json") {
    printJson(dashboard, session.selection, "details", { limit: opts.limit });
  } else {
    printDetails(dashboard, opts.limit);
  }
});

// trends
addFormatOption(addCommonOptions(
  program
    .command("trends")
    .description("Quantity over time")
    .option("-b, --bucket <size>", "Bucket size: daily, weekly, monthly, yearly (default: from date span)", parseChoice(BUCKET_SIZES))
    .option("--by <dimension>", "Break down by: client, procedure", parseChoice(BREAKDOWN_DIMENSIONS))
    .option("--top <n>", "Top N items in breakdown", parseCount, 5)
)).action((opts: CommonOpts & { format: OutputFormat; bucket?: BucketSize; by?: BreakdownDimension; top: number }) => {
  const session = openSession(opts);
  if (!session) return;
  const view = getFilteredView(session.table, session.selection);
  const bucketSize = opts.bucket ?? autoBucketSize(view);
  const breakdownOpts = opts.by ? { by: opts.by, top: opts.top } : undefined;

  const series = buildTrend(view, bucketSize, breakdownOpts);
  const label = describeSelection(session.selection, getFilterOptions(session.table));

  if (opts.format === "json") {
    console.log(JSON.stringify({
      filters: { label, ...selectionToJson(session.selection) },
      bucketSize,
      by: opts.by ?? null,
      series: trendToJson(series),
    }, null, 2));
  } else {
    const byLabel = opts.by ? ` by ${opts.by}` : "";
    printTrend(series, `quantity${byLabel} (${label}, ${bucketSize})`);
  }
});

// options
addFormatOption(addCommonOptions(
  program
    .command("options")
    .description("Values available for each filter")
)).action((opts: CommonOpts & { format: OutputFormat }) => {
  const session = openSession(opts);
  if (!session) return;
  const options = getFilterOptions(session.table);
  if (opts.format === "json") {
    printOptionsJson(options);
  } else {
    printOptions(options);
  }
});

function openInBrowser(path: string): void {
  for (const opener of ["xdg-open", "open"]) {
    try {
      execFileSync(opener, [path], { stdio: "ignore" });
      return;
    } catch (err) {
      debug(`${opener} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

// report (HTML dashboard)
addCommonOptions(
  program
    .command("report")
    .description("Generate the interactive HTML dashboard")
    .option("-o, --output <path>", "Output file path (default: temp file, opens browser)")
    .option("--top <n>", "Procedures in the ranking", parseCount, DEFAULT_TOP_PROCEDURES)
).action((opts: CommonOpts & { output?: string; top: number }) => {
  const session = openSession(opts);
  if (!session) return;
  const html = generateHtml(session.table, session.selection, { top: opts.top, source: opts.file });

  const outPath = opts.output ?? join(tmpdir(), `visitstats-report-${Date.now()}.html`);
  writeFileSync(outPath, html);

  if (!opts.output) openInBrowser(outPath);

  console.log(`Dashboard written to ${outPath}`);
});

program.parse();

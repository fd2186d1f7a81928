import path from "node:path";
import { Command } from "commander";
import type {
  AppConfig,
  ColumnFormat,
  IssueKind,
  MultiTableResult,
  ParseIssue,
  ReducerName,
  ReportProfile,
  TableOptions,
  TableResult,
} from "@tracetab/contracts";
import {
  classifyTable,
  countIssues,
  DEFAULT_CONFIG_PATH,
  isColumnFormat,
  isReducerName,
  issuesOf,
  loadConfig,
  mergeConfig,
  multiOptionsFor,
  parseMultiTableFile,
  parseReport,
  profileForFile,
  saveConfig,
  scanReports,
  tablesOf,
  type ParsedReport,
} from "@tracetab/core";

const ISSUE_ORDER: IssueKind[] = ["malformed_row", "missing_header", "invalid_header", "malformed_value", "duplicate_title"];

function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function printNamedTable(section: string, rows: string[][], opts: { llm?: boolean } = {}): void {
  if (rows.length === 0) return;
  if (opts.llm) {
    console.log(`\n## ${section}`);
  } else {
    console.log(`\n${section}:`);
  }
  printTable(rows);
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  if (input.startsWith("[") || input.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(input);
      return parsed;
    } catch {
      return input;
    }
  }
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  if (parts.length === 0) return;

  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const key = parts[i];
    if (!key) continue;
    let next = cursor[key];
    if (!isPlainRecord(next)) {
      next = {};
      cursor[key] = next;
    }
    if (isPlainRecord(next)) cursor = next;
  }
  const lastKey = parts[parts.length - 1];
  if (!lastKey) return;
  cursor[lastKey] = value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitAssignment(input: string, flag: string): [string, string] {
  const index = input.indexOf("=");
  const key = index > 0 ? input.slice(0, index).trim() : "";
  const value = index > 0 ? input.slice(index + 1).trim() : "";
  if (!key || !value) {
    throw new Error(`${flag} expects <column>=<value>, got "${input}"`);
  }
  return [key, value];
}

interface OverrideOptions {
  rename: string[];
  key: string[];
  format: string[];
  aggregate: string[];
}

export function buildOverrides(opts: OverrideOptions): TableOptions {
  const overrides: TableOptions = {};

  if (opts.rename.length > 0) {
    const renameColumns: Record<string, string> = {};
    for (const entry of opts.rename) {
      const [source, target] = splitAssignment(entry, "--rename");
      renameColumns[source] = target;
    }
    overrides.renameColumns = renameColumns;
  }

  const keyColumns = opts.key.map((column) => column.trim()).filter(Boolean);
  if (keyColumns.length > 0) overrides.keyColumns = keyColumns;

  if (opts.format.length > 0) {
    const formatters: Record<string, ColumnFormat> = {};
    for (const entry of opts.format) {
      const [column, format] = splitAssignment(entry, "--format");
      if (!isColumnFormat(format)) {
        throw new Error(`unknown format "${format}" (expected hex_bytes, strip_identifier or trim)`);
      }
      formatters[column] = format;
    }
    overrides.formatters = formatters;
  }

  if (opts.aggregate.length > 0) {
    const aggregate: Record<string, ReducerName> = {};
    for (const entry of opts.aggregate) {
      const [column, reducer] = splitAssignment(entry, "--aggregate");
      if (!isReducerName(reducer)) {
        throw new Error(`unknown reducer "${reducer}" (expected last, first, sum, min or max)`);
      }
      aggregate[column] = reducer;
    }
    overrides.aggregate = aggregate;
  }

  return overrides;
}

function hasOverrides(overrides: TableOptions): boolean {
  return Object.keys(overrides).length > 0;
}

function parseMaxRows(input: string | undefined, fallback: number): number {
  if (input === undefined) return fallback;
  const value = Number(input);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--max-rows expects a non-negative integer, got "${input}"`);
  }
  return value;
}

function multiResultJson(result: MultiTableResult): Record<string, unknown> {
  return {
    tables: Object.fromEntries(result.tables),
    superseded: result.superseded,
    issues: result.issues,
    truncated: result.truncated,
  };
}

function tableRows(table: TableResult): string[][] {
  return [table.columns, ...table.records.map((record) => table.columns.map((column) => record[column] ?? ""))];
}

function describeIssue(issue: ParseIssue): string {
  const where = issue.table ? ` [${issue.table}]` : "";
  return `row ${issue.rowNumber} ${issue.kind}${where}: ${issue.message}`;
}

function reportIssues(issues: ParseIssue[], verbose: boolean): void {
  if (issues.length === 0) return;
  const counts = countIssues(issues);
  const parts = ISSUE_ORDER.filter((kind) => counts[kind] > 0).map((kind) => `${kind}=${counts[kind]}`);
  console.error(`issues: ${parts.join(" ")}`);
  if (!verbose) return;
  for (const issue of issues) {
    console.error(describeIssue(issue));
  }
}

function resolveNamedProfile(config: AppConfig, name: string): ReportProfile {
  const profile = config.profiles[name];
  if (!profile) {
    throw new Error(`unknown profile "${name}" (available: ${Object.keys(config.profiles).join(", ")})`);
  }
  return profile;
}

async function selectProfile(
  config: AppConfig,
  filePath: string,
  opts: { profile?: string; multi?: boolean; single?: boolean },
): Promise<ReportProfile> {
  if (opts.multi && opts.single) {
    throw new Error("--multi and --single cannot be combined");
  }
  const profile = opts.profile ? resolveNamedProfile(config, opts.profile) : await profileForFile(config, filePath);
  if (opts.multi) return { ...profile, layout: "multi" };
  if (opts.single) return { ...profile, layout: "single" };
  return profile;
}

interface ParseCommandOptions extends OverrideOptions {
  profile?: string;
  multi?: boolean;
  single?: boolean;
  table?: string;
  maxRows?: string;
  json?: boolean;
  jsonl?: boolean;
  llm?: boolean;
  verbose?: boolean;
}

function applyTableOverrides(profile: ReportProfile, title: string, overrides: TableOptions): ReportProfile {
  const existing = profile.tables[title] ?? {};
  return {
    ...profile,
    tables: {
      ...profile.tables,
      [title]: {
        ...existing,
        ...overrides,
        renameColumns: { ...existing.renameColumns, ...overrides.renameColumns },
        formatters: { ...existing.formatters, ...overrides.formatters },
        aggregate: { ...existing.aggregate, ...overrides.aggregate },
      },
    },
  };
}

function printParsed(parsed: ParsedReport, opts: ParseCommandOptions): void {
  if (opts.json) {
    const payload = parsed.layout === "single" ? parsed.result : multiResultJson(parsed.result);
    console.log(JSON.stringify({ layout: parsed.layout, ...payload }, null, 2));
    return;
  }

  if (opts.jsonl) {
    for (const table of tablesOf(parsed)) {
      for (const record of table.records) {
        console.log(JSON.stringify(parsed.layout === "single" ? record : { table: table.title, record }));
      }
    }
    return;
  }

  for (const table of tablesOf(parsed)) {
    printNamedTable(table.title ?? "table", tableRows(table), { llm: opts.llm === true });
  }
}

export function createProgram(): Command {
  const program = new Command();
  program.name("tracetab").description("Parse and normalize multi-table CSV reports from performance traces");
  program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
  program.addHelpText(
    "after",
    `
Examples:
  $ tracetab parse power_ppm.csv --json
  $ tracetab parse trace_processes.csv --llm
  $ tracetab parse export.csv --single --key Process --format Process=strip_identifier
  $ tracetab tables trace_processes.csv
  $ tracetab scan ./reports
`,
  );

  const configPath = (): string => program.opts<{ config: string }>().config;

  program
    .command("parse <file>")
    .description("Parse one report into records")
    .option("--profile <name>", "Report profile (default: matched by file name)")
    .option("--multi", "Treat the file as a multi-table report")
    .option("--single", "Treat the file as a single-table report")
    .option("--table <title>", "Table the column options apply to (multi-table reports)")
    .option("--rename <from=to>", "Rename a column (repeatable)", collect, [])
    .option("--key <column>", "Group by column (repeatable)", collect, [])
    .option("--format <column=format>", "Format a column: hex_bytes, strip_identifier, trim (repeatable)", collect, [])
    .option("--aggregate <column=reducer>", "Merge a column with last, first, sum, min, max (repeatable)", collect, [])
    .option("--max-rows <n>", "Stop after n delimited rows")
    .option("--json", "JSON output")
    .option("--jsonl", "Emit one record JSON per line")
    .option("--llm", "Deterministic table output for LLM agents")
    .option("--verbose", "Print every parse issue")
    .action(async (file: string, opts: ParseCommandOptions) => {
      const config = await loadConfig(configPath());
      let profile = await selectProfile(config, file, opts);
      const parse = { ...config.parse, maxRows: parseMaxRows(opts.maxRows, config.parse.maxRows) };
      const overrides = buildOverrides(opts);

      if (profile.layout === "multi" && hasOverrides(overrides)) {
        if (!opts.table) {
          throw new Error("column options on a multi-table report need --table <title>");
        }
        profile = applyTableOverrides(profile, opts.table, overrides);
      }

      const parsed = await parseReport(file, profile, parse, profile.layout === "single" ? overrides : {});
      printParsed(parsed, opts);
      reportIssues(issuesOf(parsed), opts.verbose === true);
      if (parsed.result.truncated) {
        console.error("output truncated: parse stopped before the end of the file");
      }
    });

  program
    .command("tables <file>")
    .description("List the tables of a multi-table report")
    .option("--profile <name>", "Report profile (default: matched by file name)")
    .option("--json", "JSON output")
    .option("--llm", "Deterministic table output for LLM agents")
    .action(async (file: string, opts: { profile?: string; json?: boolean; llm?: boolean }) => {
      const config = await loadConfig(configPath());
      const profile = await selectProfile(config, file, { profile: opts.profile });
      const result = await parseMultiTableFile(file, multiOptionsFor(profile, config.parse));
      const rows = Array.from(result.tables.values(), (table) => ({
        title: table.title ?? "",
        kind: classifyTable(table.columns),
        rows: table.rowCount,
        records: table.records.length,
        columns: table.columns,
      }));

      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      printNamedTable(
        "tables",
        [
          ["title", "kind", "rows", "records", "columns"],
          ...rows.map((row) => [row.title, row.kind, String(row.rows), String(row.records), row.columns.join(", ")]),
        ],
        { llm: opts.llm === true },
      );
      reportIssues(result.issues, false);
    });

  program
    .command("scan <dir>")
    .description("Discover and summarize every report under a directory")
    .option("--json", "JSON output")
    .option("--llm", "Deterministic table output for LLM agents")
    .action(async (dir: string, opts: { json?: boolean; llm?: boolean }) => {
      const config = await loadConfig(configPath());
      const summaries = await scanReports(config, dir);

      if (opts.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }
      const root = path.resolve(dir);
      printNamedTable(
        "reports",
        [
          ["file", "profile", "layout", "tables", "records", "issues", "error"],
          ...summaries.map((summary) => [
            path.relative(root, summary.report.path),
            summary.report.profile,
            summary.layout,
            String(summary.tables.length),
            String(summary.tables.reduce((acc, table) => acc + table.recordCount, 0)),
            String(Object.values(summary.issueCounts).reduce((acc, count) => acc + count, 0)),
            summary.parseError || "-",
          ]),
        ],
        { llm: opts.llm === true },
      );
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd.command("get").action(async () => {
    const config = await loadConfig(configPath());
    console.log(JSON.stringify(config, null, 2));
  });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const config = await loadConfig(configPath());
    const mutable: Record<string, unknown> = { ...structuredClone(config) };
    setPath(mutable, key, parseValue(value));
    await saveConfig(mergeConfig(mutable), configPath());
    console.log(`updated ${key}`);
  });

  return program;
}

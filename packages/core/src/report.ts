import { CsvError } from "csv-parse";
import type {
  AppConfig,
  DiscoveredReport,
  IssueKind,
  MultiTableOptions,
  MultiTableResult,
  ParseConfig,
  ParseIssue,
  ParseLimits,
  ReportProfile,
  ReportSummary,
  SingleTableOptions,
  TableOptions,
  TableResult,
} from "@tracetab/contracts";
import { discoverReports } from "./discovery.js";
import { ReportParseError } from "./errors.js";
import { parseMultiTableFile } from "./multiTable.js";
import { classifyTable } from "./profiles.js";
import { parseSingleTableFile } from "./singleTable.js";

export type ParsedReport =
  | { layout: "single"; result: TableResult }
  | { layout: "multi"; result: MultiTableResult };

function limitsFor(parse: ParseConfig, signal?: AbortSignal): ParseLimits | undefined {
  if (parse.maxRows <= 0 && !signal) return undefined;
  const limits: ParseLimits = {};
  if (parse.maxRows > 0) limits.maxRows = parse.maxRows;
  if (signal) limits.signal = signal;
  return limits;
}

export function singleOptionsFor(
  profile: ReportProfile,
  parse: ParseConfig,
  overrides: TableOptions = {},
  signal?: AbortSignal,
): SingleTableOptions {
  return {
    renameColumns: { ...profile.renameColumns, ...overrides.renameColumns },
    keyColumns: overrides.keyColumns && overrides.keyColumns.length > 0 ? overrides.keyColumns : profile.keyColumns,
    formatters: { ...profile.formatters, ...overrides.formatters },
    aggregate: { ...profile.aggregate, ...overrides.aggregate },
    malformedValue: parse.malformedValue,
    limits: limitsFor(parse, signal),
  };
}

export function multiOptionsFor(profile: ReportProfile, parse: ParseConfig, signal?: AbortSignal): MultiTableOptions {
  return {
    tables: profile.tables,
    malformedValue: parse.malformedValue,
    missingHeader: parse.missingHeader,
    untitledPrefix: parse.untitledPrefix,
    limits: limitsFor(parse, signal),
  };
}

export async function parseReport(
  filePath: string,
  profile: ReportProfile,
  parse: ParseConfig,
  overrides: TableOptions = {},
  signal?: AbortSignal,
): Promise<ParsedReport> {
  if (profile.layout === "single") {
    return { layout: "single", result: await parseSingleTableFile(filePath, singleOptionsFor(profile, parse, overrides, signal)) };
  }
  return { layout: "multi", result: await parseMultiTableFile(filePath, multiOptionsFor(profile, parse, signal)) };
}

export function tablesOf(parsed: ParsedReport): TableResult[] {
  return parsed.layout === "single" ? [parsed.result] : Array.from(parsed.result.tables.values());
}

export function issuesOf(parsed: ParsedReport): ParseIssue[] {
  return parsed.result.issues;
}

export function countIssues(issues: readonly ParseIssue[]): Record<IssueKind, number> {
  const counts: Record<IssueKind, number> = {
    malformed_row: 0,
    missing_header: 0,
    invalid_header: 0,
    malformed_value: 0,
    duplicate_title: 0,
  };
  for (const issue of issues) {
    counts[issue.kind] += 1;
  }
  return counts;
}

export function summarizeReport(report: DiscoveredReport, parsed: ParsedReport): ReportSummary {
  return {
    report,
    layout: parsed.layout,
    tables: tablesOf(parsed).map((table) => ({
      title: table.title ?? "",
      columns: table.columns,
      kind: classifyTable(table.columns),
      rowCount: table.rowCount,
      recordCount: table.records.length,
      malformedRows: table.malformedRows,
    })),
    issueCounts: countIssues(issuesOf(parsed)),
    parseError: "",
  };
}

/**
 * Parses every report under `root` with its assigned profile. Format errors
 * end up in `parseError` for that file; I/O errors propagate.
 */
export async function scanReports(config: AppConfig, root: string, signal?: AbortSignal): Promise<ReportSummary[]> {
  const reports = await discoverReports(config, root);
  const summaries: ReportSummary[] = [];

  for (const report of reports) {
    const profile = config.profiles[report.profile] ?? config.profiles[config.discovery.defaultProfile];
    if (!profile) {
      throw new Error(`no profile named "${report.profile}"`);
    }
    try {
      const parsed = await parseReport(report.path, profile, config.parse, {}, signal);
      summaries.push(summarizeReport(report, parsed));
    } catch (error) {
      if (!(error instanceof ReportParseError) && !(error instanceof CsvError)) throw error;
      summaries.push({
        report,
        layout: profile.layout,
        tables: [],
        issueCounts: countIssues([]),
        parseError: error.message,
      });
    }
  }

  return summaries;
}

export type ReportRecord = Record<string, string>;

export type ReportLayout = "single" | "multi";
export type ColumnFormat = "hex_bytes" | "strip_identifier" | "trim";
export type ReducerName = "last" | "first" | "sum" | "min" | "max";
export type MalformedValuePolicy = "keep_raw" | "skip_row" | "fail";
export type MissingHeaderPolicy = "skip" | "abort";
export type IssueKind =
  | "malformed_row"
  | "missing_header"
  | "invalid_header"
  | "malformed_value"
  | "duplicate_title";
export type TableKind = "clock_interrupts" | "process_lifetime" | "cpu_lifetime" | "unknown";

export interface TableSegment {
  title: string | null;
  header: string[];
  rows: string[][];
}

export interface ParseIssue {
  kind: IssueKind;
  /** 1-based ordinal of the delimited record that raised the issue. */
  rowNumber: number;
  message: string;
  table?: string;
  column?: string;
}

export interface TableOptions {
  renameColumns?: Record<string, string>;
  keyColumns?: string[];
  formatters?: Record<string, ColumnFormat>;
  aggregate?: Record<string, ReducerName>;
}

export interface ParseLimits {
  maxRows?: number;
  signal?: AbortSignal;
}

export interface SingleTableOptions extends TableOptions {
  malformedValue?: MalformedValuePolicy;
  limits?: ParseLimits;
}

export interface MultiTableOptions {
  tables?: Record<string, TableOptions>;
  malformedValue?: MalformedValuePolicy;
  missingHeader?: MissingHeaderPolicy;
  untitledPrefix?: string;
  limits?: ParseLimits;
}

export interface TableResult {
  title: string | null;
  columns: string[];
  records: ReportRecord[];
  rowCount: number;
  malformedRows: number;
  issues: ParseIssue[];
  truncated: boolean;
}

export interface MultiTableResult {
  tables: Map<string, TableResult>;
  superseded: TableResult[];
  issues: ParseIssue[];
  truncated: boolean;
}

export interface ReportProfile {
  name: string;
  layout: ReportLayout;
  match: string[];
  renameColumns: Record<string, string>;
  keyColumns: string[];
  formatters: Record<string, ColumnFormat>;
  aggregate: Record<string, ReducerName>;
  tables: Record<string, TableOptions>;
}

export interface ParseConfig {
  malformedValue: MalformedValuePolicy;
  missingHeader: MissingHeaderPolicy;
  untitledPrefix: string;
  /** 0 disables the limit. */
  maxRows: number;
}

export interface DiscoveryConfig {
  /** Profile for files that no profile's `match` globs claim. */
  defaultProfile: string;
  includeGlobs: string[];
  excludeGlobs: string[];
  maxDepth: number;
}

export interface AppConfig {
  parse: ParseConfig;
  discovery: DiscoveryConfig;
  profiles: Record<string, ReportProfile>;
}

export interface DiscoveredReport {
  id: string;
  path: string;
  profile: string;
  sizeBytes: number;
  mtimeMs: number;
}

export interface TableOverview {
  title: string;
  columns: string[];
  kind: TableKind;
  rowCount: number;
  recordCount: number;
  malformedRows: number;
}

export interface ReportSummary {
  report: DiscoveredReport;
  layout: ReportLayout;
  tables: TableOverview[];
  issueCounts: Record<IssueKind, number>;
  parseError: string;
}

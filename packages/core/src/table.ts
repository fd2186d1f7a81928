import type {
  ColumnFormat,
  MalformedValuePolicy,
  ParseIssue,
  ReportRecord,
  TableOptions,
  TableResult,
} from "@tracetab/contracts";
import { ColumnRenameError, MalformedValueError, UnknownColumnError } from "./errors.js";
import { applyColumnFormat } from "./formatters.js";
import { RowGrouper, resolveReducers } from "./grouping.js";
import { ownEntry } from "./utils.js";

export interface TableAccumulatorOptions extends TableOptions {
  malformedValue?: MalformedValuePolicy;
}

/** Applies a rename map to a header; two columns may never end up with the same name. */
export function renameColumns(header: readonly string[], renameMap: Record<string, string> = {}): string[] {
  const owners = new Map<string, string>();
  return header.map((source) => {
    const target = ownEntry(renameMap, source) ?? source;
    const owner = owners.get(target);
    if (owner !== undefined) {
      throw new ColumnRenameError(`columns "${owner}" and "${source}" both render as "${target}"`);
    }
    owners.set(target, source);
    return target;
  });
}

/**
 * Turns the body rows of one table into records: rename, per-column
 * formatting, then grouping. Rows whose width differs from the header are
 * counted and reported, never realigned.
 */
export class TableAccumulator {
  readonly title: string | null;
  readonly columns: string[];
  private readonly formats: Array<ColumnFormat | undefined>;
  private readonly grouper: RowGrouper;
  private readonly malformedValue: MalformedValuePolicy;
  private readonly issues: ParseIssue[] = [];
  private rowCount = 0;
  private malformedRows = 0;

  constructor(title: string | null, header: readonly string[], options: TableAccumulatorOptions = {}) {
    this.title = title;
    this.columns = renameColumns(header, options.renameColumns);
    const formatters = options.formatters ?? {};
    this.formats = this.columns.map((column) => ownEntry(formatters, column));
    this.malformedValue = options.malformedValue ?? "keep_raw";

    const keyColumns = options.keyColumns ?? [];
    for (const column of keyColumns) {
      if (!this.columns.includes(column)) {
        throw new UnknownColumnError(column, this.columns);
      }
    }
    this.grouper = new RowGrouper(keyColumns, resolveReducers(options.aggregate));
  }

  addRow(cells: readonly string[], rowNumber: number): boolean {
    this.rowCount += 1;
    if (cells.length !== this.columns.length) {
      this.malformedRows += 1;
      this.report("malformed_row", rowNumber, `expected ${this.columns.length} cells, found ${cells.length}`);
      return false;
    }

    const record: ReportRecord = {};
    for (const [index, column] of this.columns.entries()) {
      const raw = cells[index] ?? "";
      const format = this.formats[index];
      if (!format) {
        record[column] = raw;
        continue;
      }

      const outcome = applyColumnFormat(format, raw);
      if (outcome.ok) {
        record[column] = outcome.value;
        continue;
      }

      const message = `${format} failed for "${raw}": ${outcome.reason}`;
      if (this.malformedValue === "fail") {
        throw new MalformedValueError(message, rowNumber, column, raw);
      }
      if (this.malformedValue === "skip_row") {
        this.malformedRows += 1;
        this.report("malformed_value", rowNumber, `${message}; row skipped`, column);
        return false;
      }
      this.report("malformed_value", rowNumber, `${message}; raw value kept`, column);
      record[column] = raw;
    }

    this.grouper.add(record);
    return true;
  }

  finish(truncated = false): TableResult {
    return {
      title: this.title,
      columns: [...this.columns],
      records: this.grouper.records(),
      rowCount: this.rowCount,
      malformedRows: this.malformedRows,
      issues: [...this.issues],
      truncated,
    };
  }

  private report(kind: ParseIssue["kind"], rowNumber: number, message: string, column?: string): void {
    const issue: ParseIssue = { kind, rowNumber, message };
    if (this.title !== null) issue.table = this.title;
    if (column !== undefined) issue.column = column;
    this.issues.push(issue);
  }
}

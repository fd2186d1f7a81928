import type { MultiTableOptions, MultiTableResult, ParseIssue, TableResult } from "@tracetab/contracts";
import { type BoundaryEvent, TableBoundaryDetector } from "./boundaries.js";
import { ReportParseError } from "./errors.js";
import { readDelimitedRows, splitDelimitedText } from "./reader.js";
import { limitReached } from "./singleTable.js";
import { TableAccumulator } from "./table.js";
import { ownEntry } from "./utils.js";

export const DEFAULT_UNTITLED_PREFIX = "untitled_";

/**
 * Push-driven parse of a report holding any number of tables. Titleless
 * tables are named `<untitledPrefix><n>`. When two tables share a title the
 * later one wins; the earlier one is kept in `superseded` and reported.
 * A header the table options cannot apply to (repeated column, unknown key
 * column) drops that table with an `invalid_header` issue, unless
 * `missingHeader` is `abort`.
 */
export class MultiTableSession {
  private readonly options: MultiTableOptions;
  private readonly detector: TableBoundaryDetector;
  private readonly tables = new Map<string, TableResult>();
  private readonly superseded: TableResult[] = [];
  private readonly issues: ParseIssue[] = [];
  private current: TableAccumulator | null = null;
  private currentStartRow = 0;
  private untitledCount = 0;
  private rowNumber = 0;
  private truncated = false;

  constructor(options: MultiTableOptions = {}) {
    this.options = options;
    this.detector = new TableBoundaryDetector({ missingHeader: options.missingHeader });
  }

  push(cells: readonly string[]): boolean {
    if (limitReached(this.options.limits, this.rowNumber)) {
      this.truncated = true;
      return false;
    }
    this.rowNumber += 1;
    this.handle(this.detector.push(cells));
    return true;
  }

  finish(): MultiTableResult {
    if (this.truncated) {
      this.commit();
    } else {
      this.handle(this.detector.end());
    }

    const issues = [...this.issues];
    for (const table of [...this.superseded, ...this.tables.values()]) {
      issues.push(...table.issues);
    }
    issues.sort((a, b) => a.rowNumber - b.rowNumber);

    return {
      tables: new Map(this.tables),
      superseded: [...this.superseded],
      issues,
      truncated: this.truncated,
    };
  }

  private handle(events: BoundaryEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case "table_start": {
          const title = event.title ?? `${this.options.untitledPrefix ?? DEFAULT_UNTITLED_PREFIX}${++this.untitledCount}`;
          this.current = this.open(title, event.header, event.rowNumber);
          this.currentStartRow = event.rowNumber;
          break;
        }
        case "row":
          this.current?.addRow(event.cells, event.rowNumber);
          break;
        case "table_end":
          this.commit();
          break;
        case "issue":
          this.issues.push(event.issue);
          break;
      }
    }
  }

  // Rows of a table that could not be opened are dropped until its closing blank row.
  private open(title: string, header: string[], rowNumber: number): TableAccumulator | null {
    const tableOptions = ownEntry(this.options.tables ?? {}, title) ?? {};
    try {
      return new TableAccumulator(title, header, {
        ...tableOptions,
        malformedValue: this.options.malformedValue,
      });
    } catch (error) {
      if (!(error instanceof ReportParseError) || this.options.missingHeader === "abort") throw error;
      this.issues.push({ kind: "invalid_header", rowNumber, message: error.message, table: title });
      return null;
    }
  }

  private commit(): void {
    if (!this.current) return;
    const result = this.current.finish(this.truncated);
    const title = result.title ?? "";
    this.current = null;

    const previous = this.tables.get(title);
    if (previous) {
      this.superseded.push(previous);
      this.issues.push({
        kind: "duplicate_title",
        rowNumber: this.currentStartRow,
        message: `table "${title}" at row ${this.currentStartRow} replaces an earlier table with the same title`,
        table: title,
      });
      this.tables.delete(title);
    }
    this.tables.set(title, result);
  }
}

export function parseMultiTable(rows: Iterable<readonly string[]>, options: MultiTableOptions = {}): MultiTableResult {
  const session = new MultiTableSession(options);
  for (const row of rows) {
    if (!session.push(row)) break;
  }
  return session.finish();
}

export function parseMultiTableText(text: string, options: MultiTableOptions = {}): MultiTableResult {
  return parseMultiTable(splitDelimitedText(text), options);
}

export async function parseMultiTableFile(filePath: string, options: MultiTableOptions = {}): Promise<MultiTableResult> {
  const session = new MultiTableSession(options);
  for await (const row of readDelimitedRows(filePath)) {
    if (!session.push(row)) break;
  }
  return session.finish();
}

import type { MissingHeaderPolicy, ParseIssue, TableSegment } from "@tracetab/contracts";
import { MissingHeaderError } from "./errors.js";
import { isBlankRow, isTitleRow, looksLikeHeader } from "./headers.js";

export type DetectorState = "seeking_title" | "seeking_header" | "in_body" | "discarding";

export type BoundaryEvent =
  | { type: "table_start"; title: string | null; header: string[]; rowNumber: number }
  | { type: "row"; cells: string[]; rowNumber: number }
  | { type: "table_end"; rowNumber: number }
  | { type: "issue"; issue: ParseIssue };

export interface BoundaryDetectorOptions {
  missingHeader?: MissingHeaderPolicy;
}

/**
 * Splits a stream of delimited rows into title/header/body segments.
 *
 * - seeking_title: blanks are skipped; a single-cell row becomes the pending
 *   title; a multi-cell row that looks like a header opens a titleless table;
 *   any other row is reported as a missing header and its block discarded.
 * - seeking_header: blanks are skipped; a header row opens the table.
 *   Otherwise the pending title is reported as missing its header, and the
 *   offending row either replaces the pending title (single cell) or starts
 *   a discarded block.
 * - in_body: rows are body rows until a blank row or the end of input.
 * - discarding: rows are dropped until the next blank row.
 *
 * A pending title left at the end of input is reported as well.
 */
export class TableBoundaryDetector {
  private current: DetectorState = "seeking_title";
  private pendingTitle: string | null = null;
  private pendingTitleRow = 0;
  private rowNumber = 0;
  private readonly missingHeader: MissingHeaderPolicy;

  constructor(options: BoundaryDetectorOptions = {}) {
    this.missingHeader = options.missingHeader ?? "skip";
  }

  get state(): DetectorState {
    return this.current;
  }

  push(cells: readonly string[]): BoundaryEvent[] {
    this.rowNumber += 1;
    const events: BoundaryEvent[] = [];
    const blank = isBlankRow(cells);

    switch (this.current) {
      case "seeking_title":
        if (blank) break;
        if (isTitleRow(cells)) {
          this.pendingTitle = (cells[0] ?? "").trim();
          this.pendingTitleRow = this.rowNumber;
          this.current = "seeking_header";
          break;
        }
        if (looksLikeHeader(cells)) {
          this.openTable(null, cells, events);
          break;
        }
        this.reportMissingHeader(null, this.rowNumber, `row ${this.rowNumber} starts a table without a header`, events);
        this.current = "discarding";
        break;

      case "seeking_header":
        if (blank) break;
        if (looksLikeHeader(cells)) {
          this.openTable(this.pendingTitle, cells, events);
          break;
        }
        this.reportMissingHeader(
          this.pendingTitle,
          this.rowNumber,
          `table "${this.pendingTitle ?? ""}" (row ${this.pendingTitleRow}) has no header; row ${this.rowNumber} is not a header`,
          events,
        );
        if (isTitleRow(cells)) {
          this.pendingTitle = (cells[0] ?? "").trim();
          this.pendingTitleRow = this.rowNumber;
          break;
        }
        this.pendingTitle = null;
        this.current = "discarding";
        break;

      case "in_body":
        if (blank) {
          events.push({ type: "table_end", rowNumber: this.rowNumber });
          this.current = "seeking_title";
          break;
        }
        events.push({ type: "row", cells: [...cells], rowNumber: this.rowNumber });
        break;

      case "discarding":
        if (blank) this.current = "seeking_title";
        break;
    }

    return events;
  }

  end(): BoundaryEvent[] {
    const events: BoundaryEvent[] = [];
    if (this.current === "in_body") {
      events.push({ type: "table_end", rowNumber: this.rowNumber });
    } else if (this.current === "seeking_header") {
      this.reportMissingHeader(
        this.pendingTitle,
        this.pendingTitleRow,
        `table "${this.pendingTitle ?? ""}" (row ${this.pendingTitleRow}) ended before a header`,
        events,
      );
    }
    this.current = "seeking_title";
    this.pendingTitle = null;
    return events;
  }

  private openTable(title: string | null, cells: readonly string[], events: BoundaryEvent[]): void {
    events.push({
      type: "table_start",
      title,
      header: cells.map((cell) => cell.trim()),
      rowNumber: this.rowNumber,
    });
    this.pendingTitle = null;
    this.current = "in_body";
  }

  private reportMissingHeader(
    title: string | null,
    rowNumber: number,
    message: string,
    events: BoundaryEvent[],
  ): void {
    if (this.missingHeader === "abort") {
      throw new MissingHeaderError(message, rowNumber, title);
    }
    const issue: ParseIssue = { kind: "missing_header", rowNumber, message };
    if (title !== null) issue.table = title;
    events.push({ type: "issue", issue });
  }
}

export interface CollectedSegments {
  segments: TableSegment[];
  issues: ParseIssue[];
}

/** Materializes every segment; body rows whose width differs from the header are dropped and reported. */
export function collectSegments(rows: Iterable<readonly string[]>, options: BoundaryDetectorOptions = {}): CollectedSegments {
  const detector = new TableBoundaryDetector(options);
  const segments: TableSegment[] = [];
  const issues: ParseIssue[] = [];
  let open: TableSegment | null = null;

  const apply = (events: BoundaryEvent[]): void => {
    for (const event of events) {
      if (event.type === "table_start") {
        open = { title: event.title, header: event.header, rows: [] };
        segments.push(open);
      } else if (event.type === "row" && open) {
        if (event.cells.length === open.header.length) {
          open.rows.push(event.cells);
        } else {
          const issue: ParseIssue = {
            kind: "malformed_row",
            rowNumber: event.rowNumber,
            message: `expected ${open.header.length} cells, found ${event.cells.length}`,
          };
          if (open.title !== null) issue.table = open.title;
          issues.push(issue);
        }
      } else if (event.type === "table_end") {
        open = null;
      } else if (event.type === "issue") {
        issues.push(event.issue);
      }
    }
  };

  for (const row of rows) {
    apply(detector.push(row));
  }
  apply(detector.end());
  return { segments, issues };
}

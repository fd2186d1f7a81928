import type { ColumnFormat, ParseLimits, SingleTableOptions, TableResult } from "@tracetab/contracts";
import { MissingHeaderError } from "./errors.js";
import { isBlankRow, isTitleRow, looksLikeHeader } from "./headers.js";
import { readDelimitedRows, splitDelimitedText } from "./reader.js";
import { TableAccumulator } from "./table.js";

export const PROCESS_COLUMN = "Process";

const DEFAULT_FORMATTERS: Record<string, ColumnFormat> = {
  [PROCESS_COLUMN]: "strip_identifier",
};

export function limitReached(limits: ParseLimits | undefined, rowsRead: number): boolean {
  if (!limits) return false;
  if (limits.signal?.aborted) return true;
  return limits.maxRows !== undefined && limits.maxRows > 0 && rowsRead >= limits.maxRows;
}

/**
 * Push-driven parse of a report holding one table: an optional single-cell
 * title, the header, then body rows. Blank rows are ignored.
 */
export class SingleTableSession {
  private readonly options: SingleTableOptions;
  private table: TableAccumulator | null = null;
  private title: string | null = null;
  private rowNumber = 0;
  private truncated = false;

  constructor(options: SingleTableOptions = {}) {
    this.options = options;
  }

  /** Returns false once the caller's limits stop the parse. */
  push(cells: readonly string[]): boolean {
    if (limitReached(this.options.limits, this.rowNumber)) {
      this.truncated = true;
      return false;
    }
    this.rowNumber += 1;
    if (isBlankRow(cells)) return true;

    if (this.table) {
      this.table.addRow(cells, this.rowNumber);
      return true;
    }

    if (this.title === null && isTitleRow(cells)) {
      this.title = (cells[0] ?? "").trim();
      return true;
    }
    if (!looksLikeHeader(cells)) {
      throw new MissingHeaderError(`row ${this.rowNumber} is not a header row`, this.rowNumber, this.title);
    }

    this.table = new TableAccumulator(
      this.title,
      cells.map((cell) => cell.trim()),
      {
        ...this.options,
        formatters: { ...DEFAULT_FORMATTERS, ...this.options.formatters },
      },
    );
    return true;
  }

  finish(): TableResult {
    if (!this.table) {
      throw new MissingHeaderError("report ended before a header row", this.rowNumber, this.title);
    }
    return this.table.finish(this.truncated);
  }
}

export function parseSingleTable(rows: Iterable<readonly string[]>, options: SingleTableOptions = {}): TableResult {
  const session = new SingleTableSession(options);
  for (const row of rows) {
    if (!session.push(row)) break;
  }
  return session.finish();
}

export function parseSingleTableText(text: string, options: SingleTableOptions = {}): TableResult {
  return parseSingleTable(splitDelimitedText(text), options);
}

export async function parseSingleTableFile(filePath: string, options: SingleTableOptions = {}): Promise<TableResult> {
  const session = new SingleTableSession(options);
  for await (const row of readDelimitedRows(filePath)) {
    if (!session.push(row)) break;
  }
  return session.finish();
}

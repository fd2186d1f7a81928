export type ReportParseErrorCode = "missing_header" | "malformed_value" | "column_rename" | "unknown_column";

export class ReportParseError extends Error {
  readonly code: ReportParseErrorCode;
  readonly rowNumber: number;

  constructor(code: ReportParseErrorCode, message: string, rowNumber = 0) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.rowNumber = rowNumber;
  }
}

export class MissingHeaderError extends ReportParseError {
  readonly title: string | null;

  constructor(message: string, rowNumber: number, title: string | null = null) {
    super("missing_header", message, rowNumber);
    this.title = title;
  }
}

export class MalformedValueError extends ReportParseError {
  readonly column: string;
  readonly value: string;

  constructor(message: string, rowNumber: number, column: string, value: string) {
    super("malformed_value", message, rowNumber);
    this.column = column;
    this.value = value;
  }
}

export class ColumnRenameError extends ReportParseError {
  constructor(message: string) {
    super("column_rename", message);
  }
}

export class UnknownColumnError extends ReportParseError {
  readonly column: string;

  constructor(column: string, available: string[]) {
    super("unknown_column", `unknown column "${column}" (available: ${available.join(", ") || "none"})`);
    this.column = column;
  }
}

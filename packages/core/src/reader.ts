import { createReadStream } from "node:fs";
import { parse, type Options } from "csv-parse";
import { parse as parseSync } from "csv-parse/sync";

// Empty lines are kept: they are the only separator between tables.
const DELIMITED_OPTIONS: Options = {
  bom: true,
  delimiter: ",",
  relax_column_count: true,
  relax_quotes: true,
  skip_empty_lines: false,
  trim: false,
};

function toCells(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((cell: unknown) => (typeof cell === "string" ? cell : String(cell ?? "")));
}

/** Streams a delimited file record by record; quoted fields may hold commas and newlines. */
export async function* readDelimitedRows(filePath: string): AsyncGenerator<string[]> {
  const source = createReadStream(filePath);
  const parser = parse(DELIMITED_OPTIONS);
  source.on("error", (error) => parser.destroy(error));
  source.pipe(parser);
  try {
    for await (const record of parser) {
      yield toCells(record);
    }
  } finally {
    source.destroy();
  }
}

export function splitDelimitedText(text: string): string[][] {
  const records: unknown = parseSync(text, DELIMITED_OPTIONS);
  return Array.isArray(records) ? records.map(toCells) : [];
}

import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { readDelimitedRows, splitDelimitedText } from "./reader.js";

describe("splitDelimitedText", () => {
  it("keeps empty lines as blank rows", () => {
    expect(splitDelimitedText("Title\nA,B\n1,2\n\nC,D\n")).toEqual([["Title"], ["A", "B"], ["1", "2"], [""], ["C", "D"]]);
  });

  it("keeps newlines inside quoted fields", () => {
    expect(splitDelimitedText('A,B\n"multi\nline",2\n')).toEqual([
      ["A", "B"],
      ["multi\nline", "2"],
    ]);
  });
});

describe("readDelimitedRows", () => {
  it("streams the rows of a file", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "tracetab-reader-"));
    const filePath = path.join(root, "report.csv");
    await writeFile(filePath, 'Process,CPU\r\n"a.exe (1)",0\r\n\r\n', "utf8");

    const rows: string[][] = [];
    for await (const row of readDelimitedRows(filePath)) {
      rows.push(row);
    }
    expect(rows).toEqual([["Process", "CPU"], ["a.exe (1)", "0"], [""]]);
  });

  it("rejects when the file cannot be read", async () => {
    const missing = path.join(os.tmpdir(), "tracetab-reader-missing", "nope.csv");
    const consume = async (): Promise<number> => {
      let count = 0;
      for await (const _row of readDelimitedRows(missing)) {
        count += 1;
      }
      return count;
    };
    await expect(consume()).rejects.toMatchObject({ code: "ENOENT" });
  });
});

import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "./program.js";

const PROCESS_REPORT = [
  "Clock Interrupts",
  "CPU,Number of Clock Interrupts",
  '0,"1,200"',
  "1,300",
  "0,50",
  "",
  "Process Lifetime",
  "Process,Start,End",
  "chrome.exe (1234),0.5,9.0",
  "chrome.exe (5678),1.0,8.0",
  "svc,2.0",
  "",
  "CPU Lifetime",
  "CPU,Busy",
  "0,90",
  "",
].join("\n");

interface Fixture {
  root: string;
  configPath: string;
  processes: string;
  ppm: string;
  custom: string;
}

async function buildFixture(): Promise<Fixture> {
  const root = await mkdtemp(path.join(os.tmpdir(), "tracetab-cli-"));
  const processes = path.join(root, "trace_processes.csv");
  const ppm = path.join(root, "power_ppm.csv");
  const custom = path.join(root, "custom.csv");
  await writeFile(processes, PROCESS_REPORT, "utf8");
  await writeFile(ppm, "Profile,Setting,Value\nBalanced,MinPerf,00000004 e8 03 00 00\n", "utf8");
  await writeFile(custom, "Process,CPU\na.exe (1),1\na.exe (2),2\n", "utf8");
  return { root, configPath: path.join(root, "config", "config.toml"), processes, ppm, custom };
}

let logLines: string[] = [];
let errorLines: string[] = [];

beforeEach(() => {
  logLines = [];
  errorLines = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logLines.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    errorLines.push(args.map(String).join(" "));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function runCli(fixture: Fixture, args: string[]): Promise<void> {
  await createProgram().parseAsync(["--config", fixture.configPath, ...args], { from: "user" });
}

describe("cli", () => {
  it("prints a single-table report as JSON", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["parse", fixture.ppm, "--json"]);

    expect(logLines).toHaveLength(1);
    const output = JSON.parse(logLines[0] ?? "{}") as { layout: string; records: unknown[]; truncated: boolean };
    expect(output.layout).toBe("single");
    expect(output.records).toEqual([{ Profile: "Balanced", Setting: "MinPerf", Value: "0x000003e8" }]);
    expect(output.truncated).toBe(false);
    expect(errorLines).toEqual([]);
  });

  it("prints each table of a multi-table report and summarizes issues", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["parse", fixture.processes]);

    expect(logLines.slice(0, 5)).toEqual([
      "\nClock Interrupts:",
      "CPU | Number of Clock Interrupts",
      `---${"-+-"}${"-".repeat(26)}`,
      "0     1250",
      "1     300",
    ]);
    expect(errorLines).toEqual(["issues: malformed_row=1"]);
  });

  it("lists every issue with --verbose", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["parse", fixture.processes, "--json", "--verbose"]);

    expect(errorLines).toEqual([
      "issues: malformed_row=1",
      "row 11 malformed_row [Process Lifetime]: expected 3 cells, found 2",
    ]);
  });

  it("applies column options from flags to a single-table report", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["parse", fixture.custom, "--single", "--key", "Process", "--jsonl"]);

    expect(logLines).toEqual(['{"Process":"a.exe","CPU":"2"}']);
  });

  it("applies column options to one table of a multi-table report", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["parse", fixture.processes, "--table", "CPU Lifetime", "--rename", "Busy=Load", "--jsonl"]);

    expect(logLines).toHaveLength(4);
    expect(logLines[3]).toBe('{"table":"CPU Lifetime","record":{"CPU":"0","Load":"90"}}');
  });

  it("requires --table for column options on a multi-table report", async () => {
    const fixture = await buildFixture();
    await expect(runCli(fixture, ["parse", fixture.processes, "--key", "CPU"])).rejects.toThrow(
      "column options on a multi-table report need --table <title>",
    );
  });

  it("rejects unknown formats and reducers", async () => {
    const fixture = await buildFixture();
    await expect(runCli(fixture, ["parse", fixture.custom, "--single", "--format", "CPU=upper"])).rejects.toThrow(
      'unknown format "upper" (expected hex_bytes, strip_identifier or trim)',
    );
    await expect(runCli(fixture, ["parse", fixture.custom, "--single", "--aggregate", "CPU"])).rejects.toThrow(
      '--aggregate expects <column>=<value>, got "CPU"',
    );
  });

  it("reports truncation from --max-rows", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["parse", fixture.processes, "--max-rows", "3", "--jsonl"]);

    expect(logLines).toEqual(['{"table":"Clock Interrupts","record":{"CPU":"0","Number of Clock Interrupts":"1,200"}}']);
    expect(errorLines).toEqual(["output truncated: parse stopped before the end of the file"]);
  });

  it("lists tables with their kinds", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["tables", fixture.processes, "--json"]);

    expect(JSON.parse(logLines[0] ?? "[]")).toEqual([
      { title: "Clock Interrupts", kind: "clock_interrupts", rows: 3, records: 2, columns: ["CPU", "Number of Clock Interrupts"] },
      { title: "Process Lifetime", kind: "process_lifetime", rows: 3, records: 1, columns: ["Process", "Start", "End"] },
      { title: "CPU Lifetime", kind: "cpu_lifetime", rows: 1, records: 1, columns: ["CPU", "Busy"] },
    ]);
  });

  it("scans a directory", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["scan", fixture.root, "--json"]);

    const summaries = JSON.parse(logLines[0] ?? "[]") as Array<{ report: { path: string; profile: string } }>;
    expect(summaries.map((summary) => [path.basename(summary.report.path), summary.report.profile]).sort()).toEqual([
      ["custom.csv", "generic_multi"],
      ["power_ppm.csv", "ppm"],
      ["trace_processes.csv", "processes"],
    ]);
  });

  it("updates and reads config values", async () => {
    const fixture = await buildFixture();
    await runCli(fixture, ["config", "set", "parse.maxRows", "100"]);
    expect(logLines).toEqual(["updated parse.maxRows"]);

    logLines = [];
    await runCli(fixture, ["config", "get"]);
    const config = JSON.parse(logLines[0] ?? "{}") as { parse: { maxRows: number } };
    expect(config.parse.maxRows).toBe(100);
  });

  it("shows usage", () => {
    const help = createProgram().helpInformation();
    expect(help).toContain("Usage: tracetab");
    expect(help).toContain("--config <path>");
  });
});

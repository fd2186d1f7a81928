import type { AppConfig, ReportProfile, TableKind } from "@tracetab/contracts";

export const DEFAULT_PROFILES: Record<string, ReportProfile> = {
  ppm: {
    name: "ppm",
    layout: "single",
    match: ["*ppm*.csv"],
    renameColumns: {},
    keyColumns: ["Profile", "Setting"],
    formatters: { Value: "hex_bytes" },
    aggregate: {},
    tables: {},
  },
  processes: {
    name: "processes",
    layout: "multi",
    match: ["*process*.csv"],
    renameColumns: {},
    keyColumns: [],
    formatters: {},
    aggregate: {},
    tables: {
      "Clock Interrupts": {
        keyColumns: ["CPU"],
        aggregate: { "Number of Clock Interrupts": "sum" },
      },
      "Process Lifetime": {
        keyColumns: ["Process"],
        formatters: { Process: "strip_identifier" },
      },
      "CPU Lifetime": {
        keyColumns: ["CPU"],
      },
    },
  },
  generic_single: {
    name: "generic_single",
    layout: "single",
    match: [],
    renameColumns: {},
    keyColumns: [],
    formatters: {},
    aggregate: {},
    tables: {},
  },
  generic_multi: {
    name: "generic_multi",
    layout: "multi",
    match: [],
    renameColumns: {},
    keyColumns: [],
    formatters: {},
    aggregate: {},
    tables: {},
  },
};

export const DEFAULT_CONFIG: AppConfig = {
  parse: {
    malformedValue: "keep_raw",
    missingHeader: "skip",
    untitledPrefix: "untitled_",
    maxRows: 0,
  },
  discovery: {
    defaultProfile: "generic_multi",
    includeGlobs: ["**/*.csv"],
    excludeGlobs: [],
    maxDepth: 4,
  },
  profiles: DEFAULT_PROFILES,
};

export function classifyTable(columns: readonly string[]): TableKind {
  const names = new Set(columns);
  if (names.has("Number of Clock Interrupts")) return "clock_interrupts";
  if (names.has("Process")) return "process_lifetime";
  if (names.has("CPU")) return "cpu_lifetime";
  return "unknown";
}

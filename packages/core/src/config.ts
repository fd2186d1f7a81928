import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  ColumnFormat,
  DiscoveryConfig,
  ParseConfig,
  ReducerName,
  ReportProfile,
  TableOptions,
} from "@tracetab/contracts";
import { isColumnFormat } from "./formatters.js";
import { isReducerName } from "./grouping.js";
import { DEFAULT_CONFIG, DEFAULT_PROFILES } from "./profiles.js";
import { asRecord, asStringList } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".tracetab", "config.toml");

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

function normalizeStringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(asRecord(value))) {
    if (typeof entry !== "string") continue;
    const target = entry.trim();
    if (key.trim() && target) out[key] = target;
  }
  return out;
}

function normalizeFormatters(value: unknown): Record<string, ColumnFormat> {
  const out: Record<string, ColumnFormat> = {};
  for (const [column, format] of Object.entries(normalizeStringMap(value))) {
    const lowered = format.toLowerCase();
    if (isColumnFormat(lowered)) out[column] = lowered;
  }
  return out;
}

function normalizeAggregate(value: unknown): Record<string, ReducerName> {
  const out: Record<string, ReducerName> = {};
  for (const [column, reducer] of Object.entries(normalizeStringMap(value))) {
    const lowered = reducer.toLowerCase();
    if (isReducerName(lowered)) out[column] = lowered;
  }
  return out;
}

function normalizeTableOptions(value: unknown): TableOptions {
  const record = asRecord(value);
  const options: TableOptions = {};
  const renameColumns = normalizeStringMap(record.renameColumns);
  const keyColumns = asStringList(record.keyColumns);
  const formatters = normalizeFormatters(record.formatters);
  const aggregate = normalizeAggregate(record.aggregate);
  if (Object.keys(renameColumns).length > 0) options.renameColumns = renameColumns;
  if (keyColumns.length > 0) options.keyColumns = keyColumns;
  if (Object.keys(formatters).length > 0) options.formatters = formatters;
  if (Object.keys(aggregate).length > 0) options.aggregate = aggregate;
  return options;
}

function mergeProfile(name: string, defaults: ReportProfile | undefined, input: unknown): ReportProfile {
  const record = asRecord(input);
  const layoutRaw = record.layout;
  const layout = layoutRaw === "single" || layoutRaw === "multi" ? layoutRaw : (defaults?.layout ?? "multi");

  const tables: Record<string, TableOptions> = { ...(defaults?.tables ?? {}) };
  for (const [title, options] of Object.entries(asRecord(record.tables))) {
    tables[title] = normalizeTableOptions(options);
  }

  return {
    name,
    layout,
    match: Array.isArray(record.match) ? asStringList(record.match) : (defaults?.match ?? []),
    renameColumns: record.renameColumns !== undefined ? normalizeStringMap(record.renameColumns) : { ...defaults?.renameColumns },
    keyColumns: Array.isArray(record.keyColumns) ? asStringList(record.keyColumns) : [...(defaults?.keyColumns ?? [])],
    formatters: record.formatters !== undefined ? normalizeFormatters(record.formatters) : { ...defaults?.formatters },
    aggregate: record.aggregate !== undefined ? normalizeAggregate(record.aggregate) : { ...defaults?.aggregate },
    tables,
  };
}

function mergeProfiles(input: unknown): Record<string, ReportProfile> {
  const profiles: Record<string, ReportProfile> = {};
  const inputProfiles = asRecord(input);

  for (const [name, defaults] of Object.entries(DEFAULT_PROFILES)) {
    profiles[name] = mergeProfile(name, defaults, inputProfiles[name]);
  }
  for (const [name, profile] of Object.entries(inputProfiles)) {
    if (!Object.hasOwn(DEFAULT_PROFILES, name) && name.trim()) {
      profiles[name] = mergeProfile(name, undefined, profile);
    }
  }
  return profiles;
}

function mergeParse(input: unknown): ParseConfig {
  const defaults = DEFAULT_CONFIG.parse;
  const record = asRecord(input);
  const malformedValue = record.malformedValue;
  return {
    malformedValue:
      malformedValue === "keep_raw" || malformedValue === "skip_row" || malformedValue === "fail"
        ? malformedValue
        : defaults.malformedValue,
    missingHeader: record.missingHeader === "abort" || record.missingHeader === "skip" ? record.missingHeader : defaults.missingHeader,
    untitledPrefix: nonEmptyStringOrDefault(record.untitledPrefix, defaults.untitledPrefix),
    maxRows: nonNegativeIntOrDefault(record.maxRows, defaults.maxRows),
  };
}

function mergeDiscovery(input: unknown, profiles: Record<string, ReportProfile>): DiscoveryConfig {
  const defaults = DEFAULT_CONFIG.discovery;
  const record = asRecord(input);
  const requestedProfile = nonEmptyStringOrDefault(record.defaultProfile, defaults.defaultProfile);
  const includeGlobs = asStringList(record.includeGlobs);
  return {
    defaultProfile: Object.hasOwn(profiles, requestedProfile) ? requestedProfile : defaults.defaultProfile,
    includeGlobs: includeGlobs.length > 0 ? includeGlobs : [...defaults.includeGlobs],
    excludeGlobs: Array.isArray(record.excludeGlobs) ? asStringList(record.excludeGlobs) : [...defaults.excludeGlobs],
    maxDepth: positiveIntOrDefault(record.maxDepth, defaults.maxDepth),
  };
}

export function mergeConfig(input?: unknown): AppConfig {
  const record = asRecord(input);
  const profiles = mergeProfiles(record.profiles);
  return {
    parse: mergeParse(record.parse),
    discovery: mergeDiscovery(record.discovery, profiles),
    profiles,
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  return mergeConfig(TOML.parse(raw));
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}

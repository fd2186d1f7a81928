import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { AppConfig, DiscoveredReport, ReportProfile } from "@tracetab/contracts";
import { expandHome, isMissingFileError, stableId } from "./utils.js";

function globOptions(config: AppConfig, root: string): fg.Options {
  return {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false,
    deep: config.discovery.maxDepth,
    suppressErrors: true,
    ignore: config.discovery.excludeGlobs,
    unique: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
  };
}

// Bare file-name globs apply at any depth.
function anyDepth(pattern: string): string {
  return pattern.includes("/") ? pattern : `**/${pattern}`;
}

/**
 * Lists report files under `rootRaw`. Each file gets the first profile (in
 * config order) whose `match` globs fit it, else `discovery.defaultProfile`.
 * Newest first.
 */
export async function discoverReports(config: AppConfig, rootRaw: string): Promise<DiscoveredReport[]> {
  const root = path.resolve(expandHome(rootRaw));
  const options = globOptions(config, root);
  const candidates = await fg(config.discovery.includeGlobs, options);
  const included = new Set(candidates.map((filePath) => path.resolve(filePath)));

  const assigned = new Map<string, string>();
  for (const profile of Object.values(config.profiles)) {
    if (profile.match.length === 0) continue;
    const matches = await fg(profile.match.map(anyDepth), options);
    for (const filePath of matches) {
      const resolved = path.resolve(filePath);
      if (included.has(resolved) && !assigned.has(resolved)) {
        assigned.set(resolved, profile.name);
      }
    }
  }

  const reports: DiscoveredReport[] = [];
  for (const filePath of included) {
    try {
      const fileStat = await stat(filePath);
      reports.push({
        id: stableId([filePath, String(fileStat.dev), String(fileStat.ino)]),
        path: filePath,
        profile: assigned.get(filePath) ?? config.discovery.defaultProfile,
        sizeBytes: fileStat.size,
        mtimeMs: fileStat.mtimeMs,
      });
    } catch (error) {
      if (isMissingFileError(error)) continue;
      throw error;
    }
  }

  reports.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return reports;
}

/** Picks the profile for a single file the same way `discoverReports` does. */
export async function profileForFile(config: AppConfig, filePathRaw: string): Promise<ReportProfile> {
  const filePath = path.resolve(expandHome(filePathRaw));
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);

  for (const profile of Object.values(config.profiles)) {
    const patterns = profile.match.filter((pattern) => !pattern.includes("/"));
    if (patterns.length === 0) continue;
    const matches = await fg(patterns, { cwd: dir, onlyFiles: true, deep: 1, caseSensitiveMatch: false });
    if (matches.includes(base)) return profile;
  }

  const fallback = config.profiles[config.discovery.defaultProfile];
  if (!fallback) {
    throw new Error(`no profile named "${config.discovery.defaultProfile}"`);
  }
  return fallback;
}

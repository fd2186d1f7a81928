import type { ReducerName, ReportRecord } from "@tracetab/contracts";
import { ownEntry } from "./utils.js";

export type ColumnReducer = (previous: string, next: string) => string;

function toNumber(value: string): number | null {
  const trimmed = value.trim().replace(/,/g, "");
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function numericReducer(combine: (a: number, b: number) => number): ColumnReducer {
  return (previous, next) => {
    const a = toNumber(previous);
    const b = toNumber(next);
    if (a === null || b === null) return next;
    return String(combine(a, b));
  };
}

function decimalPlaces(value: string): number | null {
  const trimmed = value.trim().replace(/,/g, "");
  if (/[eE]/.test(trimmed)) return null;
  const dot = trimmed.indexOf(".");
  return dot === -1 ? 0 : trimmed.length - dot - 1;
}

// Sums are rounded to the finer of the two inputs' decimal places.
const sumReducer: ColumnReducer = (previous, next) => {
  const a = toNumber(previous);
  const b = toNumber(next);
  if (a === null || b === null) return next;
  const total = a + b;
  const placesA = decimalPlaces(previous);
  const placesB = decimalPlaces(next);
  if (placesA === null || placesB === null) return String(total);
  return String(Number(total.toFixed(Math.max(placesA, placesB))));
};

export const REDUCERS: Record<ReducerName, ColumnReducer> = {
  last: (_previous, next) => next,
  first: (previous) => previous,
  sum: sumReducer,
  min: numericReducer((a, b) => Math.min(a, b)),
  max: numericReducer((a, b) => Math.max(a, b)),
};

export function isReducerName(value: string): value is ReducerName {
  return value === "last" || value === "first" || value === "sum" || value === "min" || value === "max";
}

export function resolveReducers(names: Record<string, ReducerName> = {}): Record<string, ColumnReducer> {
  const out: Record<string, ColumnReducer> = {};
  for (const [column, name] of Object.entries(names)) {
    out[column] = REDUCERS[name];
  }
  return out;
}

export function groupKey(record: ReportRecord, keyColumns: readonly string[]): string {
  return JSON.stringify(keyColumns.map((column) => ownEntry(record, column) ?? null));
}

/**
 * Incremental group-by. Non-key columns of a repeated key are merged into the
 * first-seen group (last write wins unless a reducer is given), and groups
 * keep the order in which their key first appeared. State grows with the
 * number of distinct keys only.
 */
export class RowGrouper {
  private readonly keyColumns: string[];
  private readonly keySet: Set<string>;
  private readonly reducers: Record<string, ColumnReducer>;
  private readonly groups = new Map<string, ReportRecord>();
  private readonly passthrough: ReportRecord[] = [];

  constructor(keyColumns: readonly string[], reducers: Record<string, ColumnReducer> = {}) {
    this.keyColumns = [...keyColumns];
    this.keySet = new Set(keyColumns);
    this.reducers = reducers;
  }

  get size(): number {
    return this.keyColumns.length === 0 ? this.passthrough.length : this.groups.size;
  }

  add(record: ReportRecord): void {
    if (this.keyColumns.length === 0) {
      this.passthrough.push(record);
      return;
    }

    const key = groupKey(record, this.keyColumns);
    const existing = this.groups.get(key);
    if (!existing) {
      this.groups.set(key, { ...record });
      return;
    }

    for (const [column, value] of Object.entries(record)) {
      if (this.keySet.has(column)) continue;
      const previous = ownEntry(existing, column);
      const reducer = ownEntry(this.reducers, column);
      existing[column] = previous !== undefined && reducer ? reducer(previous, value) : value;
    }
  }

  records(): ReportRecord[] {
    if (this.keyColumns.length === 0) return [...this.passthrough];
    return Array.from(this.groups.values(), (record) => ({ ...record }));
  }
}

export function groupRecords(
  records: Iterable<ReportRecord>,
  keyColumns: readonly string[],
  reducers: Record<string, ColumnReducer> = {},
): ReportRecord[] {
  const grouper = new RowGrouper(keyColumns, reducers);
  for (const record of records) {
    grouper.add(record);
  }
  return grouper.records();
}

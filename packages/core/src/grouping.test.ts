import { describe, expect, it } from "vitest";
import { REDUCERS, RowGrouper, groupKey, groupRecords, resolveReducers } from "./grouping.js";

describe("groupRecords", () => {
  it("merges repeated keys last-write-wins in first-seen order", () => {
    const grouped = groupRecords(
      [
        { id: "1", v: "a" },
        { id: "2", v: "b" },
        { id: "1", v: "c" },
      ],
      ["id"],
    );
    expect(grouped).toEqual([
      { id: "1", v: "c" },
      { id: "2", v: "b" },
    ]);
  });

  it("is idempotent", () => {
    const once = groupRecords(
      [
        { cpu: "0", qos: "High", ms: "10" },
        { cpu: "1", qos: "Low", ms: "4" },
        { cpu: "0", qos: "Eco", ms: "12" },
      ],
      ["cpu"],
    );
    expect(groupRecords(once, ["cpu"])).toEqual(once);
  });

  it("passes records through when there are no key columns", () => {
    const records = [
      { id: "1", v: "a" },
      { id: "1", v: "a" },
    ];
    expect(groupRecords(records, [])).toEqual(records);
  });

  it("groups on every key column with exact string equality", () => {
    const grouped = groupRecords(
      [
        { process: "svc", cpu: "0", n: "1" },
        { process: "svc", cpu: "1", n: "2" },
        { process: "svc ", cpu: "0", n: "3" },
        { process: "svc", cpu: "0", n: "4" },
      ],
      ["process", "cpu"],
    );
    expect(grouped).toEqual([
      { process: "svc", cpu: "0", n: "4" },
      { process: "svc", cpu: "1", n: "2" },
      { process: "svc ", cpu: "0", n: "3" },
    ]);
  });

  it("appends columns that only later records carry", () => {
    const grouped = groupRecords(
      [
        { id: "1", a: "x" },
        { id: "1", b: "y" },
      ],
      ["id"],
    );
    expect(grouped).toEqual([{ id: "1", a: "x", b: "y" }]);
    expect(Object.keys(grouped[0] ?? {})).toEqual(["id", "a", "b"]);
  });

  it("does not mutate its input", () => {
    const first = { id: "1", v: "a" };
    groupRecords([first, { id: "1", v: "b" }], ["id"]);
    expect(first).toEqual({ id: "1", v: "a" });
  });

  it("applies per-column reducers", () => {
    const grouped = groupRecords(
      [
        { cpu: "0", count: "120", peak: "3", first: "a" },
        { cpu: "0", count: "80", peak: "9", first: "b" },
        { cpu: "0", count: "1,000", peak: "4", first: "c" },
      ],
      ["cpu"],
      resolveReducers({ count: "sum", peak: "max", first: "first" }),
    );
    expect(grouped).toEqual([{ cpu: "0", count: "1200", peak: "9", first: "a" }]);
  });
});

describe("REDUCERS", () => {
  it("falls back to the newer value when a value is not numeric", () => {
    expect(REDUCERS.sum("12", "n/a")).toBe("n/a");
    expect(REDUCERS.min("", "5")).toBe("5");
    expect(REDUCERS.min("2.5", "5")).toBe("2.5");
  });

  it("rounds sums to the inputs' decimal places", () => {
    expect(REDUCERS.sum("0.1", "0.2")).toBe("0.3");
    expect(REDUCERS.sum("1.25", "0.5")).toBe("1.75");
    expect(REDUCERS.sum("1,200", "50")).toBe("1250");
    expect(REDUCERS.sum("1e-7", "1e-7")).toBe("2e-7");
  });
});

describe("RowGrouper", () => {
  it("keeps one entry per distinct key however many rows arrive", () => {
    const grouper = new RowGrouper(["cpu"]);
    for (let row = 0; row < 10_000; row += 1) {
      grouper.add({ cpu: String(row % 4), n: String(row) });
    }
    expect(grouper.size).toBe(4);
    expect(grouper.records()).toEqual([
      { cpu: "0", n: "9996" },
      { cpu: "1", n: "9997" },
      { cpu: "2", n: "9998" },
      { cpu: "3", n: "9999" },
    ]);
  });

  it("returns a consistent partial result at any point", () => {
    const grouper = new RowGrouper(["id"]);
    grouper.add({ id: "1", v: "a" });
    const partial = grouper.records();
    grouper.add({ id: "1", v: "b" });
    expect(partial).toEqual([{ id: "1", v: "a" }]);
    expect(grouper.records()).toEqual([{ id: "1", v: "b" }]);
  });

  it("distinguishes a missing key column from an empty one", () => {
    expect(groupKey({ id: "" }, ["id"])).not.toBe(groupKey({}, ["id"]));
  });
});

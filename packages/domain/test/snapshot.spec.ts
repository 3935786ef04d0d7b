import { describe, expect, it } from "vitest";

import { MalformedInputError, normalizeSnapshot, Snapshot, type RawImbalanceRecord } from "../src";

const record = (
  settlementPeriod: number,
  value: number | null,
  publishedAt: string,
  settlementDate = "2025-03-10",
): RawImbalanceRecord => ({settlementDate, settlementPeriod, value, publishedAt});

describe("normalizeSnapshot", () => {
  it("keeps the latest publication per settlement period", () => {
    const snapshot = normalizeSnapshot([
      record(1, 100, "2025-03-10T08:00:00Z"),
      record(1, 140, "2025-03-10T09:00:00Z"),
      record(1, 120, "2025-03-10T08:30:00Z"),
      record(2, -50, "2025-03-10T08:00:00Z"),
    ]);
    expect(snapshot.size).toBe(2);
    expect(snapshot.get("2025-03-10", 1)?.value).toBe(140);
    expect(snapshot.get("2025-03-10", 2)?.value).toBe(-50);
    expect(snapshot.publishedAt?.toISOString()).toBe("2025-03-10T09:00:00.000Z");
  });

  it("keeps the first observation when publish times tie", () => {
    const snapshot = normalizeSnapshot([
      record(5, 10, "2025-03-10T08:00:00Z"),
      record(5, 20, "2025-03-10T08:00:00.000Z"),
    ]);
    expect(snapshot.get("2025-03-10", 5)?.value).toBe(10);
  });

  it("treats the same period on different dates as separate keys", () => {
    const snapshot = normalizeSnapshot([
      record(47, 1, "2025-03-09T20:00:00Z", "2025-03-09"),
      record(47, 2, "2025-03-10T07:00:00Z", "2025-03-10"),
    ]);
    expect(snapshot.size).toBe(2);
    expect(snapshot.settlementDates).toEqual(["2025-03-09", "2025-03-10"]);
  });

  it("drops observations without a value", () => {
    const snapshot = normalizeSnapshot([
      record(3, null, "2025-03-10T08:00:00Z"),
      {settlementPeriod: 4, value: null},
    ]);
    expect(snapshot.isEmpty).toBe(true);
    expect(snapshot.publishedAt).toBeNull();
  });

  it("is idempotent", () => {
    const once = normalizeSnapshot([
      record(1, 100, "2025-03-10T08:00:00Z"),
      record(1, 90, "2025-03-10T07:00:00Z"),
      record(48, 7, "2025-03-09T22:00:00Z", "2025-03-09"),
    ]);
    const twice = normalizeSnapshot(once.records);
    expect(twice.toJSON()).toEqual(once.toJSON());
  });

  it("drops records without a usable key and keeps the rest", () => {
    const skipped: string[] = [];
    const snapshot = normalizeSnapshot([
      record(1, 4, "2025-03-10T08:00:00Z"),
      {settlementDate: null, settlementPeriod: 2, value: 7, publishedAt: "2025-03-10T08:00:00Z"},
      record(0, 9, "2025-03-10T08:00:00Z"),
    ], {onSkippedRecord: (index, reason) => skipped.push(`${index}: ${reason}`)});

    expect(snapshot.size).toBe(1);
    expect(snapshot.get("2025-03-10", 1)?.value).toBe(4);
    expect(skipped).toEqual(["1: no usable settlementDate", "2: no usable settlementPeriod"]);
  });

  it("rejects a payload in which no record has a usable key", () => {
    expect(() => normalizeSnapshot([
      {settlementPeriod: 1, value: 4, publishedAt: "2025-03-10T08:00:00Z"},
      record(0, 4, "2025-03-10T08:00:00Z"),
    ])).toThrow(MalformedInputError);
    expect(() => normalizeSnapshot([record(0, 4, "2025-03-10T08:00:00Z")]))
      .toThrow("No observation carries a usable settlementDate and settlementPeriod");
  });

  it("rejects a key none of whose observations carries a publish time", () => {
    expect(() => normalizeSnapshot([{settlementDate: "2025-03-10", settlementPeriod: 6, value: 1}]))
      .toThrow("No observation for 2025-03-10 SP6 carries a publish time");
  });

  it("ignores undated duplicates when a dated observation exists", () => {
    const snapshot = normalizeSnapshot([
      {settlementDate: "2025-03-10", settlementPeriod: 6, value: 1},
      record(6, 2, "2025-03-10T08:00:00Z"),
    ]);
    expect(snapshot.get("2025-03-10", 6)?.value).toBe(2);
  });
});

describe("Snapshot", () => {
  const older = normalizeSnapshot([record(1, 1, "2025-03-10T08:00:00Z")]);
  const newer = normalizeSnapshot([record(1, 1, "2025-03-10T08:30:00Z")]);

  it("compares publish times strictly", () => {
    expect(newer.isNewerThan(older)).toBe(true);
    expect(older.isNewerThan(newer)).toBe(false);
    expect(older.isNewerThan(older)).toBe(false);
    expect(older.isNewerThan(null)).toBe(true);
  });

  it("never treats an empty snapshot as newer", () => {
    expect(Snapshot.empty().isNewerThan(null)).toBe(false);
    expect(older.isNewerThan(Snapshot.empty())).toBe(true);
  });

  it("orders records canonically", () => {
    const snapshot = normalizeSnapshot([
      record(2, 1, "2025-03-10T08:00:00Z"),
      record(1, 1, "2025-03-10T08:00:00Z"),
      record(48, 1, "2025-03-09T22:00:00Z", "2025-03-09"),
    ]);
    expect(snapshot.ordered().map((entry) => entry.settlementPeriod)).toEqual([48, 1, 2]);
  });
});

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { diffSnapshots, normalizeSnapshot, summarizeDiff } from "@imbalance-tracker/domain";
import type { DiffEntry } from "../src/storage/storage.schemas";
import { IN_MEMORY_DATABASE, resolveStoragePath, StorageService } from "../src/storage/storage.service";

const snapshotAt = (publishedAt: string, value: number) => normalizeSnapshot([
  {settlementDate: "2025-03-10", settlementPeriod: 1, value, publishedAt},
]);

function entry(cycle: number): DiffEntry {
  const diff = diffSnapshots(snapshotAt("2025-03-10T08:00:00Z", 10), snapshotAt("2025-03-10T08:30:00Z", 10 + cycle));
  return {
    cycle,
    hit: "first-attempt",
    label: `Update ${cycle}`,
    recordedAt: `2025-03-10T08:3${cycle}:00.000Z`,
    diff,
    summary: summarizeDiff(diff),
  };
}

describe("StorageService", () => {
  let originalPath: string | undefined;
  let storage: StorageService;

  beforeEach(() => {
    originalPath = process.env.IMBALANCE_TRACKER_STORAGE_PATH;
    process.env.IMBALANCE_TRACKER_STORAGE_PATH = IN_MEMORY_DATABASE;
    storage = new StorageService();
  });

  afterEach(() => {
    storage.onModuleDestroy();
    if (originalPath === undefined) {
      delete process.env.IMBALANCE_TRACKER_STORAGE_PATH;
    } else {
      process.env.IMBALANCE_TRACKER_STORAGE_PATH = originalPath;
    }
  });

  it("keeps only the latest snapshot", () => {
    expect(storage.getLatestSnapshot()).toBeNull();
    storage.replaceSnapshot(snapshotAt("2025-03-10T08:00:00Z", 10).toJSON());
    storage.replaceSnapshot(snapshotAt("2025-03-10T08:30:00Z", 12).toJSON());

    const latest = storage.getLatestSnapshot();
    expect(latest?.timestamp).toBe("2025-03-10T08:30:00.000Z");
    expect(latest?.payload.records).toEqual([{
      settlementDate: "2025-03-10",
      settlementPeriod: 1,
      value: 12,
      publishedAt: "2025-03-10T08:30:00.000Z",
      startTime: null,
    }]);
  });

  it("lists diffs newest first", () => {
    storage.appendDiff(entry(1));
    storage.appendDiff(entry(2));
    storage.appendDiff(entry(3));

    const listed = storage.listDiffs(2);
    expect(listed.map((record) => record.payload.label)).toEqual(["Update 3", "Update 2"]);
    expect(listed[0]?.payload.diff.rows[0]).toMatchObject({status: "changed", delta: 3});
    expect(listed[0]?.payload.summary.counts.changed).toBe(1);
  });
});

describe("resolveStoragePath", () => {
  it("defaults to the data folder next to the working directory", () => {
    expect(resolveStoragePath(undefined, "/srv/app/backend")).toBe("/srv/app/data/db/imbalance.sqlite");
  });

  it("resolves overrides against the working directory", () => {
    expect(resolveStoragePath(" tmp/test.sqlite ", "/srv/app/backend")).toBe("/srv/app/backend/tmp/test.sqlite");
    expect(resolveStoragePath(":memory:")).toBe(IN_MEMORY_DATABASE);
  });
});

import { compareSettlementPeriods } from "./settlement-period";
import { recordKey, type ImbalanceRecord, type Snapshot } from "./snapshot";

export type DiffStatus = "unchanged" | "changed" | "appeared" | "disappeared";
export type ValueSign = "positive" | "negative";

/**
 * `date-and-period` when both snapshots cover one and the same settlement date,
 * otherwise `period`, which lines periods up across a date boundary.
 */
export type DiffKeying = "date-and-period" | "period";

export interface SnapshotDiffRow {
  settlementPeriod: number;
  /** Date of the new observation, falling back to the previous one. */
  settlementDate: string | null;
  previousSettlementDate: string | null;
  newSettlementDate: string | null;
  status: DiffStatus;
  previousValue: number | null;
  newValue: number | null;
  delta: number | null;
  sign: ValueSign | null;
}

export interface SnapshotDiff {
  keying: DiffKeying;
  previousPublishedAt: string | null;
  newPublishedAt: string | null;
  rows: SnapshotDiffRow[];
  /** True when at least one row is not `unchanged`. */
  hasChanges: boolean;
  /** Same values everywhere and the same publish time. */
  isNoop: boolean;
}

export interface SnapshotDiffSummary {
  counts: Record<DiffStatus, number>;
  meanDelta: number | null;
  meanAbsoluteDelta: number | null;
  largestIncrease: SnapshotDiffRow | null;
  largestDecrease: SnapshotDiffRow | null;
}

export function valueSign(value: number | null): ValueSign | null {
  if (value === null) {
    return null;
  }
  return value >= 0 ? "positive" : "negative";
}

export function selectDiffKeying(previous: Snapshot, next: Snapshot): DiffKeying {
  const previousDates = previous.settlementDates;
  const nextDates = next.settlementDates;
  if (previousDates.length === 1 && nextDates.length === 1 && previousDates[0] === nextDates[0]) {
    return "date-and-period";
  }
  return "period";
}

function indexRecords(snapshot: Snapshot, keying: DiffKeying): Map<string, ImbalanceRecord> {
  const index = new Map<string, ImbalanceRecord>();
  for (const record of snapshot.records) {
    if (keying === "date-and-period") {
      index.set(recordKey(record.settlementDate, record.settlementPeriod), record);
      continue;
    }
    // A snapshot spanning several dates may repeat a period; the later date represents it.
    const key = String(record.settlementPeriod);
    const existing = index.get(key);
    if (!existing || record.settlementDate > existing.settlementDate) {
      index.set(key, record);
    }
  }
  return index;
}

function classify(previous: ImbalanceRecord | undefined, next: ImbalanceRecord | undefined): DiffStatus {
  if (previous && next) {
    return previous.value === next.value ? "unchanged" : "changed";
  }
  return next ? "appeared" : "disappeared";
}

/** Outer-join two snapshots and classify every key. Neither input is modified. */
export function diffSnapshots(previous: Snapshot, next: Snapshot): SnapshotDiff {
  const keying = selectDiffKeying(previous, next);
  const previousIndex = indexRecords(previous, keying);
  const nextIndex = indexRecords(next, keying);
  const keys = new Set([...previousIndex.keys(), ...nextIndex.keys()]);

  const rows: SnapshotDiffRow[] = [];
  for (const key of keys) {
    const before = previousIndex.get(key);
    const after = nextIndex.get(key);
    const reference = after ?? before;
    if (!reference) {
      continue;
    }
    const previousValue = before?.value ?? null;
    const newValue = after?.value ?? null;
    rows.push({
      settlementPeriod: reference.settlementPeriod,
      settlementDate: reference.settlementDate,
      previousSettlementDate: before?.settlementDate ?? null,
      newSettlementDate: after?.settlementDate ?? null,
      status: classify(before, after),
      previousValue,
      newValue,
      delta: previousValue !== null && newValue !== null ? newValue - previousValue : null,
      sign: valueSign(newValue),
    });
  }

  rows.sort((a, b) => {
    const byPeriod = compareSettlementPeriods(a.settlementPeriod, b.settlementPeriod);
    if (byPeriod !== 0) {
      return byPeriod;
    }
    return (a.settlementDate ?? "").localeCompare(b.settlementDate ?? "");
  });

  const previousPublishedAt = previous.publishedAt?.toISOString() ?? null;
  const newPublishedAt = next.publishedAt?.toISOString() ?? null;
  const hasChanges = rows.some((row) => row.status !== "unchanged");
  return {
    keying,
    previousPublishedAt,
    newPublishedAt,
    rows,
    hasChanges,
    isNoop: !hasChanges && previousPublishedAt === newPublishedAt,
  };
}

export function summarizeDiff(diff: SnapshotDiff): SnapshotDiffSummary {
  const counts: Record<DiffStatus, number> = {unchanged: 0, changed: 0, appeared: 0, disappeared: 0};
  let deltaSum = 0;
  let absoluteSum = 0;
  let deltaCount = 0;
  let largestIncrease: SnapshotDiffRow | null = null;
  let largestDecrease: SnapshotDiffRow | null = null;

  for (const row of diff.rows) {
    counts[row.status] += 1;
    if (row.delta === null) {
      continue;
    }
    deltaSum += row.delta;
    absoluteSum += Math.abs(row.delta);
    deltaCount += 1;
    if (row.delta > 0 && (largestIncrease?.delta == null || row.delta > largestIncrease.delta)) {
      largestIncrease = row;
    }
    if (row.delta < 0 && (largestDecrease?.delta == null || row.delta < largestDecrease.delta)) {
      largestDecrease = row;
    }
  }

  return {
    counts,
    meanDelta: deltaCount ? deltaSum / deltaCount : null,
    meanAbsoluteDelta: deltaCount ? absoluteSum / deltaCount : null,
    largestIncrease,
    largestDecrease,
  };
}

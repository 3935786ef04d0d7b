import { MalformedInputError } from "./errors";
import { compareSettlementPeriods, isSettlementPeriod } from "./settlement-period";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** One observation as delivered by a data source; any field may be missing. */
export interface RawImbalanceRecord {
  settlementDate?: string | null;
  settlementPeriod?: number | null;
  value?: number | null;
  publishedAt?: string | null;
  startTime?: string | null;
}

export interface ImbalanceRecord {
  settlementDate: string;
  settlementPeriod: number;
  value: number;
  /** ISO-8601 instant the observation was published. */
  publishedAt: string;
  startTime: string | null;
}

export interface SnapshotJson {
  publishedAt: string | null;
  settlementDates: string[];
  records: ImbalanceRecord[];
}

export function recordKey(settlementDate: string, settlementPeriod: number): string {
  return `${settlementDate}#${settlementPeriod}`;
}

/**
 * Records of one publish event, unique per (settlementDate, settlementPeriod).
 * Instances are immutable; build them with {@link normalizeSnapshot}.
 */
export class Snapshot {
  private readonly _records: readonly ImbalanceRecord[];
  private readonly _byKey: ReadonlyMap<string, ImbalanceRecord>;
  private readonly _publishedAtMs: number | null;

  private constructor(records: ImbalanceRecord[]) {
    this._records = Object.freeze(records.map((record) => Object.freeze({...record})));
    this._byKey = new Map(this._records.map((record) => [recordKey(record.settlementDate, record.settlementPeriod), record]));
    let latest: number | null = null;
    for (const record of this._records) {
      const publishedMs = Date.parse(record.publishedAt);
      if (latest === null || publishedMs > latest) {
        latest = publishedMs;
      }
    }
    this._publishedAtMs = latest;
  }

  static empty(): Snapshot {
    return new Snapshot([]);
  }

  /** @internal Used by {@link normalizeSnapshot}, which guarantees key uniqueness. */
  static fromUniqueRecords(records: ImbalanceRecord[]): Snapshot {
    return new Snapshot(records);
  }

  get records(): readonly ImbalanceRecord[] {
    return this._records;
  }

  get size(): number {
    return this._records.length;
  }

  get isEmpty(): boolean {
    return this._records.length === 0;
  }

  /** Latest publish time across the records, or null for an empty snapshot. */
  get publishedAt(): Date | null {
    return this._publishedAtMs === null ? null : new Date(this._publishedAtMs);
  }

  get publishedAtMs(): number | null {
    return this._publishedAtMs;
  }

  get settlementDates(): string[] {
    return [...new Set(this._records.map((record) => record.settlementDate))].sort();
  }

  get(settlementDate: string, settlementPeriod: number): ImbalanceRecord | undefined {
    return this._byKey.get(recordKey(settlementDate, settlementPeriod));
  }

  /** Strictly newer by publish time. An empty snapshot is never newer. */
  isNewerThan(other: Snapshot | null): boolean {
    if (this._publishedAtMs === null) {
      return false;
    }
    if (!other || other._publishedAtMs === null) {
      return true;
    }
    return this._publishedAtMs > other._publishedAtMs;
  }

  /** Records in canonical settlement-period order, then by settlement date. */
  ordered(): ImbalanceRecord[] {
    return [...this._records].sort((a, b) => {
      const byPeriod = compareSettlementPeriods(a.settlementPeriod, b.settlementPeriod);
      if (byPeriod !== 0) {
        return byPeriod;
      }
      return a.settlementDate.localeCompare(b.settlementDate);
    });
  }

  toJSON(): SnapshotJson {
    return {
      publishedAt: this.publishedAt?.toISOString() ?? null,
      settlementDates: this.settlementDates,
      records: this.ordered(),
    };
  }
}

interface Group {
  settlementDate: string;
  settlementPeriod: number;
  best: ImbalanceRecord | null;
  bestPublishedMs: number;
}

export interface NormalizeOptions {
  /** Called for each value-bearing observation dropped for lack of a usable key. */
  onSkippedRecord?: (index: number, reason: string) => void;
}

/**
 * Collapse raw observations into a snapshot. Observations without a value or
 * without a usable date and period are dropped; within a key the latest publish
 * time wins and ties keep the first seen.
 */
export function normalizeSnapshot(raw: readonly RawImbalanceRecord[], options: NormalizeOptions = {}): Snapshot {
  const groups = new Map<string, Group>();
  let skipped = 0;
  const skip = (index: number, reason: string) => {
    skipped += 1;
    options.onSkippedRecord?.(index, reason);
  };

  raw.forEach((record, index) => {
    const value = record.value;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return;
    }

    const settlementDate = record.settlementDate?.trim() ?? "";
    const settlementPeriod = record.settlementPeriod;
    if (!ISO_DATE.test(settlementDate)) {
      skip(index, "no usable settlementDate");
      return;
    }
    if (!isSettlementPeriod(settlementPeriod)) {
      skip(index, "no usable settlementPeriod");
      return;
    }

    const key = recordKey(settlementDate, settlementPeriod);
    let group = groups.get(key);
    if (!group) {
      group = {settlementDate, settlementPeriod, best: null, bestPublishedMs: Number.NEGATIVE_INFINITY};
      groups.set(key, group);
    }

    const publishedMs = Date.parse(record.publishedAt ?? "");
    if (!Number.isFinite(publishedMs)) {
      return;
    }
    if (group.best && publishedMs <= group.bestPublishedMs) {
      return;
    }
    group.best = {
      settlementDate,
      settlementPeriod,
      value,
      publishedAt: new Date(publishedMs).toISOString(),
      startTime: record.startTime ?? null,
    };
    group.bestPublishedMs = publishedMs;
  });

  if (groups.size === 0 && skipped > 0) {
    throw new MalformedInputError("No observation carries a usable settlementDate and settlementPeriod");
  }

  const records: ImbalanceRecord[] = [];
  for (const group of groups.values()) {
    if (!group.best) {
      throw new MalformedInputError(
        `No observation for ${group.settlementDate} SP${group.settlementPeriod} carries a publish time`,
      );
    }
    records.push(group.best);
  }
  return Snapshot.fromUniqueRecords(records);
}

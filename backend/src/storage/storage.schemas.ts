import { z } from "zod";

const diffStatusSchema = z.enum(["unchanged", "changed", "appeared", "disappeared"]);

export const imbalanceRecordSchema = z.object({
  settlementDate: z.string(),
  settlementPeriod: z.number().int(),
  value: z.number(),
  publishedAt: z.string(),
  startTime: z.string().nullable(),
});

export const snapshotJsonSchema = z.object({
  publishedAt: z.string().nullable(),
  settlementDates: z.array(z.string()),
  records: z.array(imbalanceRecordSchema),
});

export const snapshotDiffRowSchema = z.object({
  settlementPeriod: z.number().int(),
  settlementDate: z.string().nullable(),
  previousSettlementDate: z.string().nullable(),
  newSettlementDate: z.string().nullable(),
  status: diffStatusSchema,
  previousValue: z.number().nullable(),
  newValue: z.number().nullable(),
  delta: z.number().nullable(),
  sign: z.enum(["positive", "negative"]).nullable(),
});

export const snapshotDiffSchema = z.object({
  keying: z.enum(["date-and-period", "period"]),
  previousPublishedAt: z.string().nullable(),
  newPublishedAt: z.string().nullable(),
  rows: z.array(snapshotDiffRowSchema),
  hasChanges: z.boolean(),
  isNoop: z.boolean(),
});

export const snapshotDiffSummarySchema = z.object({
  counts: z.object({
    unchanged: z.number().int(),
    changed: z.number().int(),
    appeared: z.number().int(),
    disappeared: z.number().int(),
  }),
  meanDelta: z.number().nullable(),
  meanAbsoluteDelta: z.number().nullable(),
  largestIncrease: snapshotDiffRowSchema.nullable(),
  largestDecrease: snapshotDiffRowSchema.nullable(),
});

/** What gets persisted for every emitted diff. */
export const diffEntrySchema = z.object({
  cycle: z.number().int(),
  hit: z.enum(["first-attempt", "retry"]),
  label: z.string(),
  recordedAt: z.string(),
  diff: snapshotDiffSchema,
  summary: snapshotDiffSummarySchema,
});

export const storedRowSchema = z.object({
  id: z.number().int(),
  timestamp: z.string(),
  payload: z.string(),
});

export type DiffEntry = z.infer<typeof diffEntrySchema>;
export type StoredSnapshotPayload = z.infer<typeof snapshotJsonSchema>;

import { z } from "zod";

import { MalformedInputError } from "./errors";
import type { RawGenerationRecord } from "./generation-comparison";
import type { RawImbalanceRecord } from "./snapshot";

const looseNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === "string" && value.trim() === "") {
      return null;
    }
    const parsed = typeof value === "number" ? value : Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const looseString = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const bmrsImbalanceRowSchema = z.object({
  settlementDate: looseString,
  settlementPeriod: looseNumber,
  publishTime: looseString,
  startTime: looseString,
  indicatedImbalance: looseNumber,
});

export const bmrsGenerationRowSchema = z.object({
  settlementDate: looseString,
  settlementPeriod: looseNumber,
  psrType: looseString,
  startTime: looseString,
  publishTime: looseString,
  quantity: looseNumber,
  generation: looseNumber,
  value: looseNumber,
});

export type BmrsImbalanceRow = z.infer<typeof bmrsImbalanceRowSchema>;
export type BmrsGenerationRow = z.infer<typeof bmrsGenerationRowSchema>;

const imbalanceResponseSchema = z.object({data: z.array(bmrsImbalanceRowSchema)});
const generationResponseSchema = z.object({data: z.array(bmrsGenerationRowSchema)});

/** Megawatt columns in the order they are looked for in generation rows. */
export const MEGAWATT_FIELDS = ["quantity", "generation", "value"] as const;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseImbalanceResponse(payload: unknown): RawImbalanceRecord[] {
  const result = imbalanceResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedInputError(`Unexpected indicated imbalance payload: ${formatIssues(result.error)}`);
  }
  return result.data.data.map(toRawImbalanceRecord);
}

export function toRawImbalanceRecord(row: BmrsImbalanceRow): RawImbalanceRecord {
  return {
    settlementDate: row.settlementDate,
    settlementPeriod: row.settlementPeriod,
    publishedAt: row.publishTime,
    startTime: row.startTime,
    value: row.indicatedImbalance,
  };
}

export function parseGenerationResponse(payload: unknown): RawGenerationRecord[] {
  const result = generationResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedInputError(`Unexpected generation payload: ${formatIssues(result.error)}`);
  }
  return result.data.data.map(toRawGenerationRecord);
}

export function toRawGenerationRecord(row: BmrsGenerationRow): RawGenerationRecord {
  const field = MEGAWATT_FIELDS.find((name) => row[name] !== null);
  return {
    settlementDate: row.settlementDate,
    settlementPeriod: row.settlementPeriod,
    psrType: row.psrType,
    startTime: row.startTime,
    megawatts: field ? row[field] : null,
  };
}

import { z } from "zod";

import { ConfigurationError } from "@imbalance-tracker/domain";

const positiveNumber = z.number().finite().positive();
const nonNegativeNumber = z.number().finite().nonnegative();

export const pollingConfigSchema = z
  .object({
    update_interval_minutes: positiveNumber.optional(),
    retry_enabled: z.boolean().optional(),
    retry_increments_seconds: z.array(nonNegativeNumber).optional(),
    max_fetch_attempts: z.number().int().min(1).optional(),
    inter_attempt_delay_seconds: nonNegativeNumber.optional(),
    inter_request_pause_seconds: nonNegativeNumber.optional(),
  })
  .strict();

export const sourceConfigSchema = z
  .object({
    base_url: z.string().url().optional(),
    request_timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

export const generationConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .strict();

export const loggingConfigSchema = z
  .object({
    level: z.string().optional(),
  })
  .strict();

export const configDocumentSchema = z
  .object({
    settlement_date: z.string().optional(),
    polling: pollingConfigSchema.optional(),
    source: sourceConfigSchema.optional(),
    generation: generationConfigSchema.optional(),
    logging: loggingConfigSchema.optional(),
  })
  .strict();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type PollingConfig = z.infer<typeof pollingConfigSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  // An empty YAML file parses to null.
  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

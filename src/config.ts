/**
 * Adapter configuration schema and defaults.
 */

import { z } from "zod";
import type { PolicyAdapterConfig } from "./types.js";

/** DynamoDB's BatchWriteItem limit. */
export const DYNAMODB_MAX_BATCH_WRITE = 25;

export const DEFAULT_ADAPTER_CONFIG: PolicyAdapterConfig = {
  tableName: "casbin_rule",
  maxRetries: 3,
  batchSize: DYNAMODB_MAX_BATCH_WRITE,
  consistentRead: false,
  verbose: false,
};

const credentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().optional(),
});

export const adapterConfigSchema = z.object({
  tableName: z.string().min(1).default(DEFAULT_ADAPTER_CONFIG.tableName),
  region: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  credentials: credentialsSchema.optional(),
  maxRetries: z.number().int().positive().default(DEFAULT_ADAPTER_CONFIG.maxRetries),
  batchSize: z.number().int().positive().default(DEFAULT_ADAPTER_CONFIG.batchSize),
  consistentRead: z.boolean().default(DEFAULT_ADAPTER_CONFIG.consistentRead),
  verbose: z.boolean().default(DEFAULT_ADAPTER_CONFIG.verbose),
});

export type PolicyAdapterConfigInput = z.input<typeof adapterConfigSchema>;

/** Validate user config and fill defaults. Throws a ZodError on bad input. */
export function resolveAdapterConfig(input: PolicyAdapterConfigInput = {}): PolicyAdapterConfig {
  return adapterConfigSchema.parse(input);
}

/**
 * DynamoDB Policy Adapter — Package Entry Point
 */

export { DynamoDBPolicyAdapter, createDynamoDBPolicyAdapter } from "./src/adapter.js";
export type { DynamoDBPolicyAdapterOptions } from "./src/adapter.js";
export { DynamoDBPolicyStore, createPolicyClients, createPolicyTable } from "./src/dynamodb-store.js";
export type { DynamoDBPolicyStoreOptions, PolicyClients, PolicyTableOptions } from "./src/dynamodb-store.js";
export { InMemoryPolicyStore } from "./src/memory-store.js";
export type { InMemoryPolicyStoreOptions } from "./src/memory-store.js";
export { deriveRecordId, policyToRecord, recordToPolicy, sectionOf } from "./src/codec.js";
export { planBatches, executeBatches } from "./src/batch.js";
export type { BatchProgress } from "./src/batch.js";
export { buildPrefixFilter, matchesPolicyFilter } from "./src/filter.js";
export { PolicyLoadError, PolicyStoreError, formatErrorMessage } from "./src/errors.js";
export type { StoreOperation } from "./src/errors.js";
export {
  DEFAULT_ADAPTER_CONFIG,
  DYNAMODB_MAX_BATCH_WRITE,
  adapterConfigSchema,
  resolveAdapterConfig,
} from "./src/config.js";
export type { PolicyAdapterConfigInput } from "./src/config.js";
export { createConsoleLogger, silentLogger } from "./src/logger.js";
export type {
  PolicyAdapterConfig,
  PolicyAdapterLogger,
  PolicyFilter,
  PolicyModel,
  PolicyRecord,
  PolicyRule,
  PolicySection,
  PolicyStore,
  PolicyTuple,
  ScanFilter,
  WriteOperation,
} from "./src/types.js";

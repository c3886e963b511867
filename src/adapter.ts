/**
 * DynamoDB Policy Adapter
 *
 * Implements the policy-storage contract of a Casbin-style enforcer on top
 * of a single key-value table:
 * - load / filtered load into the engine's model
 * - save and clear of the whole rule set
 * - single and bulk add / remove, and remove by field prefix
 *
 * Bulk operations are paged to the store's batch-write cap and are not
 * atomic across pages.
 */

import { executeBatches, planBatches, type BatchProgress } from "./batch.js";
import { deriveRecordId, policyToRecord, recordToPolicy, sectionOf } from "./codec.js";
import { DYNAMODB_MAX_BATCH_WRITE, resolveAdapterConfig, type PolicyAdapterConfigInput } from "./config.js";
import { createPolicyClients, DynamoDBPolicyStore } from "./dynamodb-store.js";
import { formatErrorMessage, PolicyLoadError } from "./errors.js";
import { buildPrefixFilter, collectRecords, matchesPolicyFilter } from "./filter.js";
import { resolveLogger } from "./logger.js";
import type {
  PolicyAdapterLogger,
  PolicyFilter,
  PolicyModel,
  PolicyRecord,
  PolicyRule,
  PolicyStore,
  ScanFilter,
  WriteOperation,
} from "./types.js";

const SAVE_SECTIONS = ["p", "g"] as const;

export type DynamoDBPolicyAdapterOptions = {
  /** Max operations per batch-write call. */
  batchSize?: number;
  logger?: PolicyAdapterLogger;
  verbose?: boolean;
};

export class DynamoDBPolicyAdapter {
  private readonly store: PolicyStore;
  private readonly batchSize: number;
  private readonly logger: PolicyAdapterLogger;
  private filtered = false;

  constructor(store: PolicyStore, options: DynamoDBPolicyAdapterOptions = {}) {
    this.store = store;
    this.batchSize = options.batchSize ?? DYNAMODB_MAX_BATCH_WRITE;
    this.logger = resolveLogger(options.logger, options.verbose ?? false);
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  // ─── Loading ─────────────────────────────────────────────────────────────

  async loadPolicy(model: PolicyModel): Promise<void> {
    const { loaded } = await this.loadIntoModel(model);
    this.logger.info(`Loaded ${loaded} policy rules`);
  }

  /**
   * Load only rules matching `filter`. `isFiltered()` afterwards reports
   * whether anything was left out.
   */
  async loadFilteredPolicy(model: PolicyModel, filter?: PolicyFilter): Promise<void> {
    const { loaded, skipped } = await this.loadIntoModel(model, filter);
    this.filtered = skipped > 0;
    this.logger.info(`Loaded ${loaded} policy rules, ${skipped} filtered out`);
  }

  isFiltered(): boolean {
    return this.filtered;
  }

  private async loadIntoModel(
    model: PolicyModel,
    filter?: PolicyFilter,
  ): Promise<{ loaded: number; skipped: number }> {
    let loaded = 0;
    let skipped = 0;

    for await (const item of this.store.scan()) {
      const { pType, rule } = recordToPolicy(item);
      if (!pType || rule.length === 0) {
        const recordId = typeof item.id === "string" ? item.id : undefined;
        this.logger.error(`Aborting load: record ${recordId ?? "<no id>"} has no policy type or fields`);
        throw new PolicyLoadError("invalid load policy", recordId);
      }

      const sec = sectionOf(pType);
      if (filter && !matchesPolicyFilter(rule, filter[sec])) {
        skipped++;
        continue;
      }

      model.addPolicy(sec, pType, rule);
      loaded++;
    }

    return { loaded, skipped };
  }

  // ─── Whole-Set Operations ────────────────────────────────────────────────

  async savePolicy(model: PolicyModel): Promise<boolean> {
    const records: PolicyRecord[] = [];
    for (const sec of SAVE_SECTIONS) {
      const assertions = model.model.get(sec);
      if (!assertions) continue;
      for (const [ptype, ast] of assertions) {
        for (const rule of ast.policy) {
          records.push(policyToRecord(ptype, rule));
        }
      }
    }

    if (records.length === 0) return true;

    await this.putAll(records);
    this.logger.info(`Saved ${records.length} policy rules`);
    return true;
  }

  async clearPolicy(): Promise<void> {
    const ids = await this.scanIds();
    if (ids.length === 0) return;

    await this.deleteAll(ids);
    this.logger.info(`Cleared ${ids.length} policy rules`);
  }

  // ─── Incremental Operations ──────────────────────────────────────────────

  async addPolicy(_sec: string, ptype: string, rule: PolicyRule): Promise<boolean> {
    await this.store.put(policyToRecord(ptype, rule));
    return true;
  }

  async addPolicies(_sec: string, ptype: string, rules: PolicyRule[]): Promise<boolean> {
    if (rules.length === 0) return false;

    await this.putAll(rules.map((rule) => policyToRecord(ptype, rule)));
    return true;
  }

  /** Resolves `false` when no stored rule matched. */
  async removePolicy(_sec: string, ptype: string, rule: PolicyRule): Promise<boolean> {
    const previous = await this.store.delete(deriveRecordId(ptype, rule));
    return previous !== undefined;
  }

  /** Does not confirm that any of the rules existed. */
  async removePolicies(_sec: string, ptype: string, rules: PolicyRule[]): Promise<boolean> {
    if (rules.length === 0) return false;

    await this.deleteAll(rules.map((rule) => deriveRecordId(ptype, rule)));
    return true;
  }

  /**
   * Remove every `ptype` rule whose fields starting at `fieldIndex` equal
   * `fieldValues`; empty values match anything.
   */
  async removeFilteredPolicy(
    _sec: string,
    ptype: string,
    fieldIndex: number,
    ...fieldValues: string[]
  ): Promise<boolean> {
    if (fieldValues.length === 0) return false;

    const filter = buildPrefixFilter(ptype, fieldIndex, fieldValues);
    if (!filter) return false;

    const ids = await this.scanIds(filter);
    if (ids.length === 0) return false;

    await this.deleteAll(ids);
    this.logger.info(`Removed ${ids.length} ${ptype} rules by filter`);
    return true;
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────

  private async scanIds(filter?: ScanFilter): Promise<string[]> {
    const items = await collectRecords(this.store.scan(filter));
    const ids: string[] = [];
    for (const item of items) {
      if (typeof item.id === "string") ids.push(item.id);
    }
    return ids;
  }

  private async putAll(records: PolicyRecord[]): Promise<void> {
    await this.writePages(planBatches(records, this.batchSize), (record) => ({ type: "put", record }));
  }

  private async deleteAll(ids: string[]): Promise<void> {
    await this.writePages(planBatches(ids, this.batchSize), (id) => ({ type: "delete", id }));
  }

  private async writePages<T>(
    pages: T[][],
    toOperation: (item: T) => WriteOperation,
  ): Promise<void> {
    const onPage = ({ page, totalPages, size }: BatchProgress) =>
      this.logger.debug?.(`Batch ${page}/${totalPages} written (${size} items)`);

    try {
      await executeBatches(pages, toOperation, (ops) => this.store.batchWrite(ops), onPage);
    } catch (error) {
      this.logger.warn(`Bulk write aborted: ${formatErrorMessage(error)}`);
      throw error;
    }
  }
}

/**
 * Build an adapter backed by DynamoDB from plain config.
 *
 * @example
 * ```typescript
 * const adapter = createDynamoDBPolicyAdapter({
 *   tableName: "casbin_rule",
 *   region: "us-east-1",
 * });
 * ```
 */
export function createDynamoDBPolicyAdapter(
  input: PolicyAdapterConfigInput = {},
  options: { logger?: PolicyAdapterLogger } = {},
): DynamoDBPolicyAdapter {
  const config = resolveAdapterConfig(input);
  const { docClient } = createPolicyClients(config);
  const store = new DynamoDBPolicyStore(docClient, {
    tableName: config.tableName,
    consistentRead: config.consistentRead,
  });

  return new DynamoDBPolicyAdapter(store, {
    batchSize: config.batchSize,
    logger: options.logger,
    verbose: config.verbose,
  });
}

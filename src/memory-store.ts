/**
 * DynamoDB Policy Adapter — In-Memory Store
 *
 * Map-backed implementation of the store contract for testing and local
 * development. Understands the equality conjunctions the adapter builds
 * (`#a = :a AND #b = :b`) and nothing more.
 */

import { PolicyStoreError, type StoreOperation } from "./errors.js";
import type { PolicyRecord, PolicyStore, ScanFilter, WriteOperation } from "./types.js";

type Condition = { attribute: string; value: string };

const CONDITION_PATTERN = /^(#\w+)\s*=\s*(:\w+)$/;

function parseFilter(filter: ScanFilter): Condition[] {
  return filter.expression.split(/\s+AND\s+/).map((clause) => {
    const match = CONDITION_PATTERN.exec(clause.trim());
    const attribute = match ? filter.expressionAttributeNames[match[1]] : undefined;
    const value = match ? filter.expressionAttributeValues[match[2]] : undefined;
    if (attribute === undefined || value === undefined) {
      throw new Error(`Unsupported filter clause: ${clause}`);
    }
    return { attribute, value };
  });
}

export type InMemoryPolicyStoreOptions = {
  tableName?: string;
  /** Records returned per scan page. */
  pageSize?: number;
};

export class InMemoryPolicyStore implements PolicyStore {
  private items = new Map<string, Record<string, unknown>>();
  readonly tableName: string;
  private readonly pageSize: number;
  private failures = new Map<StoreOperation, number>();

  /** Batch-write calls received since the last `reset()`, in order. Kept for test assertions. */
  readonly batches: WriteOperation[][] = [];

  constructor(options: InMemoryPolicyStoreOptions = {}) {
    this.tableName = options.tableName ?? "casbin_rule";
    this.pageSize = options.pageSize ?? 100;
  }

  async *scan(filter?: ScanFilter): AsyncGenerator<Record<string, unknown>> {
    this.maybeFail("Scan");
    const conditions = filter ? parseFilter(filter) : [];
    const snapshot = [...this.items.values()].filter((item) =>
      conditions.every((c) => item[c.attribute] === c.value),
    );

    for (let start = 0; start < snapshot.length; start += this.pageSize) {
      if (start > 0) this.maybeFail("Scan");
      for (const item of snapshot.slice(start, start + this.pageSize)) {
        yield structuredClone(item);
      }
    }
  }

  async put(record: PolicyRecord): Promise<void> {
    this.maybeFail("Put");
    this.items.set(record.id, structuredClone(record));
  }

  async delete(id: string): Promise<Record<string, unknown> | undefined> {
    this.maybeFail("Delete");
    const existing = this.items.get(id);
    this.items.delete(id);
    return existing;
  }

  async batchWrite(operations: WriteOperation[]): Promise<void> {
    this.maybeFail("BatchWrite");
    this.batches.push(operations);
    for (const op of operations) {
      if (op.type === "put") this.items.set(op.record.id, structuredClone(op.record));
      else this.items.delete(op.id);
    }
  }

  // ─── Inspection ────────────────────────────────────────────────────────────

  get(id: string): Record<string, unknown> | undefined {
    const item = this.items.get(id);
    return item ? structuredClone(item) : undefined;
  }

  /** Insert a raw item, bypassing the codec. */
  seed(item: Record<string, unknown> & { id: string }): void {
    this.items.set(item.id, structuredClone(item));
  }

  size(): number {
    return this.items.size;
  }

  /** Drop every item, the batch log and any pending failure. */
  reset(): void {
    this.items.clear();
    this.batches.length = 0;
    this.failures.clear();
  }

  /** Fail the next call to `operation` after `afterCalls` successful ones. */
  failOn(operation: StoreOperation, afterCalls = 0): void {
    this.failures.set(operation, afterCalls);
  }

  private maybeFail(operation: StoreOperation): void {
    const remaining = this.failures.get(operation);
    if (remaining === undefined) return;
    if (remaining > 0) {
      this.failures.set(operation, remaining - 1);
      return;
    }
    this.failures.delete(operation);
    throw new PolicyStoreError(operation, this.tableName, new Error("injected failure"));
  }
}

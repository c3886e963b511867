/**
 * DynamoDB Policy Adapter — Core Types
 *
 * Policy tuples as the engine sees them, the flat record shape they are
 * persisted as, and the store contract the adapter drives.
 */

// ─── Policy Model ──────────────────────────────────────────────────────────────

/** Coarse rule category: permission (`p`) or grouping/role (`g`). */
export type PolicySection = "p" | "g";

/** Ordered field values of one rule, e.g. `["alice", "data1", "read"]`. */
export type PolicyRule = string[];

export type PolicyTuple = {
  pType: string;
  rule: PolicyRule;
};

/** Per-section field patterns; an empty pattern matches anything. */
export type PolicyFilter = {
  p?: string[];
  g?: string[];
};

/**
 * The slice of the engine's in-memory model the adapter reads and writes.
 * Structurally compatible with a node-casbin `Model`.
 */
export interface PolicyModel {
  model: Map<string, Map<string, { policy: string[][] }>>;
  addPolicy(sec: string, ptype: string, rule: string[]): void;
}

// ─── Stored Record ─────────────────────────────────────────────────────────────

export const MAX_POLICY_FIELDS = 6;

export const FIELD_ATTRIBUTES = ["v0", "v1", "v2", "v3", "v4", "v5"] as const;

export type FieldAttribute = (typeof FIELD_ATTRIBUTES)[number];

export type PolicyRecord = {
  id: string;
  pType: string;
} & Partial<Record<FieldAttribute, string>>;

// ─── Store Contract ────────────────────────────────────────────────────────────

/** Store-side scan filter: expression plus its named placeholders. */
export type ScanFilter = {
  expression: string;
  expressionAttributeNames: Record<string, string>;
  expressionAttributeValues: Record<string, string>;
};

export type WriteOperation =
  | { type: "put"; record: PolicyRecord }
  | { type: "delete"; id: string };

export interface PolicyStore {
  /** Lazy, single-pass iteration over every record, following pagination. */
  scan(filter?: ScanFilter): AsyncIterable<Record<string, unknown>>;
  put(record: PolicyRecord): Promise<void>;
  /** Resolves to the deleted record, or `undefined` when nothing matched. */
  delete(id: string): Promise<Record<string, unknown> | undefined>;
  batchWrite(operations: WriteOperation[]): Promise<void>;
}

// ─── Configuration ─────────────────────────────────────────────────────────────

export type PolicyAdapterConfig = {
  tableName: string;
  region?: string;
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  maxRetries: number;
  batchSize: number;
  consistentRead: boolean;
  verbose: boolean;
};

export type PolicyAdapterLogger = {
  debug?: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

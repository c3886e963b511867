/**
 * Error types raised by the adapter.
 */

export type StoreOperation = "Scan" | "Put" | "Delete" | "BatchWrite" | "CreateTable";

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/** A failure reported by the underlying table store. Never retried here. */
export class PolicyStoreError extends Error {
  constructor(
    public operation: StoreOperation,
    public tableName: string,
    cause?: unknown,
  ) {
    super(`${operation} on table ${tableName} failed: ${formatErrorMessage(cause)}`, { cause });
    this.name = "PolicyStoreError";
  }
}

/** A scanned record that does not decode to a usable policy tuple. */
export class PolicyLoadError extends Error {
  constructor(
    message: string,
    public recordId?: string,
  ) {
    super(message);
    this.name = "PolicyLoadError";
  }
}

/**
 * DynamoDB Policy Adapter — Batch Planner
 *
 * Splits bulk mutations into pages that fit one batch-write call and sends
 * them one at a time. A failed page aborts the run; pages already written
 * stay written.
 */

import type { WriteOperation } from "./types.js";

export function planBatches<T>(items: readonly T[], pageSize: number): T[][] {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`Batch page size must be a positive integer, got ${pageSize}`);
  }

  const pages: T[][] = [];
  for (let start = 0; start < items.length; start += pageSize) {
    pages.push(items.slice(start, start + pageSize));
  }
  return pages;
}

export type BatchProgress = {
  page: number;
  totalPages: number;
  size: number;
};

/**
 * Issue one `write` per page, strictly in order. Resolves to the number of
 * operations written.
 */
export async function executeBatches<T>(
  pages: readonly T[][],
  toOperation: (item: T) => WriteOperation,
  write: (operations: WriteOperation[]) => Promise<void>,
  onPage?: (progress: BatchProgress) => void,
): Promise<number> {
  let written = 0;

  for (const [index, page] of pages.entries()) {
    await write(page.map(toOperation));
    written += page.length;
    onPage?.({ page: index + 1, totalPages: pages.length, size: page.length });
  }

  return written;
}

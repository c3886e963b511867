/**
 * DynamoDB Policy Adapter — Scan Filters
 *
 * Store-side filter expressions for filtered deletes, and the client-side
 * positional match used by filtered loads.
 */

import type { ScanFilter } from "./types.js";
import { FIELD_ATTRIBUTES } from "./types.js";

/**
 * `#pType = :pType AND #vN = :vN ...` for every non-empty value, starting at
 * `v{fieldIndex}`. Empty values are wildcards and add no condition.
 *
 * Returns undefined when a non-empty value falls past `v5`: no stored record
 * can match it.
 */
export function buildPrefixFilter(
  pType: string,
  fieldIndex: number,
  fieldValues: readonly string[],
): ScanFilter | undefined {
  if (!Number.isInteger(fieldIndex) || fieldIndex < 0) {
    throw new RangeError(`Field index must be a non-negative integer, got ${fieldIndex}`);
  }

  const conditions = ["#pType = :pType"];
  const expressionAttributeNames: Record<string, string> = { "#pType": "pType" };
  const expressionAttributeValues: Record<string, string> = { ":pType": pType };

  for (const [pos, value] of fieldValues.entries()) {
    if (!value) continue;
    const attr = FIELD_ATTRIBUTES[fieldIndex + pos];
    if (attr === undefined) return undefined;
    conditions.push(`#${attr} = :${attr}`);
    expressionAttributeNames[`#${attr}`] = attr;
    expressionAttributeValues[`:${attr}`] = value;
  }

  return {
    expression: conditions.join(" AND "),
    expressionAttributeNames,
    expressionAttributeValues,
  };
}

/** True when every non-empty pattern equals the rule's field at its position. */
export function matchesPolicyFilter(rule: readonly string[], patterns: readonly string[] | undefined): boolean {
  if (!patterns) return true;
  return patterns.every((pattern, i) => pattern === "" || pattern === rule[i]);
}

/** Drain a scan completely. */
export async function collectRecords<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

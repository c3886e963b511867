/**
 * DynamoDB Policy Adapter — Record Codec
 *
 * Converts policy tuples to flat table records and back. The record id is a
 * pure function of the tuple so a rule can be deleted without reading it first.
 */

import { createHash } from "node:crypto";
import type { PolicyRecord, PolicyRule, PolicySection, PolicyTuple } from "./types.js";
import { FIELD_ATTRIBUTES, MAX_POLICY_FIELDS } from "./types.js";

/**
 * MD5 of `pType,v0,v1,...` as lowercase hex. Every supplied position up to the
 * sixth is included, empty strings as empty segments.
 */
export function deriveRecordId(pType: string, rule: PolicyRule): string {
  let line = pType;
  for (const value of rule.slice(0, MAX_POLICY_FIELDS)) {
    line += `,${value}`;
  }
  return createHash("md5").update(line).digest("hex");
}

export function policyToRecord(pType: string, rule: PolicyRule): PolicyRecord {
  const record: PolicyRecord = { id: deriveRecordId(pType, rule), pType };

  FIELD_ATTRIBUTES.forEach((attr, i) => {
    const value = rule[i];
    if (value) record[attr] = value;
  });

  return record;
}

/**
 * Reads `pType` and `v0..v5`, stopping at the first missing field. A record
 * with `v0` and `v2` but no `v1` decodes to a one-field rule.
 */
export function recordToPolicy(item: Record<string, unknown>): PolicyTuple {
  const pType = typeof item.pType === "string" ? item.pType : "";
  const rule: PolicyRule = [];

  for (const attr of FIELD_ATTRIBUTES) {
    const value = item[attr];
    if (typeof value !== "string" || value === "") break;
    rule.push(value);
  }

  return { pType, rule };
}

export function sectionOf(pType: string): PolicySection {
  return pType.startsWith("p") ? "p" : "g";
}

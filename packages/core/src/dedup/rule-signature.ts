/**
 * Rule Signature & Deduplication
 *
 * Two rules with the same signature are interchangeable for policy purposes
 * regardless of name or priority.
 */

import { isCustomRule } from "../matcher";
import type { DuplicateRule, Rule } from "../types";

const FIELD_SEPARATOR = "|";
const SET_SEPARATOR = ",";

function normalizeSet(values: string[]): string {
  const normalized = values.map((v) => v.trim().toLowerCase()).filter((v) => v.length > 0);
  return Array.from(new Set(normalized)).sort().join(SET_SEPARATOR);
}

/**
 * Compute the order-independent identity of a rule.
 */
export function ruleSignature(rule: Rule): string {
  return [
    rule.direction.toLowerCase(),
    rule.access.toLowerCase(),
    rule.protocol.toLowerCase(),
    normalizeSet(rule.sourceAddressPrefixes),
    normalizeSet(rule.sourcePortRanges),
    normalizeSet(rule.destinationAddressPrefixes),
    normalizeSet(rule.destinationPortRanges),
  ].join(FIELD_SEPARATOR);
}

/**
 * Find functionally duplicate custom rules. Within each signature group the
 * rule with the lowest priority number survives.
 */
export function findDuplicates(rules: Rule[]): DuplicateRule[] {
  const groups = new Map<string, Rule[]>();
  for (const rule of rules.filter(isCustomRule)) {
    const signature = ruleSignature(rule);
    const group = groups.get(signature);
    if (group) {
      group.push(rule);
    } else {
      groups.set(signature, [rule]);
    }
  }

  const duplicates: DuplicateRule[] = [];
  for (const group of groups.values()) {
    if (group.length < 2) continue;

    const [kept, ...others] = group.slice().sort((a, b) => a.priority - b.priority);
    for (const removed of others) {
      duplicates.push({ removed, keptInstead: kept });
    }
  }
  return duplicates;
}

/**
 * Rule Matcher
 *
 * Pure coverage checks between a rule's source/port specs and a requested
 * source address and destination port. Malformed specs never throw; they
 * simply do not cover.
 */

import { BlockList, isIP } from "net";
import { SYSTEM_PRIORITY_FLOOR, WILDCARD_SOURCES } from "../constants";
import type { CoverageResult, Rule } from "../types";

const NUMERIC = /^\s*\d+\s*$/;

/**
 * Check whether a destination port spec covers a port.
 * Handles "*", exact matches and inclusive "low-high" ranges.
 */
export function portCovers(spec: string | undefined, port: number | string): boolean {
  if (!spec) {
    return false;
  }
  const rulePort = spec.trim();
  const targetPort = String(port).trim();

  if (rulePort === "*") return true;
  if (rulePort === targetPort) return true;

  const dash = rulePort.indexOf("-");
  if (dash === -1) {
    return false;
  }
  const low = rulePort.slice(0, dash);
  const high = rulePort.slice(dash + 1);
  if (!NUMERIC.test(low) || !NUMERIC.test(high) || !NUMERIC.test(targetPort)) {
    return false;
  }
  const value = Number(targetPort);
  return Number(low) <= value && value <= Number(high);
}

/**
 * Check whether a source address prefix covers an address.
 * Handles the "*", "Internet" and "Any" wildcards, exact and /32 matches,
 * and CIDR membership.
 */
export function sourceCovers(prefix: string | undefined, address: string): boolean {
  if (!prefix) {
    return false;
  }
  const ruleSource = prefix.trim();

  if (WILDCARD_SOURCES.has(ruleSource)) return true;
  if (ruleSource === address) return true;
  if (ruleSource === `${address}/32`) return true;

  if (ruleSource.includes("/")) {
    return cidrContains(ruleSource, address);
  }
  return false;
}

function cidrContains(cidr: string, address: string): boolean {
  const slash = cidr.indexOf("/");
  const network = cidr.slice(0, slash);
  const bits = cidr.slice(slash + 1);

  const family = isIP(network);
  if (family === 0 || family !== isIP(address) || !NUMERIC.test(bits)) {
    return false;
  }
  const prefixLength = Number(bits);
  if (prefixLength > (family === 4 ? 32 : 128)) {
    return false;
  }

  const type = family === 4 ? "ipv4" : "ipv6";
  const list = new BlockList();
  try {
    list.addSubnet(network, prefixLength, type);
    return list.check(address, type);
  } catch {
    return false;
  }
}

/**
 * True for rules users may create, read and delete.
 */
export function isCustomRule(rule: Rule): boolean {
  return rule.priority < SYSTEM_PRIORITY_FLOOR;
}

/**
 * Find the rule that decides an inbound TCP request, simulating firewall
 * precedence: rules are walked in ascending priority and the first one whose
 * sources and ports both cover the request wins. A deny stops the search.
 */
export function findCoveringRule(rules: Rule[], address: string, port: number | string): CoverageResult {
  const ordered = rules
    .filter(isCustomRule)
    .sort((a, b) => a.priority - b.priority);

  for (const rule of ordered) {
    if (rule.direction !== "Inbound") continue;

    const protocol = rule.protocol.toLowerCase();
    if (protocol !== "tcp" && protocol !== "*") continue;

    if (!rule.sourceAddressPrefixes.some((p) => sourceCovers(p, address))) continue;
    if (!rule.destinationPortRanges.some((p) => portCovers(p, port))) continue;

    return rule.access === "Allow" ? { kind: "satisfied", rule } : { kind: "blocked", rule };
  }

  return { kind: "none" };
}

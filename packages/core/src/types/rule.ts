/**
 * Security Rule Type Definitions
 */

export type RuleDirection = "Inbound" | "Outbound";
export type RuleAccess = "Allow" | "Deny";

/**
 * A security rule. Single-valued and list-valued provider fields are
 * normalised into the list fields.
 */
export interface Rule {
  name: string;
  /** 100-4096 for custom rules, 65000+ for provider defaults */
  priority: number;
  direction: RuleDirection;
  access: RuleAccess;
  /** "Tcp", "Udp", "Icmp", "*", ... as reported */
  protocol: string;
  sourceAddressPrefixes: string[];
  sourcePortRanges: string[];
  destinationAddressPrefixes: string[];
  destinationPortRanges: string[];
  description?: string;
}

/**
 * Fields submitted when creating a rule.
 */
export type RuleFields = Rule;

/**
 * A duplicate detected by the deduplicator.
 */
export interface DuplicateRule {
  removed: Rule;
  keptInstead: Rule;
}

/**
 * Outcome of evaluating existing rules against a desired grant.
 */
export type CoverageResult =
  | { kind: "satisfied"; rule: Rule }
  | { kind: "blocked"; rule: Rule }
  | { kind: "none" };

/**
 * Outcome of planning for one group.
 */
export type AccessGrant =
  | { kind: "satisfied"; rule: Rule }
  | { kind: "required"; fields: RuleFields; blockedBy?: Rule };

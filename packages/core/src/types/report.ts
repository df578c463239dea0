/**
 * Reconciliation Report Type Definitions
 */

import type { GuardingGroup } from "./network";
import type { DuplicateRule, Rule } from "./rule";
import type { ServiceSpec } from "./service";

/**
 * A duplicate that could not be deleted.
 */
export interface DuplicateFailure {
  duplicate: DuplicateRule;
  reason: string;
}

/**
 * Outcome of deduplicating one group.
 */
export interface DedupOutcome {
  removed: DuplicateRule[];
  failures: DuplicateFailure[];
}

/**
 * Outcome of ensureAccess on one group.
 */
export interface EnsureAccessOutcome {
  skipped: boolean;
  /** Rule that already grants access when skipped */
  coveringRule?: Rule;
  /** Higher-precedence deny that shadowed the request before the new rule */
  blockedBy?: Rule;
  ruleCreated?: Rule;
  dedup: DedupOutcome;
}

/**
 * Per-group result inside a target report.
 */
export type GroupResult =
  | { group: GuardingGroup; ok: true; outcome: EnsureAccessOutcome }
  | { group: GuardingGroup; ok: false; reason: string };

/**
 * Result of reconciling one target.
 */
export interface TargetReport {
  targetId: string;
  targetName: string;
  service: ServiceSpec;
  groups: GroupResult[];
}

/**
 * Per-item result collected by the batch runner.
 */
export type BatchItemResult<T> =
  | { ok: true; id: string; label: string; value: T }
  | { ok: false; id: string; label: string; reason: string };

export interface BatchReport<T> {
  results: BatchItemResult<T>[];
  succeeded: number;
  failed: number;
}

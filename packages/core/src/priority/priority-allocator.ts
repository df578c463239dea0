import { CUSTOM_PRIORITY_MAX, CUSTOM_PRIORITY_MIN, SYSTEM_PRIORITY_FLOOR } from "../constants";
import { ReconcileError, ReconcileErrorType } from "../errors";

/**
 * Return the lowest priority in [low, high] not used by a custom rule.
 * Provider default rules (65000+) never collide with the custom range.
 */
export function nextFreePriority(
  rules: ReadonlyArray<{ priority: number }>,
  low: number = CUSTOM_PRIORITY_MIN,
  high: number = CUSTOM_PRIORITY_MAX
): number {
  const used = new Set(
    rules.map((r) => r.priority).filter((p) => p < SYSTEM_PRIORITY_FLOOR)
  );

  const ceiling = Math.min(high, SYSTEM_PRIORITY_FLOOR - 1);
  for (let priority = low; priority <= ceiling; priority++) {
    if (!used.has(priority)) {
      return priority;
    }
  }

  throw new ReconcileError(
    `No free rule priority between ${low} and ${high}`,
    ReconcileErrorType.ALLOCATION_EXHAUSTED
  );
}

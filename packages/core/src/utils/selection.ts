/**
 * Result of parsing a selection string such as "1,3-5,7".
 */
export interface SelectionResult {
  /** Sorted, zero-based indices */
  indices: number[];
  /** Parts that were ignored and why */
  warnings: string[];
}

/**
 * Parse a 1-based selection into zero-based indices.
 * Accepts single numbers, comma lists, ranges (either order) and "all"/"a".
 */
export function parseSelection(selection: string, max: number): SelectionResult {
  const input = selection.trim().toLowerCase();
  if (input === "all" || input === "a") {
    return { indices: Array.from({ length: max }, (_, i) => i), warnings: [] };
  }

  const indices = new Set<number>();
  const warnings: string[] = [];
  const isNumber = (s: string) => /^\d+$/.test(s);

  for (const raw of input.split(",")) {
    const part = raw.trim();
    if (!part) continue;

    if (part.includes("-")) {
      const [left, right] = part.split("-", 2).map((s) => s.trim());
      if (!isNumber(left) || !isNumber(right)) {
        warnings.push(`Invalid range '${part}'`);
        continue;
      }
      let start = Number(left);
      let end = Number(right);
      if (start < 1 || end < 1) {
        warnings.push(`Invalid range '${part}'`);
        continue;
      }
      if (start > end) {
        [start, end] = [end, start];
      }
      for (let i = start; i <= end; i++) {
        if (i <= max) {
          indices.add(i - 1);
        } else {
          warnings.push(`Number ${i} out of range (1-${max})`);
        }
      }
    } else if (isNumber(part)) {
      const num = Number(part);
      if (num >= 1 && num <= max) {
        indices.add(num - 1);
      } else {
        warnings.push(`Number ${num} out of range (1-${max})`);
      }
    } else {
      warnings.push(`Invalid input '${part}'`);
    }
  }

  return { indices: Array.from(indices).sort((a, b) => a - b), warnings };
}

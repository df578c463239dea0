import { ReconcileError, ReconcileErrorType } from "../errors";
import { nextFreePriority } from "./priority-allocator";

describe("nextFreePriority", () => {
  it("should return the lowest free priority", () => {
    expect(nextFreePriority([{ priority: 100 }, { priority: 101 }])).toBe(102);
    expect(nextFreePriority([])).toBe(100);
    expect(nextFreePriority([{ priority: 101 }])).toBe(100);
  });

  it("should ignore provider default rules", () => {
    expect(nextFreePriority([{ priority: 65000 }, { priority: 65500 }])).toBe(100);
  });

  it("should include the upper bound", () => {
    const used = Array.from({ length: 3996 }, (_, i) => ({ priority: 100 + i }));

    expect(nextFreePriority(used)).toBe(4096);
  });

  it("should never return a value at or above the system floor", () => {
    expect(() => nextFreePriority([{ priority: 64999 }], 64999, 70000)).toThrow(ReconcileError);
  });

  it("should throw ALLOCATION_EXHAUSTED when the range is full", () => {
    const used = [{ priority: 100 }, { priority: 101 }, { priority: 102 }];

    let caught: unknown;
    try {
      nextFreePriority(used, 100, 102);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ReconcileError);
    expect(caught).toMatchObject({
      type: ReconcileErrorType.ALLOCATION_EXHAUSTED,
      message: "No free rule priority between 100 and 102",
    });
  });
});

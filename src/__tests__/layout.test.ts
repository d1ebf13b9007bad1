import { describe, it, expect } from "vitest";
import { DEFAULT_WIDTHS, computeLayout } from "../layout.js";

describe("computeLayout", () => {
  it("should split columns by relative width", () => {
    expect(computeLayout(100, 30, DEFAULT_WIDTHS)).toEqual([
      { x: 0, width: 20, height: 24 },
      { x: 20, width: 20, height: 24 },
      { x: 40, width: 20, height: 24 },
      { x: 60, width: 40, height: 24 },
    ]);
  });

  it("should give the rounding remainder to the last panel", () => {
    expect(computeLayout(10, 20, [1, 2])).toEqual([
      { x: 0, width: 3, height: 14 },
      { x: 3, width: 7, height: 14 },
    ]);
  });

  it("should keep at least one list row on a tiny terminal", () => {
    expect(computeLayout(81, 5, [1, 1, 1]).map((g) => g.height)).toEqual([1, 1, 1]);
  });
});

import { describe, expect, it } from "vitest";

import { TargetSet } from "../src/target-set";

describe("TargetSet", () => {
  it("builds a sorted key and drops duplicates", () => {
    const set = new TargetSet([{ x: 2, y: 3 }, { x: 1, y: 0 }, { x: 1, y: 0 }, { x: 1, y: -1 }]);

    expect(set.size).toBe(3);
    expect(set.key).toBe("1,-1;1,0;2,3");
    expect(set.toArray()).toEqual([{ x: 1, y: -1 }, { x: 1, y: 0 }, { x: 2, y: 3 }]);
  });

  it("treats sets with the same members as equal regardless of order", () => {
    const a = new TargetSet([{ x: 0, y: 1 }, { x: 4, y: 4 }]);
    const b = new TargetSet([{ x: 4, y: 4 }, { x: 0, y: 1 }]);

    expect(a.equals(b)).toBe(true);
    expect(a.equals(new TargetSet([{ x: 0, y: 1 }]))).toBe(false);
  });

  it("returns a smaller set from without() and leaves the original intact", () => {
    const set = new TargetSet([{ x: 0, y: 1 }, { x: 4, y: 4 }]);
    const smaller = set.without({ x: 4, y: 4 });

    expect(smaller.key).toBe("0,1");
    expect(set.has({ x: 4, y: 4 })).toBe(true);
  });

  it("returns the same instance when removing a non-member", () => {
    const set = new TargetSet([{ x: 0, y: 1 }]);
    expect(set.without({ x: 3, y: 3 })).toBe(set);
  });

  it("hands out copies when iterated", () => {
    const set = new TargetSet([{ x: 0, y: 1 }]);
    for (const p of set) {
      p.x = 9;
    }
    expect(set.has({ x: 0, y: 1 })).toBe(true);
  });

  it("has an empty singleton", () => {
    expect(TargetSet.EMPTY.isEmpty()).toBe(true);
    expect(TargetSet.EMPTY.key).toBe("");
  });
});

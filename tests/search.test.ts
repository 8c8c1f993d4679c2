import { describe, expect, it, vi } from "vitest";

import { NavigationProblem, navigationState } from "../src/navigation-problem";
import { SearchNode, astarSearch, breadthFirstSearch, greedyBestFirstSearch } from "../src/search";
import { SearchInstrumentation } from "../src/search-instrumentation";
import type { Direction, GridConfig, Position } from "../src/types";

function problemOn(config: Partial<GridConfig>, start: Position, battery: number, target: Position): NavigationProblem {
  return new NavigationProblem({
    initial: navigationState(start, battery, [target]),
    goal: target,
    grid: {
      width: 4,
      height: 3,
      obstacles: [],
      urbanZones: [],
      base: { x: 0, y: 0 },
      wind: { direction: "none", factor: 1 },
      ...config,
    },
  });
}

describe("SearchNode", () => {
  it("rebuilds the action sequence from the root", () => {
    const root = new SearchNode<string, Direction>("a");
    const mid = new SearchNode<string, Direction>("b", root, "RIGHT", 1);
    const leaf = new SearchNode<string, Direction>("c", mid, "DOWN", 2);

    expect(leaf.solution()).toEqual(["RIGHT", "DOWN"]);
    expect(leaf.depth).toBe(2);
    expect(root.solution()).toEqual([]);
  });
});

describe("astarSearch", () => {
  it("detours around urban cells when that is cheaper", () => {
    const problem = problemOn({ urbanZones: [{ x: 1, y: 0 }, { x: 2, y: 0 }] }, { x: 0, y: 0 }, 20, { x: 3, y: 0 });

    expect(astarSearch(problem)).toEqual({
      actions: ["DOWN", "RIGHT", "RIGHT", "RIGHT", "UP"],
      pathCost: 5,
    });
  });

  it("returns null when the target is walled off", () => {
    const problem = problemOn(
      { width: 3, height: 1, obstacles: [{ x: 1, y: 0 }] },
      { x: 0, y: 0 },
      10,
      { x: 2, y: 0 }
    );

    expect(astarSearch(problem)).toBeNull();
    expect(greedyBestFirstSearch(problem)).toBeNull();
    expect(breadthFirstSearch(problem)).toBeNull();
  });

  it("returns null when the battery cannot cover the trip", () => {
    const problem = problemOn({}, { x: 0, y: 0 }, 2, { x: 3, y: 0 });
    expect(astarSearch(problem)).toBeNull();
  });

  it("returns an empty plan when the start already satisfies the goal", () => {
    const problem = new NavigationProblem({
      initial: navigationState({ x: 0, y: 0 }, 5),
      goal: { x: 0, y: 0 },
      grid: {
        width: 2,
        height: 2,
        obstacles: [],
        urbanZones: [],
        base: { x: 0, y: 0 },
        wind: { direction: "none", factor: 1 },
      },
    });

    expect(astarSearch(problem)).toEqual({ actions: [], pathCost: 0 });
  });
});

describe("breadthFirstSearch", () => {
  it("finds the fewest-move route", () => {
    const problem = problemOn({}, { x: 0, y: 0 }, 20, { x: 2, y: 1 });
    const solution = breadthFirstSearch(problem);

    expect(solution?.actions).toHaveLength(3);
    expect(solution?.pathCost).toBe(3);
  });
});

describe("greedyBestFirstSearch", () => {
  it("returns a route that satisfies the goal test", () => {
    const problem = problemOn({ obstacles: [{ x: 1, y: 1 }] }, { x: 0, y: 2 }, 20, { x: 3, y: 0 });
    const solution = greedyBestFirstSearch(problem);

    expect(solution).not.toBeNull();
    let state = problem.initial;
    for (const action of solution?.actions ?? []) {
      expect(problem.actions(state)).toContain(action);
      state = problem.result(state, action);
    }
    expect(problem.goalTest(state)).toBe(true);
  });
});

describe("searching an instrumented problem", () => {
  it("counts one expansion per actions() call and finds the same route", () => {
    const problem = problemOn({ urbanZones: [{ x: 1, y: 0 }] }, { x: 0, y: 0 }, 20, { x: 3, y: 2 });
    const plain = astarSearch(problem);

    const spy = vi.spyOn(problem, "actions");
    const instrumented = new SearchInstrumentation(problem);
    const measured = astarSearch(instrumented);

    expect(measured).toEqual(plain);
    expect(instrumented.expansions).toBeGreaterThan(0);
    expect(instrumented.expansions).toBe(spy.mock.calls.length);
  });
});

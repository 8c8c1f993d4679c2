import { describe, expect, it } from "vitest";

import { NavigationProblem, navigationState } from "../src/navigation-problem";
import { SearchInstrumentation } from "../src/search-instrumentation";

function makeProblem(): NavigationProblem {
  return new NavigationProblem({
    initial: navigationState({ x: 0, y: 0 }, 10, [{ x: 2, y: 0 }]),
    goal: { x: 0, y: 0 },
    grid: {
      width: 3,
      height: 3,
      obstacles: [],
      urbanZones: [{ x: 1, y: 0 }],
      base: { x: 0, y: 0 },
      wind: { direction: "east", factor: 1.5 },
    },
  });
}

describe("SearchInstrumentation", () => {
  it("counts exactly one expansion per actions() call", () => {
    const instrumented = new SearchInstrumentation(makeProblem());

    instrumented.actions(instrumented.initial);
    instrumented.actions(navigationState({ x: 1, y: 1 }, 3));
    instrumented.actions(navigationState({ x: 1, y: 1 }, 0));

    expect(instrumented.expansions).toBe(3);
  });

  it("does not count any other call", () => {
    const instrumented = new SearchInstrumentation(makeProblem());
    const state = instrumented.initial;
    const next = instrumented.result(state, "RIGHT");

    instrumented.goalTest(next);
    instrumented.pathCost(0, state, "RIGHT", next);
    instrumented.h(next);
    instrumented.stateKey(next);

    expect(instrumented.expansions).toBe(0);
  });

  it("forwards every call unchanged", () => {
    const problem = makeProblem();
    const instrumented = new SearchInstrumentation(problem);
    const state = problem.initial;
    const next = problem.result(state, "RIGHT");

    expect(instrumented.actions(state)).toEqual(problem.actions(state));
    expect(instrumented.result(state, "RIGHT")).toEqual(next);
    expect(instrumented.goalTest(next)).toBe(problem.goalTest(next));
    expect(instrumented.pathCost(4, state, "RIGHT", next)).toBe(7);
    expect(instrumented.h({ state: next })).toBe(problem.h(next));
    expect(instrumented.stateKey(next)).toBe(problem.stateKey(next));
  });

  it("reads and writes initial and goal on the wrapped problem", () => {
    const problem = makeProblem();
    const instrumented = new SearchInstrumentation(problem);

    const moved = navigationState({ x: 2, y: 2 }, 7);
    instrumented.initial = moved;
    instrumented.goal = { x: 1, y: 2 };

    expect(problem.initial).toBe(moved);
    expect(problem.goal).toEqual({ x: 1, y: 2 });
    expect(instrumented.goal).toEqual({ x: 1, y: 2 });
  });

  it("resets the counter", () => {
    const instrumented = new SearchInstrumentation(makeProblem());
    instrumented.actions(instrumented.initial);
    instrumented.reset();

    expect(instrumented.expansions).toBe(0);
  });
});

/**
 * Measuring wrapper around any search problem. Every call is forwarded
 * unchanged; `actions()` additionally counts one expansion.
 */

import type { HasState, SearchProblem } from "./search-problem";

export class SearchInstrumentation<S, A, G> implements SearchProblem<S, A, G> {
  expansions = 0;

  constructor(readonly problem: SearchProblem<S, A, G>) {}

  get initial(): S {
    return this.problem.initial;
  }

  set initial(value: S) {
    this.problem.initial = value;
  }

  get goal(): G {
    return this.problem.goal;
  }

  set goal(value: G) {
    this.problem.goal = value;
  }

  actions(state: S): A[] {
    this.expansions++;
    return this.problem.actions(state);
  }

  result(state: S, action: A): S {
    return this.problem.result(state, action);
  }

  goalTest(state: S): boolean {
    return this.problem.goalTest(state);
  }

  pathCost(cost: number, from: S, action: A, to: S): number {
    return this.problem.pathCost(cost, from, action, to);
  }

  h(target: S | HasState<S>): number {
    return this.problem.h(target);
  }

  stateKey(state: S): string {
    return this.problem.stateKey(state);
  }

  reset(): void {
    this.expansions = 0;
  }
}

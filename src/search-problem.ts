/**
 * Contract between a search problem and the generic search procedures.
 * NavigationProblem and SearchInstrumentation both satisfy it.
 */

export interface HasState<S> {
  state: S;
}

export interface SearchProblem<S, A, G> {
  initial: S;
  goal: G;
  actions(state: S): A[];
  result(state: S, action: A): S;
  goalTest(state: S): boolean;
  pathCost(cost: number, from: S, action: A, to: S): number;
  // Accepts either a bare state or a search node wrapping one
  h(target: S | HasState<S>): number;
  stateKey(state: S): string;
}

export interface SearchResult<A> {
  actions: A[];
  pathCost: number;
}

/**
 * A generic procedure: returns the action sequence of a solution, or null when
 * the frontier empties without reaching a goal.
 */
export type SearchProcedure = <S, A, G>(problem: SearchProblem<S, A, G>) => SearchResult<A> | null;

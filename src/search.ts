/**
 * Generic search procedures over any SearchProblem: breadth-first,
 * greedy best-first and A*. All three are graph searches keyed by
 * `problem.stateKey`, so revisited states are never expanded twice.
 */

import type { SearchProblem, SearchResult } from "./search-problem";

export class SearchNode<S, A> {
  readonly depth: number;

  constructor(
    readonly state: S,
    readonly parent: SearchNode<S, A> | null = null,
    readonly action: A | null = null,
    readonly pathCost: number = 0
  ) {
    this.depth = parent ? parent.depth + 1 : 0;
  }

  expand<G>(problem: SearchProblem<S, A, G>): SearchNode<S, A>[] {
    return problem.actions(this.state).map((action) => {
      const next = problem.result(this.state, action);
      return new SearchNode(next, this, action, problem.pathCost(this.pathCost, this.state, action, next));
    });
  }

  /**
   * Actions from the root to this node.
   */
  solution(): A[] {
    const actions: A[] = [];
    for (let node: SearchNode<S, A> | null = this; node; node = node.parent) {
      if (node.action !== null) actions.push(node.action);
    }
    return actions.reverse();
  }

  toResult(): SearchResult<A> {
    return { actions: this.solution(), pathCost: this.pathCost };
  }
}

/**
 * Binary min-heap. Equal priorities pop in insertion order.
 */
class PriorityQueue<T> {
  private heap: Array<{ item: T; priority: number; order: number }> = [];
  private counter = 0;

  get size(): number {
    return this.heap.length;
  }

  push(item: T, priority: number): void {
    this.heap.push({ item, priority, order: this.counter++ });
    this.siftUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a.priority < b.priority || (a.priority === b.priority && a.order < b.order);
  }

  private swap(i: number, j: number): void {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < this.heap.length && this.less(left, smallest)) smallest = left;
      if (right < this.heap.length && this.less(right, smallest)) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}

export function breadthFirstSearch<S, A, G>(problem: SearchProblem<S, A, G>): SearchResult<A> | null {
  const root = new SearchNode<S, A>(problem.initial);
  if (problem.goalTest(root.state)) {
    return root.toResult();
  }

  const frontier: SearchNode<S, A>[] = [root];
  const seen = new Set<string>([problem.stateKey(root.state)]);

  for (let head = 0; head < frontier.length; head++) {
    for (const child of frontier[head].expand(problem)) {
      const key = problem.stateKey(child.state);
      if (seen.has(key)) continue;
      if (problem.goalTest(child.state)) {
        return child.toResult();
      }
      seen.add(key);
      frontier.push(child);
    }
  }
  return null;
}

/**
 * Best-first graph search ordered by `f`. The goal test runs when a node is
 * popped, so with an admissible `h` the A* variant returns an optimal path.
 */
export function bestFirstSearch<S, A, G>(
  problem: SearchProblem<S, A, G>,
  f: (node: SearchNode<S, A>) => number
): SearchResult<A> | null {
  const frontier = new PriorityQueue<SearchNode<S, A>>();
  const bestCost = new Map<string, number>();
  const explored = new Set<string>();

  const root = new SearchNode<S, A>(problem.initial);
  frontier.push(root, f(root));
  bestCost.set(problem.stateKey(root.state), root.pathCost);

  for (let node = frontier.pop(); node; node = frontier.pop()) {
    const key = problem.stateKey(node.state);
    if (explored.has(key)) continue;
    if (problem.goalTest(node.state)) {
      return node.toResult();
    }
    explored.add(key);

    for (const child of node.expand(problem)) {
      const childKey = problem.stateKey(child.state);
      if (explored.has(childKey)) continue;
      const known = bestCost.get(childKey);
      if (known !== undefined && known <= child.pathCost) continue;
      bestCost.set(childKey, child.pathCost);
      frontier.push(child, f(child));
    }
  }
  return null;
}

export function greedyBestFirstSearch<S, A, G>(problem: SearchProblem<S, A, G>): SearchResult<A> | null {
  return bestFirstSearch(problem, (node) => problem.h(node));
}

export function astarSearch<S, A, G>(problem: SearchProblem<S, A, G>): SearchResult<A> | null {
  return bestFirstSearch(problem, (node) => node.pathCost + problem.h(node));
}

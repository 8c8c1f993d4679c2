/**
 * Side-by-side run of the search procedures on the same planning legs.
 *
 * Each leg is a round trip from the base through one ticket's cell and back.
 * Every procedure gets a fresh problem wrapped in SearchInstrumentation so
 * expansions are counted the same way for all of them.
 */

import type { GridWorld } from "./grid-world";
import type { NavigationSearch } from "./mission-agent";
import { DEFAULT_MISSION_PARAMETERS, type EnergyParameters } from "./mission-schema";
import { NavigationProblem, navigationState } from "./navigation-problem";
import { astarSearch, breadthFirstSearch, greedyBestFirstSearch } from "./search";
import { SearchInstrumentation } from "./search-instrumentation";
import { formatPosition, type Position } from "./types";

export interface ComparisonLeg {
  ticketId: number;
  title: string;
  target: Position;
}

export interface AlgorithmRun {
  leg: ComparisonLeg;
  algorithm: string;
  expansions: number;
  elapsedMs: number;
  // null when the procedure found no route
  pathCost: number | null;
  batteryUsed: number | null;
  actions: string[];
}

export interface AlgorithmTotals {
  algorithm: string;
  expansions: number;
  elapsedMs: number;
  pathCost: number;
  batteryUsed: number;
  solved: number;
}

export const SEARCH_ALGORITHMS: ReadonlyArray<{ name: string; search: NavigationSearch }> = [
  { name: "Breadth-first", search: breadthFirstSearch },
  { name: "Greedy best-first", search: greedyBestFirstSearch },
  { name: "A*", search: astarSearch },
];

export interface CompareOptions {
  battery: number;
  energy?: EnergyParameters;
  algorithms?: ReadonlyArray<{ name: string; search: NavigationSearch }>;
}

export function compareAlgorithms(grid: GridWorld, legs: ComparisonLeg[], options: CompareOptions): AlgorithmRun[] {
  const energy = options.energy ?? DEFAULT_MISSION_PARAMETERS.energy;
  const algorithms = options.algorithms ?? SEARCH_ALGORITHMS;
  const runs: AlgorithmRun[] = [];

  for (const leg of legs) {
    for (const { name, search } of algorithms) {
      const problem = new NavigationProblem({
        initial: navigationState(grid.base, options.battery, [leg.target]),
        goal: grid.base,
        grid,
        energy,
      });
      const instrumented = new SearchInstrumentation(problem);

      const started = performance.now();
      const result = search(instrumented);
      const elapsedMs = performance.now() - started;

      if (!result) {
        runs.push({
          leg,
          algorithm: name,
          expansions: instrumented.expansions,
          elapsedMs,
          pathCost: null,
          batteryUsed: null,
          actions: [],
        });
        continue;
      }

      let final = problem.initial;
      for (const action of result.actions) {
        final = problem.result(final, action);
      }

      runs.push({
        leg,
        algorithm: name,
        expansions: instrumented.expansions,
        elapsedMs,
        pathCost: result.pathCost,
        batteryUsed: problem.initial.battery - final.battery,
        actions: [...result.actions],
      });
    }
  }
  return runs;
}

/**
 * Sum each algorithm's runs. Cost and battery only count solved legs.
 */
export function summarizeRuns(runs: AlgorithmRun[]): AlgorithmTotals[] {
  const totals = new Map<string, AlgorithmTotals>();

  for (const run of runs) {
    const t = totals.get(run.algorithm) ?? {
      algorithm: run.algorithm,
      expansions: 0,
      elapsedMs: 0,
      pathCost: 0,
      batteryUsed: 0,
      solved: 0,
    };
    t.expansions += run.expansions;
    t.elapsedMs += run.elapsedMs;
    if (run.pathCost !== null && run.batteryUsed !== null) {
      t.pathCost += run.pathCost;
      t.batteryUsed += run.batteryUsed;
      t.solved++;
    }
    totals.set(run.algorithm, t);
  }
  return Array.from(totals.values());
}

function fewest<T>(items: T[], key: (item: T) => number): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || key(item) < key(best)) best = item;
  }
  return best;
}

function row(cells: string[], widths: number[]): string {
  return "  " + cells.map((c, i) => c.padEnd(widths[i])).join(" | ");
}

const LEG_WIDTHS = [20, 10, 12, 8, 8];

export function formatLegTable(leg: ComparisonLeg, runs: AlgorithmRun[]): string[] {
  const lines = [
    "=".repeat(72),
    `  Ticket #${leg.ticketId}: ${leg.title} -> ${formatPosition(leg.target)}`,
    "=".repeat(72),
    row(["Algorithm", "Expanded", "Time (ms)", "Cost", "Battery"], LEG_WIDTHS),
    row(LEG_WIDTHS.map((w) => "-".repeat(w)), LEG_WIDTHS),
  ];

  for (const r of runs) {
    lines.push(
      row(
        [
          r.algorithm,
          String(r.expansions),
          r.elapsedMs.toFixed(3),
          r.pathCost === null ? "none" : r.pathCost.toFixed(1),
          r.batteryUsed === null ? "n/a" : String(r.batteryUsed),
        ],
        LEG_WIDTHS
      )
    );
  }

  const solved = runs.filter((r) => r.pathCost !== null);
  const byNodes = fewest(solved, (r) => r.expansions);
  const byCost = fewest(solved, (r) => r.pathCost ?? Infinity);
  if (byNodes && byCost) {
    lines.push(`  Fewest expansions: ${byNodes.algorithm} (${byNodes.expansions})`);
    lines.push(`  Lowest cost:       ${byCost.algorithm} (${(byCost.pathCost ?? 0).toFixed(1)})`);
  }
  for (const r of runs) {
    const shown = r.actions.slice(0, 10).join(" ");
    lines.push(`  ${r.algorithm}: ${r.pathCost === null ? "no route" : shown + (r.actions.length > 10 ? " ..." : "")}`);
  }
  return lines;
}

const SUMMARY_WIDTHS = [20, 12, 14, 12, 10];

export function formatSummary(totals: AlgorithmTotals[]): string[] {
  const lines = [
    "=".repeat(72),
    "  Overall comparison",
    "=".repeat(72),
    row(["Algorithm", "Expanded", "Time (ms)", "Cost", "Battery"], SUMMARY_WIDTHS),
    row(SUMMARY_WIDTHS.map((w) => "-".repeat(w)), SUMMARY_WIDTHS),
  ];
  for (const t of totals) {
    lines.push(
      row(
        [t.algorithm, String(t.expansions), t.elapsedMs.toFixed(3), t.pathCost.toFixed(1), String(t.batteryUsed)],
        SUMMARY_WIDTHS
      )
    );
  }

  const byNodes = fewest(totals, (t) => t.expansions);
  const byCost = fewest(totals, (t) => t.pathCost);
  if (byNodes && byCost) {
    lines.push(`  Fewest expansions overall: ${byNodes.algorithm}`);
    lines.push(`  Lowest total cost:         ${byCost.algorithm}`);
  }
  return lines;
}

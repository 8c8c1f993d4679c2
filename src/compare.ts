/**
 * Compare breadth-first, greedy and A* on every demonstration ticket.
 *
 *   npm run compare -- [--battery N] [--wind-factor F] [--param name=value ...]
 */

import { parseArgs } from "node:util";
import { compareAlgorithms, formatLegTable, formatSummary, summarizeRuns } from "./compare-algorithms";
import { GridWorld } from "./grid-world";
import { MissionParameterStore } from "./parameter-store";
import { ESTUARY_BATTERY, estuaryGrid } from "./scenario";
import { createDefaultTickets } from "./ticket-gateway";

function parseNumber(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function main(): void {
  const { values: args } = parseArgs({
    options: {
      battery: { type: "string" },
      "wind-factor": { type: "string" },
      param: { type: "string", multiple: true, default: [] },
    },
  });

  const battery = parseNumber("battery", args.battery, ESTUARY_BATTERY);
  const grid = new GridWorld(estuaryGrid(parseNumber("wind-factor", args["wind-factor"], 1.5)));

  const parameters = new MissionParameterStore();
  for (const entry of args.param ?? []) {
    const [name, raw] = entry.split("=");
    parameters.setParameter(name, parseNumber("param", raw, NaN));
  }

  const legs = createDefaultTickets().map((t) => ({ ticketId: t.id, title: t.title, target: t.coordinates }));
  const runs = compareAlgorithms(grid, legs, { battery, energy: parameters.params.energy });

  for (const leg of legs) {
    console.log(formatLegTable(leg, runs.filter((r) => r.leg === leg)).join("\n"));
  }
  console.log(formatSummary(summarizeRuns(runs)).join("\n"));
}

try {
  main();
} catch (error: unknown) {
  console.error("[Compare] Fatal:", error);
  process.exitCode = 1;
}

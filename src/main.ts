/**
 * Command-line driver for the estuary monitoring mission.
 *
 *   npm start -- [--sim] [--max-steps N] [--battery N] [--wind-factor F]
 *                [--base-url URL] [--param name=value ...]
 *
 * Without --sim the ticket API at --base-url is tried first; any failure
 * falls back to the built-in demonstration tickets.
 */

import { parseArgs } from "node:util";
import { MissionParameterStore } from "./parameter-store";
import { renderGrid } from "./renderer";
import { ESTUARY_BATTERY, createEstuaryMission, runMission } from "./scenario";
import { TicketGateway } from "./ticket-gateway";
import { formatPosition } from "./types";

function parseNumber(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${flag} expects a number, got "${raw}"`);
  }
  return value;
}

async function main(): Promise<void> {
  const { values: args } = parseArgs({
    options: {
      sim: { type: "boolean", default: false },
      "max-steps": { type: "string" },
      battery: { type: "string" },
      "wind-factor": { type: "string" },
      "base-url": { type: "string", default: "http://localhost:5000" },
      param: { type: "string", multiple: true, default: [] },
    },
  });

  const maxSteps = parseNumber("max-steps", args["max-steps"], 200);
  const battery = parseNumber("battery", args.battery, ESTUARY_BATTERY);
  const windFactor = parseNumber("wind-factor", args["wind-factor"], 1.5);

  const parameters = new MissionParameterStore();
  for (const entry of args.param ?? []) {
    const [name, raw] = entry.split("=");
    parameters.setParameter(name, parseNumber("param", raw, NaN));
  }

  console.log("=".repeat(64));
  console.log("  Sentinel drone - estuary monitoring mission");
  console.log("=".repeat(64));
  if (args.sim) {
    console.log("[Mission] Simulation mode, no ticket API");
  } else {
    console.log(`[Mission] Using ticket API at ${args["base-url"]} (pass --sim to skip)`);
  }
  for (const config of parameters.getAllConfigurations()) {
    const values = config.properties.map((p) => `${p.name}=${p.value}`).join(", ");
    console.log(`[Parameters] ${config.configId}: ${values}`);
  }

  const gateway = new TicketGateway({
    baseUrl: args["base-url"],
    username: process.env.TICKET_API_USER,
    password: process.env.TICKET_API_PASSWORD,
    simulation: args.sim,
  });

  const mission = await createEstuaryMission({
    tickets: gateway,
    parameters: parameters.params,
    battery,
    windFactor,
  });

  console.log(renderGrid(mission.world).join("\n"));
  const result = await runMission(mission, maxSteps);

  const { world, drone, agent } = mission;
  const report = agent.report();
  const collected = world.getCollectedSamples(drone);

  console.log("=".repeat(64));
  console.log("  Mission report");
  console.log("=".repeat(64));
  console.log(`  Outcome:            ${result.outcome}`);
  console.log(`  Steps executed:     ${result.steps}`);
  console.log(`  Tickets processed:  ${report.processedTickets}`);
  console.log(`  Tickets pending:    ${report.pendingTickets}`);
  const level = world.telemetryFor(drone).getBatteryLevel();
  console.log(`  Battery remaining:  ${world.getBattery(drone)} (${level.toFixed(0)}%)`);
  console.log(`  Final position:     ${formatPosition(drone.position)}`);
  console.log(`  At base:            ${report.atBase ? "yes" : "no"}`);
  console.log(`  Mission complete:   ${report.missionComplete ? "yes" : "no"}`);
  for (const sample of collected) {
    const reading = sample.reading
      ? Object.entries(sample.reading)
          .map(([k, v]) => `${k}=${v}`)
          .join(", ")
      : "no reading";
    console.log(`    - ${sample.id} ${sample.title} @ ${formatPosition(sample.position)} (${reading})`);
  }
  console.log(renderGrid(world).join("\n"));
}

main().catch((error: unknown) => {
  console.error("[Mission] Fatal:", error);
  process.exitCode = 1;
});

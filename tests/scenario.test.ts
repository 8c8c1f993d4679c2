import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { Drone } from "../src/drone";
import { GridWorld } from "../src/grid-world";
import { MissionAgent } from "../src/mission-agent";
import { DEFAULT_MISSION_PARAMETERS } from "../src/mission-schema";
import { createEstuaryMission, estuaryGrid, runMission, type EstuaryMission } from "../src/scenario";
import { SimulationWorld } from "../src/simulation-world";
import { TicketGateway } from "../src/ticket-gateway";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("estuary mission", () => {
  it("places one sample per open ticket and the drone at base", async () => {
    const gateway = new TicketGateway({ simulation: true });
    const { world, drone, agent } = await createEstuaryMission({
      tickets: gateway,
      parameters: DEFAULT_MISSION_PARAMETERS,
    });

    expect(world.samples.map((s) => [s.id, s.position])).toEqual([
      ["sample-1", { x: 7, y: 2 }],
      ["sample-2", { x: 3, y: 8 }],
      ["sample-3", { x: 8, y: 6 }],
    ]);
    expect(drone.position).toEqual({ x: 0, y: 0 });
    expect(world.getBattery(drone)).toBe(60);
    expect(agent.phase).toBe("selecting-goal");
    expect(estuaryGrid().obstacles).toHaveLength(5);
  });

  it("collects every sample and returns home on a full battery", async () => {
    const gateway = new TicketGateway({ simulation: true });
    const mission = await createEstuaryMission({ tickets: gateway, parameters: DEFAULT_MISSION_PARAMETERS });

    const result = await runMission(mission);

    expect(result).toEqual({ steps: 35, outcome: "complete" });
    expect(mission.world.getBattery(mission.drone)).toBe(25);
    expect(mission.drone.position).toEqual({ x: 0, y: 0 });
    expect(mission.world.getCollectedSamples(mission.drone).map((s) => s.id)).toEqual([
      "sample-1",
      "sample-3",
      "sample-2",
    ]);
    expect(mission.agent.report().processedTickets).toBe(3);

    const tickets = await gateway.listTickets();
    expect(tickets.map((t) => t.status)).toEqual(["closed", "closed", "closed"]);
    expect(tickets[0].payload).toEqual({ batteryRemaining: 51, collectionPosition: [7, 2] });
    expect(tickets[2].payload).toEqual({ batteryRemaining: 45, collectionPosition: [8, 6] });
    expect(tickets[1].payload).toEqual({ batteryRemaining: 37, collectionPosition: [3, 8] });
  });

  it("halts when the drone can neither continue nor get home", async () => {
    const gateway = new TicketGateway({ simulation: true });
    const mission = await createEstuaryMission({
      tickets: gateway,
      parameters: DEFAULT_MISSION_PARAMETERS,
      battery: 20,
    });

    const result = await runMission(mission);

    expect(result).toEqual({ steps: 17, outcome: "stuck" });
    expect(mission.world.getBattery(mission.drone)).toBe(4);
    expect(mission.agent.report()).toMatchObject({ processedTickets: 2, pendingTickets: 1, stuck: true });
  });

  it("stops once the battery is exhausted", async () => {
    const gateway = new TicketGateway({ simulation: true });
    const mission = await createEstuaryMission({
      tickets: gateway,
      parameters: DEFAULT_MISSION_PARAMETERS,
      battery: 15,
    });

    const result = await runMission(mission);

    expect(result).toEqual({ steps: 15, outcome: "battery-exhausted" });
    expect(mission.drone.position).toEqual({ x: 8, y: 6 });
  });

  it("stops at the step ceiling", async () => {
    const gateway = new TicketGateway({ simulation: true });
    const mission = await createEstuaryMission({ tickets: gateway, parameters: DEFAULT_MISSION_PARAMETERS });

    expect(await runMission(mission, 5)).toEqual({ steps: 5, outcome: "step-limit" });
  });

  it("reports a landing at base on the last unit of charge as complete", async () => {
    const gateway = new TicketGateway({
      simulation: true,
      fallbackTickets: [
        { id: 7, title: "Jetty", description: "", status: "open", coordinates: { x: 1, y: 0 }, payload: null },
      ],
    });
    const mission = await strip(gateway, 3);

    const result = await runMission(mission);

    expect(result).toEqual({ steps: 3, outcome: "complete" });
    expect(mission.world.getBattery(mission.drone)).toBe(0);
    expect(mission.drone.position).toEqual({ x: 0, y: 0 });
    expect(mission.drone.currentAction).toBe("LEFT");
  });
});

async function strip(gateway: TicketGateway, battery: number): Promise<EstuaryMission> {
  const grid = new GridWorld({
    width: 2,
    height: 1,
    obstacles: [],
    urbanZones: [],
    base: { x: 0, y: 0 },
    wind: { direction: "none", factor: 1 },
  });
  const world = new SimulationWorld({ grid });
  const agent = new MissionAgent({ grid, tickets: gateway, batteryCapacity: battery });
  await agent.sync();
  for (const ticket of agent.pendingTickets) {
    world.addSample({
      id: `sample-${ticket.id}`,
      ticketId: ticket.id,
      title: ticket.title,
      position: ticket.coordinates,
      collected: false,
    });
  }
  const drone = new Drone("d1", agent, grid.base, { batteryCapacity: battery });
  world.addDrone(drone);
  return { world, drone, agent };
}

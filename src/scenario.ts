/**
 * The demonstration estuary: a 10x10 grid with urban blocks, dense mangrove
 * obstacles and one monitoring sample per open ticket.
 */

import { Drone } from "./drone";
import { GridWorld } from "./grid-world";
import { MissionAgent, type NavigationSearch } from "./mission-agent";
import type { MissionParameters } from "./mission-schema";
import { SimulatedChemical } from "./sensors";
import { SimulationWorld } from "./simulation-world";
import type { TicketService } from "./ticket-gateway";
import type { GridConfig } from "./types";

export const ESTUARY_BATTERY = 60;

export function estuaryGrid(windFactor: number = 1.5): GridConfig {
  return {
    width: 10,
    height: 10,
    base: { x: 0, y: 0 },
    urbanZones: [
      { x: 1, y: 1 },
      { x: 2, y: 1 },
      { x: 3, y: 1 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
      { x: 5, y: 5 },
      { x: 6, y: 5 },
      { x: 4, y: 3 },
      { x: 5, y: 3 },
    ],
    obstacles: [
      { x: 4, y: 4 },
      { x: 5, y: 4 },
      { x: 6, y: 3 },
      { x: 7, y: 4 },
      { x: 2, y: 6 },
    ],
    wind: { direction: "east", factor: windFactor },
  };
}

export interface EstuaryMissionOptions {
  tickets: TicketService;
  parameters: MissionParameters;
  battery?: number;
  windFactor?: number;
  search?: NavigationSearch;
}

export interface EstuaryMission {
  world: SimulationWorld;
  drone: Drone;
  agent: MissionAgent;
}

/**
 * Build the world and the drone, sync the agent with the open tickets and
 * drop a sample on each ticket's cell.
 */
export async function createEstuaryMission(options: EstuaryMissionOptions): Promise<EstuaryMission> {
  const battery = options.battery ?? ESTUARY_BATTERY;
  const grid = new GridWorld(estuaryGrid(options.windFactor));
  const world = new SimulationWorld({ grid, parameters: options.parameters });

  const agent = new MissionAgent({
    grid,
    tickets: options.tickets,
    batteryCapacity: battery,
    search: options.search,
    parameters: options.parameters,
  });
  await agent.sync();

  for (const ticket of agent.pendingTickets) {
    world.addSample({
      id: `sample-${ticket.id}`,
      ticketId: ticket.id,
      title: ticket.title,
      position: options.tickets.coordinatesOf(ticket),
      collected: false,
    });
  }

  const drone = new Drone("sentinel-1", agent, grid.base, {
    batteryCapacity: battery,
    chemical: new SimulatedChemical(),
  });
  world.addDrone(drone);

  return { world, drone, agent };
}

export interface MissionRunResult {
  steps: number;
  outcome: "complete" | "battery-exhausted" | "stuck" | "step-limit";
}

/**
 * Drive the perceive-decide-act loop until the world is done, the drone is
 * drained or stuck, or `maxSteps` is reached.
 */
export async function runMission(mission: EstuaryMission, maxSteps: number = 200): Promise<MissionRunResult> {
  const { world, drone, agent } = mission;

  while (!world.isDone() && world.getStepCount() < maxSteps) {
    await world.step();

    if (world.isComplete()) {
      return { steps: world.getStepCount(), outcome: "complete" };
    }
    if (world.getBattery(drone) <= 0) {
      console.warn(`[Mission] Battery exhausted after ${world.getStepCount()} steps, mission halted`);
      return { steps: world.getStepCount(), outcome: "battery-exhausted" };
    }
    if (agent.stuck) {
      console.warn(`[Mission] No progress possible after ${world.getStepCount()} steps, mission halted`);
      return { steps: world.getStepCount(), outcome: "stuck" };
    }
  }

  return { steps: world.getStepCount(), outcome: world.isDone() ? "complete" : "step-limit" };
}

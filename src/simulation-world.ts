/**
 * SimulationWorld - authoritative state of the monitoring mission.
 *
 * Owns the per-drone battery ledger and the per-drone collected-sample
 * ledger. Drones never change these directly: every effect goes through
 * executeAction(), which reports refusals as outcomes instead of throwing.
 */

import type { Drone } from "./drone";
import { GridWorld } from "./grid-world";
import { DEFAULT_MISSION_PARAMETERS, type MissionParameters } from "./mission-schema";
import { SimulatedProximity, SimulatedTelemetry } from "./sensors";
import {
  distance,
  formatPosition,
  isDirection,
  move,
  samePosition,
  type ActionOutcome,
  type GridConfig,
  type MonitoringSample,
  type Percept,
  type Position,
} from "./types";

function copySample(sample: MonitoringSample): MonitoringSample {
  return {
    ...sample,
    position: { ...sample.position },
    reading: sample.reading ? { ...sample.reading } : undefined,
  };
}

export interface SimulationWorldOptions {
  grid: GridConfig | GridWorld;
  parameters?: MissionParameters;
}

export class SimulationWorld {
  readonly grid: GridWorld;
  readonly params: MissionParameters;
  drones: Drone[] = [];
  samples: MonitoringSample[] = [];

  private batteries: Map<string, number> = new Map();
  private collected: Map<string, MonitoringSample[]> = new Map();
  private telemetry: Map<string, SimulatedTelemetry> = new Map();
  private stepCount: number = 0;

  constructor(options: SimulationWorldOptions) {
    this.grid = options.grid instanceof GridWorld ? options.grid : new GridWorld(options.grid);
    this.params = options.parameters ?? DEFAULT_MISSION_PARAMETERS;
  }

  /**
   * Register a drone at `location` (the base by default) with a full battery.
   */
  addDrone(drone: Drone, location: Position = this.grid.base): void {
    if (!this.grid.isPassable(location)) {
      throw new Error(`Cannot place drone ${drone.id} at ${formatPosition(location)}`);
    }
    drone.position = { ...location };
    drone.isActive = true;
    this.drones.push(drone);
    this.batteries.set(drone.id, drone.batteryCapacity);
    this.collected.set(drone.id, []);
    this.telemetry.set(drone.id, new SimulatedTelemetry(location, drone.batteryCapacity, drone.batteryCapacity));
  }

  addSample(sample: MonitoringSample): void {
    if (!this.grid.inBounds(sample.position)) {
      throw new Error(`Sample ${sample.id} at ${formatPosition(sample.position)} is outside the grid`);
    }
    this.samples.push(copySample(sample));
  }

  getBattery(drone: Drone): number {
    return this.batteries.get(drone.id) ?? drone.batteryCapacity;
  }

  getCollectedSamples(drone: Drone): MonitoringSample[] {
    return (this.collected.get(drone.id) ?? []).map(copySample);
  }

  getStepCount(): number {
    return this.stepCount;
  }

  deactivate(drone: Drone): void {
    if (!drone.isActive) return;
    drone.isActive = false;
    console.log(`[World] ${drone.id} deactivated at ${formatPosition(drone.position)}`);
  }

  percept(drone: Drone): Percept {
    const radius = this.params.perception.sampleRadius;
    const nearbySamples = this.samples
      .filter((s) => !s.collected)
      .map((s) => ({ sample: copySample(s), distance: distance(s.position, drone.position) }))
      .filter((n) => n.distance <= radius);

    return {
      location: { ...drone.position },
      battery: this.getBattery(drone),
      nearbySamples,
      isUrban: this.grid.isUrban(drone.position),
      atBase: samePosition(drone.position, this.grid.base),
    };
  }

  executeAction(drone: Drone, action: string | null): ActionOutcome {
    if (action === null || action === "NOOP") {
      return { kind: "noop" };
    }
    if (action !== "COLLECT" && !isDirection(action)) {
      return { kind: "ignored", action };
    }

    const battery = this.getBattery(drone);
    if (battery <= 0) {
      return { kind: "refused", reason: "battery-depleted" };
    }

    if (action === "COLLECT") {
      return this.collect(drone, battery);
    }

    drone.bump = false;
    const target = move(drone.position, action);
    if (!this.grid.inBounds(target)) {
      drone.bump = true;
      return { kind: "bumped", reason: "out-of-bounds", target };
    }
    if (this.grid.isObstacle(target)) {
      drone.bump = true;
      return { kind: "bumped", reason: "obstacle", target };
    }

    const cost = this.grid.stepCost(target, this.params.energy);
    if (battery < cost) {
      return { kind: "refused", reason: "insufficient-battery", required: cost };
    }

    const from = { ...drone.position };
    this.batteries.set(drone.id, battery - cost);
    drone.moveTo(target);
    const telemetry = this.telemetry.get(drone.id);
    telemetry?.setPosition(target);
    telemetry?.consumeBattery(cost);
    return { kind: "moved", from, to: { ...target }, cost };
  }

  // One charge per sample, all in this call; the ledger may go negative.
  private collect(drone: Drone, battery: number): ActionOutcome {
    const here = this.samples.filter((s) => !s.collected && samePosition(s.position, drone.position));
    if (here.length === 0) {
      return { kind: "noop" };
    }

    const ledger = this.collected.get(drone.id) ?? [];
    for (const sample of here) {
      sample.collected = true;
      if (drone.chemical) {
        sample.reading = drone.chemical.getContaminationReading();
      }
      ledger.push(copySample(sample));
    }
    this.collected.set(drone.id, ledger);

    const cost = here.length * this.params.energy.collectCost;
    this.batteries.set(drone.id, battery - cost);
    this.telemetry.get(drone.id)?.consumeBattery(cost);
    drone.samplesCollected += here.length;

    return { kind: "collected", samples: here.map(copySample), cost };
  }

  /**
   * Every sample is collected and every active drone is back at base,
   * whatever charge is left.
   */
  isComplete(): boolean {
    const active = this.drones.filter((d) => d.isActive);
    return (
      this.samples.every((s) => s.collected) && active.every((d) => samePosition(d.position, this.grid.base))
    );
  }

  isDone(): boolean {
    const active = this.drones.filter((d) => d.isActive);
    if (active.length === 0) {
      return true;
    }
    if (active.every((d) => this.getBattery(d) <= 0)) {
      return true;
    }
    return this.isComplete();
  }

  /**
   * Advance one step: each active drone perceives, decides and acts once,
   * one drone after the other.
   */
  async step(): Promise<void> {
    this.stepCount++;

    for (const drone of this.drones) {
      if (!drone.isActive) continue;

      const action = await drone.program.decide(this.percept(drone));
      drone.currentAction = action;
      const outcome = this.executeAction(drone, action);

      switch (outcome.kind) {
        case "bumped":
          console.log(`[World] ${drone.id} bumped (${outcome.reason}) moving ${action} to ${formatPosition(outcome.target)}`);
          break;
        case "refused":
          console.log(`[World] ${drone.id} refused ${action}: ${outcome.reason}`);
          break;
        case "collected":
          console.log(
            `[World] ${drone.id} collected ${outcome.samples.map((s) => s.id).join(", ")} at ${formatPosition(drone.position)}`
          );
          break;
        default:
          break;
      }
    }
  }

  /**
   * Live telemetry feed of a registered drone, updated by every move and
   * collection. Unregistered drones get a one-off reading.
   */
  telemetryFor(drone: Drone): SimulatedTelemetry {
    return (
      this.telemetry.get(drone.id) ??
      new SimulatedTelemetry(drone.position, this.getBattery(drone), drone.batteryCapacity)
    );
  }

  proximityFor(drone: Drone): SimulatedProximity {
    return new SimulatedProximity(this.grid, drone.position);
  }
}

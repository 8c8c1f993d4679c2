/**
 * Drone - a body in the simulation world driven by a decision program.
 * The world owns battery and collected samples; the drone only tracks its
 * position, its bump flag and some counters for the report.
 */

import type { ChemicalSensor } from "./sensors";
import type { MissionAction, Percept, Position } from "./types";

export interface DroneProgram {
  decide(percept: Percept): Promise<MissionAction>;
}

export interface DroneOptions {
  batteryCapacity?: number;
  chemical?: ChemicalSensor;
}

export class Drone {
  id: string;
  position: Position;
  batteryCapacity: number;
  program: DroneProgram;
  chemical: ChemicalSensor | null;
  isActive: boolean = true;

  // Set when the last movement hit a wall or an obstacle
  bump: boolean = false;

  cellsTraveled: number = 0;
  samplesCollected: number = 0;
  currentAction: MissionAction | "Idle" = "Idle";

  constructor(id: string, program: DroneProgram, position: Position = { x: 0, y: 0 }, options: DroneOptions = {}) {
    this.id = id;
    this.program = program;
    this.position = { ...position };
    this.batteryCapacity = options.batteryCapacity ?? 100;
    this.chemical = options.chemical ?? null;
  }

  moveTo(position: Position): void {
    this.position = { ...position };
    this.cellsTraveled++;
  }
}

/**
 * Sensor capabilities. Each capability is its own interface so a drone only
 * carries (and the world only wires) what it actually reads.
 */

import type { GridWorld } from "./grid-world";
import { comparePositions, distance, type Position } from "./types";

export interface TelemetrySensor {
  getPosition(): Position;
  /** Remaining charge as a percentage of capacity, 0-100. */
  getBatteryLevel(): number;
}

export interface ChemicalSensor {
  getContaminationReading(): Record<string, number>;
}

export interface ProximitySensor {
  getObstaclesNearby(radius?: number): Position[];
}

export interface VisionSensor {
  captureImage(): Uint8Array;
  getThermalReading(): number;
}

export class SimulatedTelemetry implements TelemetrySensor {
  private position: Position;
  private battery: number;

  constructor(position: Position, battery: number, private readonly capacity: number = 100) {
    this.position = { ...position };
    this.battery = battery;
  }

  getPosition(): Position {
    return { ...this.position };
  }

  getBatteryLevel(): number {
    if (this.capacity <= 0) return 0;
    return Math.max(0, Math.min(100, (this.battery * 100) / this.capacity));
  }

  setPosition(position: Position): void {
    this.position = { ...position };
  }

  consumeBattery(amount: number): void {
    this.battery = Math.max(0, this.battery - amount);
  }
}

export const HEALTHY_WATER_READING: Readonly<Record<string, number>> = {
  mercury: 0,
  lead: 0,
  dissolvedOxygen: 6.5,
};

export class SimulatedChemical implements ChemicalSensor {
  private readings: Record<string, number>;

  constructor(readings: Record<string, number> = HEALTHY_WATER_READING) {
    this.readings = { ...readings };
  }

  getContaminationReading(): Record<string, number> {
    return { ...this.readings };
  }
}

/**
 * Reports obstacle cells within a Euclidean radius of a fixed position.
 */
export class SimulatedProximity implements ProximitySensor {
  constructor(private readonly grid: GridWorld, private readonly position: Position) {}

  getObstaclesNearby(radius: number = 1): Position[] {
    const reach = Math.floor(radius);
    const found: Position[] = [];

    for (let y = this.position.y - reach; y <= this.position.y + reach; y++) {
      for (let x = this.position.x - reach; x <= this.position.x + reach; x++) {
        const cell = { x, y };
        if (this.grid.inBounds(cell) && this.grid.isObstacle(cell) && distance(cell, this.position) <= radius) {
          found.push(cell);
        }
      }
    }
    return found.sort(comparePositions);
  }
}

export class SimulatedVision implements VisionSensor {
  constructor(private readonly thermal: number = 26.5, private readonly frameSize: number = 64) {}

  // Blank frame; the simulation has no imagery
  captureImage(): Uint8Array {
    return new Uint8Array(this.frameSize);
  }

  getThermalReading(): number {
    return this.thermal;
  }
}

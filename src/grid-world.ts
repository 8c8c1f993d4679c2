/**
 * GridWorld - static grid geometry shared by the planner and the simulation.
 * Bounds, obstacle and urban-zone lookups, step costs and the wind-adjusted
 * distance used by the heuristic.
 */

import { cellKey, formatPosition, type GridConfig, type Position, type WindConfig } from "./types";
import type { EnergyParameters } from "./mission-schema";

export class GridWorld {
  readonly width: number;
  readonly height: number;
  readonly base: Position;
  readonly wind: WindConfig;

  private obstacles: Set<string>;
  private urbanZones: Set<string>;

  constructor(readonly config: GridConfig) {
    if (!Number.isInteger(config.width) || !Number.isInteger(config.height) || config.width < 1 || config.height < 1) {
      throw new Error(`Invalid grid size ${config.width}x${config.height}`);
    }
    if (config.wind.factor < 1) {
      throw new Error(`Wind factor must be at least 1, got ${config.wind.factor}`);
    }

    this.width = config.width;
    this.height = config.height;
    this.base = { ...config.base };
    this.wind = { ...config.wind };
    this.obstacles = new Set(config.obstacles.map(cellKey));
    this.urbanZones = new Set(config.urbanZones.map(cellKey));

    if (!this.inBounds(this.base)) {
      throw new Error(`Base ${formatPosition(this.base)} is outside the ${this.width}x${this.height} grid`);
    }
    if (this.isObstacle(this.base)) {
      throw new Error(`Base ${formatPosition(this.base)} is on an obstacle`);
    }
  }

  inBounds(pos: Position): boolean {
    return pos.x >= 0 && pos.x < this.width && pos.y >= 0 && pos.y < this.height;
  }

  isObstacle(pos: Position): boolean {
    return this.obstacles.has(cellKey(pos));
  }

  isUrban(pos: Position): boolean {
    return this.urbanZones.has(cellKey(pos));
  }

  isPassable(pos: Position): boolean {
    return this.inBounds(pos) && !this.isObstacle(pos);
  }

  /**
   * Battery charged for entering `destination`. The origin never matters.
   */
  stepCost(destination: Position, energy: EnergyParameters): number {
    return this.isUrban(destination) ? energy.urbanMoveCost : energy.moveCost;
  }

  /**
   * Manhattan distance with the horizontal part scaled by the wind factor when
   * travelling against the prevailing wind. An east wind penalises eastward
   * (increasing x) travel, a west wind westward travel.
   */
  windAdjustedDistance(from: Position, to: Position): number {
    const dx = Math.abs(from.x - to.x);
    const dy = Math.abs(from.y - to.y);

    const againstWind =
      (this.wind.direction === "east" && to.x > from.x) ||
      (this.wind.direction === "west" && to.x < from.x);

    return (againstWind ? dx * this.wind.factor : dx) + dy;
  }
}

/**
 * NavigationProblem - one planning leg of the drone mission.
 *
 * States are (position, battery, pending targets). A leg either visits a single
 * target and ends on it, or has no targets and ends on the base. The battery
 * strictly decreases along every transition, so the state space is finite.
 */

import { GridWorld } from "./grid-world";
import { DEFAULT_MISSION_PARAMETERS, type EnergyParameters } from "./mission-schema";
import type { HasState, SearchProblem } from "./search-problem";
import { TargetSet } from "./target-set";
import {
  DIRECTIONS,
  cellKey,
  move,
  samePosition,
  type Direction,
  type GridConfig,
  type Position,
} from "./types";

export interface NavigationState {
  readonly position: Position;
  readonly battery: number;
  readonly targets: TargetSet;
}

export function navigationState(position: Position, battery: number, targets: Iterable<Position> = []): NavigationState {
  return {
    position: { x: position.x, y: position.y },
    battery,
    targets: targets instanceof TargetSet ? targets : new TargetSet(targets),
  };
}

export interface NavigationProblemOptions {
  initial: NavigationState;
  // Cell the leg must end on: the single target, or the base when returning
  goal: Position;
  grid: GridConfig | GridWorld;
  energy?: EnergyParameters;
}

export class NavigationProblem implements SearchProblem<NavigationState, Direction, Position> {
  initial: NavigationState;
  goal: Position;
  readonly grid: GridWorld;
  readonly energy: EnergyParameters;

  constructor(options: NavigationProblemOptions) {
    this.initial = options.initial;
    this.goal = { ...options.goal };
    this.grid = options.grid instanceof GridWorld ? options.grid : new GridWorld(options.grid);
    this.energy = options.energy ?? DEFAULT_MISSION_PARAMETERS.energy;
    if (this.energy.moveCost < 1 || this.energy.urbanMoveCost < 1) {
      throw new Error(
        `Move costs must be at least 1, got moveCost=${this.energy.moveCost} urbanMoveCost=${this.energy.urbanMoveCost}`
      );
    }
  }

  /**
   * Moves available from `state`, always listed in UP, DOWN, LEFT, RIGHT order.
   * A drained battery yields no moves at all.
   */
  actions(state: NavigationState): Direction[] {
    if (state.battery <= 0) {
      return [];
    }
    return DIRECTIONS.filter((dir) => this.grid.isPassable(move(state.position, dir)));
  }

  result(state: NavigationState, action: Direction): NavigationState {
    const position = move(state.position, action);
    return {
      position,
      battery: state.battery - this.grid.stepCost(position, this.energy),
      targets: state.targets.without(position),
    };
  }

  goalTest(state: NavigationState): boolean {
    return state.targets.isEmpty() && samePosition(state.position, this.goal) && state.battery >= 0;
  }

  pathCost(cost: number, _from: NavigationState, _action: Direction, to: NavigationState): number {
    return cost + this.grid.stepCost(to.position, this.energy);
  }

  /**
   * Wind-adjusted estimate of the remaining cost. With targets left, the
   * cheapest detour through any single one of them.
   */
  h(target: NavigationState | HasState<NavigationState>): number {
    const state = "state" in target ? target.state : target;
    const here = state.position;

    if (state.targets.isEmpty()) {
      return this.grid.windAdjustedDistance(here, this.goal);
    }

    let best = Infinity;
    for (const t of state.targets) {
      const estimate = this.grid.windAdjustedDistance(here, t) + this.grid.windAdjustedDistance(t, this.goal);
      best = Math.min(best, estimate);
    }
    return best;
  }

  stateKey(state: NavigationState): string {
    return `${cellKey(state.position)}|${state.battery}|${state.targets.key}`;
  }
}

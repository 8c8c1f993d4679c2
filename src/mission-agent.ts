/**
 * MissionAgent - problem-solving program for the monitoring drone.
 *
 * Each step the agent merges the percept into its memory, and when its queued
 * plan runs out it picks the next goal, formulates a single-leg
 * NavigationProblem and asks the search procedure for a route. Low battery
 * triggers an expected-utility comparison between the next target and home.
 */

import type { DroneProgram } from "./drone";
import type { GridWorld } from "./grid-world";
import { DEFAULT_MISSION_PARAMETERS, type MissionParameters } from "./mission-schema";
import { NavigationProblem, navigationState, type NavigationState } from "./navigation-problem";
import { astarSearch } from "./search";
import type { SearchProblem, SearchResult } from "./search-problem";
import type { TicketService } from "./ticket-gateway";
import {
  comparePositions,
  formatPosition,
  manhattan,
  samePosition,
  type Direction,
  type MissionAction,
  type Percept,
  type Position,
  type Ticket,
} from "./types";

export type MissionPhase = "syncing" | "selecting-goal" | "planning" | "awaiting-execution" | "returning" | "complete";

export type NavigationSearch = (
  problem: SearchProblem<NavigationState, Direction, Position>
) => SearchResult<Direction> | null;

export interface MissionAgentOptions {
  grid: GridWorld;
  tickets: TicketService;
  batteryCapacity: number;
  search?: NavigationSearch;
  parameters?: MissionParameters;
}

export interface MissionReport {
  processedTickets: number;
  pendingTickets: number;
  battery: number;
  position: Position;
  atBase: boolean;
  missionComplete: boolean;
  stuck: boolean;
  phase: MissionPhase;
}

export class MissionAgent implements DroneProgram {
  readonly grid: GridWorld;
  readonly base: Position;
  readonly batteryCapacity: number;
  readonly params: MissionParameters;

  phase: MissionPhase = "syncing";
  position: Position;
  battery: number;
  pendingTargets: Position[] = [];
  pendingTickets: Ticket[] = [];
  processedTickets: Ticket[] = [];
  currentTicket: Ticket | null = null;
  returningToBase: boolean = false;
  missionComplete: boolean = false;
  stuck: boolean = false;

  private plan: MissionAction[] = [];
  private tickets: TicketService;
  private searchProcedure: NavigationSearch;

  constructor(options: MissionAgentOptions) {
    this.grid = options.grid;
    this.base = { ...options.grid.base };
    this.batteryCapacity = options.batteryCapacity;
    this.params = options.parameters ?? DEFAULT_MISSION_PARAMETERS;
    this.tickets = options.tickets;
    this.searchProcedure = options.search ?? astarSearch;

    this.position = { ...this.base };
    this.battery = this.batteryCapacity;
  }

  get queuedActions(): MissionAction[] {
    return [...this.plan];
  }

  /**
   * Load the open tickets and turn their coordinates into pending targets.
   */
  async sync(): Promise<void> {
    const open = await this.tickets.listOpenTickets();
    const targets = new Map<string, Position>();

    console.log(`[Mission] Synced ${open.length} open ticket(s)`);
    for (const ticket of open) {
      const coord = this.tickets.coordinatesOf(ticket);
      targets.set(`${coord.x},${coord.y}`, coord);
      console.log(`[Mission]   #${ticket.id}: ${ticket.title} @ ${formatPosition(coord)}`);
    }

    this.pendingTargets = Array.from(targets.values()).sort(comparePositions);
    this.pendingTickets = open;
    this.phase = "selecting-goal";
  }

  /**
   * Merge a percept into memory. Arriving on a pending target closes every
   * pending ticket at that coordinate.
   */
  async updateState(percept: Percept): Promise<void> {
    this.position = { ...percept.location };
    this.battery = percept.battery;

    if (!this.pendingTargets.some((t) => samePosition(t, this.position))) {
      return;
    }
    this.pendingTargets = this.pendingTargets.filter((t) => !samePosition(t, this.position));

    const here = this.pendingTickets.filter((t) => samePosition(this.tickets.coordinatesOf(t), this.position));
    for (const ticket of here) {
      await this.tickets.updateTicketStatus(ticket.id, "closed", {
        batteryRemaining: this.battery,
        collectionPosition: [this.position.x, this.position.y],
      });
      this.processedTickets.push(ticket);
      if (this.currentTicket?.id === ticket.id) {
        this.currentTicket = null;
      }
    }
    this.pendingTickets = this.pendingTickets.filter((t) => !here.includes(t));
  }

  /**
   * Expected utility of flying to `destination`. Continuing to a target
   * prices the round trip back to base; returning prices the direct leg.
   */
  utility(destination: Position, returning: boolean): number {
    const d = this.params.decision;
    const distance = returning
      ? manhattan(this.position, destination)
      : manhattan(this.position, destination) + manhattan(destination, this.base);

    if (distance === 0) {
      return 100;
    }

    const success = Math.min(1, this.battery / Math.max(distance * d.costPerStepEstimate, 1));
    const reward = returning ? d.baseReward : d.targetReward;
    const penalty = returning ? d.basePenalty : d.targetPenalty;
    const risk = !returning && this.grid.isUrban(destination) ? d.urbanRiskFactor : 1;

    return success * reward * risk - (1 - success) * penalty;
  }

  /**
   * Choose the next goal cell, or null once the mission is over.
   */
  async formulateGoal(): Promise<Position | null> {
    if (this.missionComplete) {
      return null;
    }

    if (this.pendingTargets.length === 0) {
      if (samePosition(this.position, this.base)) {
        this.missionComplete = true;
        this.phase = "complete";
        console.log("[Mission] Mission complete, drone at base");
        return null;
      }
      this.returningToBase = true;
      console.log("[Mission] No targets left, returning to base");
      return { ...this.base };
    }

    // pendingTargets is kept in canonical order, so the first minimum wins ties
    let candidate = this.pendingTargets[0];
    for (const t of this.pendingTargets) {
      if (manhattan(this.position, t) < manhattan(this.position, candidate)) {
        candidate = t;
      }
    }

    const threshold = this.params.decision.lowBatteryRatio * this.batteryCapacity;
    if (this.battery < threshold) {
      const toTarget = this.utility(candidate, false);
      const toBase = this.utility(this.base, true);
      console.log(
        `[Mission] Low battery (${this.battery}/${this.batteryCapacity}): ` +
          `U(target ${formatPosition(candidate)}) = ${toTarget.toFixed(2)}, U(base) = ${toBase.toFixed(2)}`
      );

      if (toBase > toTarget) {
        console.log("[Mission] Abandoning remaining targets, returning to base");
        this.returningToBase = true;
        this.pendingTargets = [];
        return { ...this.base };
      }
    }

    const ticket = this.pendingTickets.find((t) => samePosition(this.tickets.coordinatesOf(t), candidate));
    if (ticket) {
      await this.tickets.updateTicketStatus(ticket.id, "in_progress");
      this.currentTicket = ticket;
    }

    console.log(`[Mission] Goal ${formatPosition(candidate)} (battery ${this.battery})`);
    return { ...candidate };
  }

  formulateProblem(goal: Position): NavigationProblem {
    const targets = this.returningToBase ? [] : [goal];
    return new NavigationProblem({
      initial: navigationState(this.position, this.battery, targets),
      goal: this.returningToBase ? this.base : goal,
      grid: this.grid,
      energy: this.params.energy,
    });
  }

  /**
   * Route for one leg. A failed leg forces a single retry straight home;
   * an empty list means the drone is stuck.
   */
  search(problem: NavigationProblem): MissionAction[] {
    const result = this.searchProcedure(problem);

    if (result) {
      const actions: MissionAction[] = [...result.actions];
      if (!this.returningToBase) {
        actions.push("COLLECT");
      }
      console.log(`[Mission] Plan: ${actions.join(" ")} (${actions.length} actions)`);
      return actions;
    }

    console.warn(`[Mission] No route from ${formatPosition(this.position)} to ${formatPosition(problem.goal)}`);
    if (this.returningToBase) {
      return [];
    }

    this.returningToBase = true;
    this.pendingTargets = [];
    const fallback = this.searchProcedure(
      new NavigationProblem({
        initial: navigationState(this.position, this.battery),
        goal: this.base,
        grid: this.grid,
        energy: this.params.energy,
      })
    );
    if (!fallback) {
      return [];
    }
    console.log(`[Mission] Return route: ${fallback.actions.join(" ")}`);
    return [...fallback.actions];
  }

  async decide(percept: Percept): Promise<MissionAction> {
    if (this.phase === "syncing") {
      await this.sync();
    }
    await this.updateState(percept);

    const queued = this.plan.shift();
    if (queued !== undefined) {
      return queued;
    }
    if (this.missionComplete) {
      return "NOOP";
    }

    this.phase = "selecting-goal";
    const goal = await this.formulateGoal();
    if (goal === null) {
      return "NOOP";
    }

    this.phase = "planning";
    const actions = this.search(this.formulateProblem(goal));
    if (actions.length === 0) {
      if (this.returningToBase && samePosition(this.position, this.base)) {
        // Already home: goal selection now completes the mission
        await this.formulateGoal();
        return "NOOP";
      }
      this.stuck = true;
      this.phase = "selecting-goal";
      console.error(`[Mission] Stuck at ${formatPosition(this.position)} with battery ${this.battery}`);
      return "NOOP";
    }

    this.stuck = false;
    this.plan = actions;
    this.phase = this.returningToBase ? "returning" : "awaiting-execution";
    return this.plan.shift() ?? "NOOP";
  }

  report(): MissionReport {
    return {
      processedTickets: this.processedTickets.length,
      pendingTickets: this.pendingTickets.length,
      battery: this.battery,
      position: { ...this.position },
      atBase: samePosition(this.position, this.base),
      missionComplete: this.missionComplete,
      stuck: this.stuck,
      phase: this.phase,
    };
  }
}

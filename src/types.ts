/**
 * Core types for the monitoring drone mission.
 */

export interface Position {
  x: number;
  y: number;
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function distance(a: Position, b: Position): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function cellKey(pos: Position): string {
  return `${pos.x},${pos.y}`;
}

export function formatPosition(pos: Position): string {
  return `(${pos.x}, ${pos.y})`;
}

/**
 * Sort order used wherever positions need a canonical sequence.
 */
export function comparePositions(a: Position, b: Position): number {
  return a.x === b.x ? a.y - b.y : a.x - b.x;
}

export type Direction = "UP" | "DOWN" | "LEFT" | "RIGHT";

export type MissionAction = Direction | "COLLECT" | "NOOP";

// Order matters: actions() lists directions in this order.
export const DIRECTIONS: readonly Direction[] = ["UP", "DOWN", "LEFT", "RIGHT"];

export const DIRECTION_VECTORS: Record<Direction, { dx: number; dy: number }> = {
  UP: { dx: 0, dy: -1 },
  DOWN: { dx: 0, dy: 1 },
  LEFT: { dx: -1, dy: 0 },
  RIGHT: { dx: 1, dy: 0 },
};

export function isDirection(action: string): action is Direction {
  return action === "UP" || action === "DOWN" || action === "LEFT" || action === "RIGHT";
}

export function move(pos: Position, direction: Direction): Position {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  return { x: pos.x + dx, y: pos.y + dy };
}

export type WindDirection = "east" | "west" | "none";

export interface WindConfig {
  direction: WindDirection;
  factor: number;
}

export interface GridConfig {
  width: number;
  height: number;
  obstacles: readonly Position[];
  urbanZones: readonly Position[];
  base: Position;
  wind: WindConfig;
}

export type TicketStatus = "open" | "in_progress" | "closed";

export const TICKET_STATUSES: readonly TicketStatus[] = ["open", "in_progress", "closed"];

export interface TicketPayload {
  [key: string]: unknown;
}

export interface Ticket {
  id: number;
  title: string;
  description: string;
  status: TicketStatus;
  coordinates: Position;
  payload: TicketPayload | null;
}

export interface MonitoringSample {
  id: string;
  ticketId: number;
  title: string;
  position: Position;
  collected: boolean;
  reading?: Record<string, number>;
}

export interface NearbySample {
  sample: MonitoringSample;
  distance: number;
}

/**
 * What a drone observes at the start of each step.
 * All values are copies; mutating them has no effect on the world.
 */
export interface Percept {
  location: Position;
  battery: number;
  nearbySamples: NearbySample[];
  isUrban: boolean;
  atBase: boolean;
}

export type ActionOutcome =
  | { kind: "noop" }
  | { kind: "ignored"; action: string }
  | { kind: "refused"; reason: "battery-depleted" }
  | { kind: "refused"; reason: "insufficient-battery"; required: number }
  | { kind: "bumped"; reason: "out-of-bounds" | "obstacle"; target: Position }
  | { kind: "moved"; from: Position; to: Position; cost: number }
  | { kind: "collected"; samples: MonitoringSample[]; cost: number };

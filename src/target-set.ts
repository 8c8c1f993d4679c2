/**
 * Immutable set of target cells with a canonical, order-independent key.
 */

import { cellKey, comparePositions, samePosition, type Position } from "./types";

export class TargetSet implements Iterable<Position> {
  static readonly EMPTY = new TargetSet([]);

  readonly key: string;
  private readonly positions: readonly Position[];

  constructor(positions: Iterable<Position>) {
    const unique = new Map<string, Position>();
    for (const p of positions) {
      unique.set(cellKey(p), { x: p.x, y: p.y });
    }
    this.positions = Array.from(unique.values()).sort(comparePositions);
    this.key = this.positions.map(cellKey).join(";");
  }

  get size(): number {
    return this.positions.length;
  }

  isEmpty(): boolean {
    return this.positions.length === 0;
  }

  has(pos: Position): boolean {
    return this.positions.some((p) => samePosition(p, pos));
  }

  /**
   * Same set minus `pos`. Returns `this` when `pos` is not a member.
   */
  without(pos: Position): TargetSet {
    if (!this.has(pos)) {
      return this;
    }
    return new TargetSet(this.positions.filter((p) => !samePosition(p, pos)));
  }

  equals(other: TargetSet): boolean {
    return this.key === other.key;
  }

  toArray(): Position[] {
    return this.positions.map((p) => ({ ...p }));
  }

  [Symbol.iterator](): Iterator<Position> {
    return this.toArray()[Symbol.iterator]();
  }
}

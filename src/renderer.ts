/**
 * Text renderer for the simulation grid.
 */

import type { SimulationWorld } from "./simulation-world";
import { samePosition, type Position } from "./types";

export const CELL_SYMBOLS = {
  drone: "D",
  sample: "S",
  obstacle: "#",
  base: "B",
  urban: "U",
  empty: ".",
} as const;

function symbolAt(world: SimulationWorld, cell: Position): string {
  if (world.drones.some((d) => d.isActive && samePosition(d.position, cell))) return CELL_SYMBOLS.drone;
  if (world.samples.some((s) => !s.collected && samePosition(s.position, cell))) return CELL_SYMBOLS.sample;
  if (world.grid.isObstacle(cell)) return CELL_SYMBOLS.obstacle;
  if (samePosition(world.grid.base, cell)) return CELL_SYMBOLS.base;
  if (world.grid.isUrban(cell)) return CELL_SYMBOLS.urban;
  return CELL_SYMBOLS.empty;
}

/**
 * One string per row, preceded by an x-axis legend. Rows are labelled by y.
 */
export function renderGrid(world: SimulationWorld): string[] {
  const { width, height } = world.grid;
  const labelWidth = String(height - 1).length;
  const pad = " ".repeat(labelWidth + 1);

  const xs = Array.from({ length: width }, (_, x) => String(x % 10));
  const lines = [pad + xs.join(" ")];

  for (let y = 0; y < height; y++) {
    const cells: string[] = [];
    for (let x = 0; x < width; x++) {
      cells.push(symbolAt(world, { x, y }));
    }
    lines.push(`${String(y).padStart(labelWidth)} ${cells.join(" ")}`);
  }
  return lines;
}

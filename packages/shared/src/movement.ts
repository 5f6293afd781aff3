import type { Coord, Direction } from './types/player.js';
import type { MazeGrid, StepResult } from './maze/maze-types.js';
import { resolveStep } from './maze/collision.js';

/**
 * Grid convention: x grows to the right, y grows downward.
 * Up is (0, -1), so moving up from row 0 always leaves the grid.
 */
export const DIRECTION_OFFSETS: Record<Direction, Coord> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

// Keyboard names the host may forward as-is
const DIRECTION_ALIASES = new Map<string, Direction>([
  ['up', 'up'],
  ['down', 'down'],
  ['left', 'left'],
  ['right', 'right'],
  ['arrowup', 'up'],
  ['arrowdown', 'down'],
  ['arrowleft', 'left'],
  ['arrowright', 'right'],
  ['w', 'up'],
  ['s', 'down'],
  ['a', 'left'],
  ['d', 'right'],
]);

export function parseDirection(input: string): Direction | null {
  return DIRECTION_ALIASES.get(input.trim().toLowerCase()) ?? null;
}

export function proposeMove(current: Coord, direction: Direction): Coord {
  const offset = DIRECTION_OFFSETS[direction];
  return { x: current.x + offset.x, y: current.y + offset.y };
}

/**
 * One step from `current` toward `direction`, validated against the grid.
 * Deterministic and side-effect free; reaching the exit is just an
 * accepted step.
 */
export function applyMovement(grid: MazeGrid, current: Coord, direction: Direction): StepResult {
  return resolveStep(grid, proposeMove(current, direction));
}

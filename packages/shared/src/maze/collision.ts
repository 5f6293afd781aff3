import type { Coord } from '../types/player.js';
import type { MazeGrid, StepResult } from './maze-types.js';

// ═══════════════════════════════════════════════════════════════
// Cell collision: a step lands only on a walkable cell.
// Walls and everything outside the grid block movement.
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a candidate cell against the grid. Pure: the caller commits
 * the position and counts the move.
 */
export function resolveStep(grid: MazeGrid, candidate: Coord): StepResult {
  if (grid.isWalkable(candidate.x, candidate.y)) {
    return { kind: 'accepted', position: { x: candidate.x, y: candidate.y } };
  }
  return { kind: 'rejected', position: { x: candidate.x, y: candidate.y } };
}

export function isAtExit(grid: MazeGrid, position: Coord): boolean {
  return position.x === grid.end.x && position.y === grid.end.y;
}

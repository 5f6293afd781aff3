import type { Coord } from '../types/player.js';

// ═══════════════════════════════════════════════════════════════
// Maze Data Model: one character per cell, row-delimited text
// '#' = wall, '.' = path, 'S' = start, 'E' = end (S/E are walkable)
// ═══════════════════════════════════════════════════════════════

export type Cell = 'wall' | 'path' | 'start' | 'end';

export const CELL_CHARS: ReadonlyMap<string, Cell> = new Map<string, Cell>([
  ['#', 'wall'],
  ['.', 'path'],
  ['S', 'start'],
  ['E', 'end'],
]);

export const CELL_GLYPHS: Record<Cell, string> = {
  wall: '#',
  path: '.',
  start: 'S',
  end: 'E',
};

// Immutable once built: lifetime is a single stage
export interface MazeGrid {
  readonly width: number;
  readonly height: number;
  readonly start: Coord; // from the descriptor, never scanned
  readonly end: Coord;
  cellAt(x: number, y: number): Cell; // out of bounds = 'wall'
  isWalkable(x: number, y: number): boolean;
  rows(): string[]; // normalized layout, one string per row
}

// Stage as served by the Level Data Service, before parsing
export interface LevelDescriptor {
  stageNumber: number;
  rawLayout: string;
  width: number;
  height: number;
  start: Coord;
  end: Coord;
}

export interface ParseError {
  kind: 'malformed_layout';
  message: string;
}

export type ParseResult =
  | { ok: true; grid: MazeGrid }
  | { ok: false; error: ParseError };

// ═══════════════════════════════════════════════════════════════
// Step resolution: result of validating one proposed step
// ═══════════════════════════════════════════════════════════════

export interface AcceptedStep {
  kind: 'accepted';
  position: Coord;
}

export interface RejectedStep {
  kind: 'rejected';
  position: Coord; // the candidate that was refused
}

export type StepResult = AcceptedStep | RejectedStep;

import type { Coord } from '../types/player.js';
import type { Cell, LevelDescriptor, MazeGrid, ParseResult } from './maze-types.js';
import { CELL_CHARS, CELL_GLYPHS } from './maze-types.js';

export const MAX_GRID_DIMENSION = 512;

// ═══════════════════════════════════════════════════════════════
// Layout text → rows
// ═══════════════════════════════════════════════════════════════

function splitRows(rawText: string): string[] {
  // Blank lines around the layout are not rows; blank lines inside it are
  const trimmed = rawText.replace(/^[\r\n]+|[\r\n]+$/g, '');
  if (trimmed.length === 0) return [];
  return trimmed.split(/\r?\n/);
}

function isValidDimension(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_GRID_DIMENSION;
}

function malformed(message: string): ParseResult {
  return { ok: false, error: { kind: 'malformed_layout', message } };
}

// ═══════════════════════════════════════════════════════════════
// Grid construction
// ═══════════════════════════════════════════════════════════════

function createGrid(
  width: number,
  height: number,
  cells: readonly Cell[],
  start: Coord,
  end: Coord,
): MazeGrid {
  const cellAt = (x: number, y: number): Cell => {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return 'wall';
    if (x < 0 || x >= width || y < 0 || y >= height) return 'wall';
    return cells[y * width + x];
  };

  return Object.freeze({
    width,
    height,
    start: Object.freeze({ x: start.x, y: start.y }),
    end: Object.freeze({ x: end.x, y: end.y }),
    cellAt,
    isWalkable: (x: number, y: number) => cellAt(x, y) !== 'wall',
    rows: () => {
      const out: string[] = [];
      for (let y = 0; y < height; y++) {
        let row = '';
        for (let x = 0; x < width; x++) row += CELL_GLYPHS[cells[y * width + x]];
        out.push(row);
      }
      return out;
    },
  });
}

/**
 * Parses row-delimited layout text into a fixed `width` × `height` grid.
 *
 * Short rows are right-padded with wall, long rows are cut at `width`,
 * rows past `height` are dropped and missing rows become all-wall.
 * `start` and `end` are taken as given; the layout is never scanned for
 * 'S'/'E' markers. Both must land on walkable cells.
 */
export function parseMaze(
  rawText: string,
  width: number,
  height: number,
  endpoints: { start: Coord; end: Coord },
): ParseResult {
  if (!isValidDimension(width) || !isValidDimension(height)) {
    return malformed(`Invalid grid size ${width}x${height}`);
  }

  const rows = splitRows(rawText);
  const cells: Cell[] = new Array<Cell>(width * height).fill('wall');

  const keptRows = Math.min(rows.length, height);
  for (let y = 0; y < keptRows; y++) {
    const row = rows[y];
    const keptCols = Math.min(row.length, width);
    for (let x = 0; x < keptCols; x++) {
      const ch = row[x];
      const cell = CELL_CHARS.get(ch);
      if (!cell) {
        return malformed(`Unknown cell character '${ch}' at (${x}, ${y})`);
      }
      cells[y * width + x] = cell;
    }
  }

  Object.freeze(cells);
  const grid = createGrid(width, height, cells, endpoints.start, endpoints.end);

  if (!grid.isWalkable(endpoints.start.x, endpoints.start.y)) {
    return malformed(`Start (${endpoints.start.x}, ${endpoints.start.y}) is not on a walkable cell`);
  }
  if (!grid.isWalkable(endpoints.end.x, endpoints.end.y)) {
    return malformed(`End (${endpoints.end.x}, ${endpoints.end.y}) is not on a walkable cell`);
  }

  return { ok: true, grid };
}

export function parseLevel(descriptor: LevelDescriptor): ParseResult {
  return parseMaze(descriptor.rawLayout, descriptor.width, descriptor.height, {
    start: descriptor.start,
    end: descriptor.end,
  });
}

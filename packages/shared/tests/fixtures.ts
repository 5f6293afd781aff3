import type { Direction } from '../src/index.js';

export const CORRIDOR_LAYOUT = [
  '###########',
  '#........S#',
  '#.########.',
  '#.........#',
  '########.##',
  '#........##',
  '#.#########',
  '#........E#',
  '###########',
].join('\n');

export const CORRIDOR_ENDPOINTS = { start: { x: 1, y: 1 }, end: { x: 9, y: 7 } };

const repeat = (direction: Direction, times: number): Direction[] =>
  Array.from({ length: times }, () => direction);

// (1,1) → (9,7) along the only corridor
export const CORRIDOR_SOLUTION: Direction[] = [
  ...repeat('down', 2),
  ...repeat('right', 7),
  ...repeat('down', 2),
  ...repeat('left', 7),
  ...repeat('down', 2),
  ...repeat('right', 8),
];

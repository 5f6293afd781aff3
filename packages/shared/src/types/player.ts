export interface Coord {
  x: number; // column, 0..width-1
  y: number; // row, 0..height-1 (top row is 0)
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export interface PlayerState {
  position: Coord;
  moves: number; // accepted moves in the active stage
}

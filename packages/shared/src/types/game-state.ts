import type { MazeGrid } from '../maze/maze-types.js';
import type { Coord, PlayerState } from './player.js';

export type LifecyclePhase = 'idle' | 'loading' | 'active' | 'stage_complete' | 'game_complete';

// A StageSession exists only once its grid has loaded
export type StageStatus = 'active' | 'complete';

export type GameStatus = 'not_started' | 'in_progress' | 'finished';

export interface GameSettings {
  totalStages: number;
  fetchTimeoutMs: number;
  analyticsQueueDepth: number;
  analyticsMaxInFlight: number;
  analyticsTimeoutMs: number;
  inputQueueDepth: number;
}

export const DEFAULT_GAME_SETTINGS: GameSettings = {
  totalStages: 10,
  fetchTimeoutMs: 10000,
  analyticsQueueDepth: 100,
  analyticsMaxInFlight: 4,
  analyticsTimeoutMs: 5000,
  inputQueueDepth: 32,
};

export interface StageSession {
  stageNumber: number;
  grid: MazeGrid;
  player: PlayerState;
  status: StageStatus;
  elapsedMs: number;
}

export interface StageOutcome {
  stageNumber: number;
  moves: number;
  elapsedMs: number;
}

export interface GameSession {
  status: GameStatus;
  completed: StageOutcome[];
  totalMoves: number;
  totalTimeMs: number;
}

export type LoadErrorKind =
  | 'malformed_layout'
  | 'not_found'
  | 'network'
  | 'server_error'
  | 'timeout'
  | 'cancelled';

export interface LoadError {
  kind: LoadErrorKind;
  stageNumber: number;
  message: string;
}

// What the presentation layer reads each frame
export interface RenderSnapshot {
  phase: LifecyclePhase;
  stageNumber: number;
  totalStages: number;
  grid: MazeGrid | null;
  player: Coord | null;
  elapsedMs: number;
  moveCount: number;
  totalMoves: number;
  totalTimeMs: number;
  error: LoadError | null;
}

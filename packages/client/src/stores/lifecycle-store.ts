import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type {
  AcceptedStep,
  GameSession,
  LifecyclePhase,
  LoadError,
  MazeGrid,
  StageOutcome,
  StageSession,
} from '@maze/shared';
import { isAtExit } from '@maze/shared';

// idle → loading → active → stage_complete → (loading | game_complete) → idle
export interface LifecycleState {
  phase: LifecyclePhase;
  totalStages: number;
  stageNumber: number;
  stage: StageSession | null;
  game: GameSession;
  lastError: LoadError | null;

  // Actions
  resetGame: () => void;
  beginLoading: (stageNumber: number) => boolean;
  loadSucceeded: (stageNumber: number, grid: MazeGrid) => boolean;
  loadFailed: (error: LoadError) => boolean;
  commitMove: (step: AcceptedStep) => StageOutcome | null;
  advanceTime: (dtMs: number) => void;
  nextStageNumber: () => number | null;
  exitToIdle: () => void;
}

export type LifecycleStore = StoreApi<LifecycleState>;

const freshGame = (): GameSession => ({
  status: 'not_started',
  completed: [],
  totalMoves: 0,
  totalTimeMs: 0,
});

export function createLifecycleStore(totalStages: number): LifecycleStore {
  if (!Number.isInteger(totalStages) || totalStages < 1) {
    throw new Error(`totalStages must be a positive integer, got ${totalStages}`);
  }

  return createStore<LifecycleState>()((set, get) => ({
    phase: 'idle',
    totalStages,
    stageNumber: 0,
    stage: null,
    game: freshGame(),
    lastError: null,

    resetGame: () => set({ game: { ...freshGame(), status: 'in_progress' }, lastError: null }),

    beginLoading: (stageNumber) => {
      const { phase, game } = get();
      // A live stage must be finished or exited first
      if (phase === 'active') return false;
      if (!Number.isInteger(stageNumber) || stageNumber < 1 || stageNumber > totalStages) return false;

      set({
        phase: 'loading',
        stageNumber,
        stage: null,
        lastError: null,
        game: game.status === 'in_progress' ? game : { ...freshGame(), status: 'in_progress' },
      });
      return true;
    },

    loadSucceeded: (stageNumber, grid) => {
      const { phase } = get();
      if (phase !== 'loading' || get().stageNumber !== stageNumber) return false;
      if (!grid.isWalkable(grid.start.x, grid.start.y)) return false;

      set({
        phase: 'active',
        stage: {
          stageNumber,
          grid,
          player: { position: { x: grid.start.x, y: grid.start.y }, moves: 0 },
          status: 'active',
          elapsedMs: 0,
        },
        lastError: null,
      });
      return true;
    },

    loadFailed: (error) => {
      if (get().phase !== 'loading') return false;
      set({ phase: 'idle', stage: null, lastError: error });
      return true;
    },

    commitMove: (step) => {
      const { phase, stage, game } = get();
      if (phase !== 'active' || !stage) return null;
      // Exactly one cell along one axis from the current position
      const { position } = stage.player;
      const distance = Math.abs(step.position.x - position.x) + Math.abs(step.position.y - position.y);
      if (distance !== 1) return null;
      if (!stage.grid.isWalkable(step.position.x, step.position.y)) return null;

      const player = { position: { x: step.position.x, y: step.position.y }, moves: stage.player.moves + 1 };

      if (!isAtExit(stage.grid, player.position)) {
        set({ stage: { ...stage, player } });
        return null;
      }

      const outcome: StageOutcome = {
        stageNumber: stage.stageNumber,
        moves: player.moves,
        elapsedMs: stage.elapsedMs,
      };
      const isFinal = stage.stageNumber >= totalStages;

      set({
        phase: isFinal ? 'game_complete' : 'stage_complete',
        stage: { ...stage, player, status: 'complete' },
        game: {
          status: isFinal ? 'finished' : game.status,
          completed: [...game.completed, outcome],
          totalMoves: game.totalMoves + outcome.moves,
          totalTimeMs: game.totalTimeMs + outcome.elapsedMs,
        },
      });
      return outcome;
    },

    advanceTime: (dtMs) => {
      const { phase, stage } = get();
      if (phase !== 'active' || !stage) return;
      if (!Number.isFinite(dtMs) || dtMs <= 0) return;
      set({ stage: { ...stage, elapsedMs: stage.elapsedMs + dtMs } });
    },

    nextStageNumber: () => {
      const { phase, stageNumber } = get();
      return phase === 'stage_complete' ? stageNumber + 1 : null;
    },

    exitToIdle: () => set({ phase: 'idle', stage: null }),
  }));
}

import type { AnalyticsEvent, Direction, LoadError, MazeGrid, RenderSnapshot, StageOutcome } from '@maze/shared';
import {
  applyMovement,
  createGameCompleteEvent,
  createGameStartEvent,
  createLevelCompleteEvent,
  nowInSeconds,
  parseLevel,
} from '@maze/shared';
import type { AnalyticsSink } from '../analytics/dispatcher.js';
import type { LevelSource } from '../networking/level-client.js';
import { createLifecycleStore } from '../stores/lifecycle-store.js';
import type { LifecycleStore } from '../stores/lifecycle-store.js';
import { InputQueue } from './input-queue.js';

export type MoveOutcome = 'accepted' | 'rejected' | 'ignored';

export type LoadOutcome = 'loaded' | 'failed' | 'abandoned' | 'ignored';

export interface MazeEngineOptions {
  levels: LevelSource;
  analytics: AnalyticsSink | null;
  playerId: string;
  totalStages: number;
  inputQueueDepth: number;
  autoAdvance?: boolean;
  clock?: () => number; // Unix seconds for event timestamps
}

const DEFAULT_TICK_RATE = 60;

/**
 * Top-level glue between input, movement validation, the lifecycle store
 * and the two side channels (level fetch, analytics).
 *
 * `move`, `tick` and `getSnapshot` are synchronous. Level loads are async and
 * leave the engine in `loading` until they settle; their promises never
 * reject, failures end up in `snapshot.error`.
 */
export class MazeEngine {
  readonly store: LifecycleStore;

  private readonly levels: LevelSource;
  private readonly analytics: AnalyticsSink | null;
  private readonly playerId: string;
  private readonly autoAdvance: boolean;
  private readonly clock: () => number;
  private readonly inputs: InputQueue;

  private loadGeneration = 0;
  private loadController: AbortController | null = null;
  private tickerId: ReturnType<typeof setInterval> | null = null;
  private lastTickAt = 0;

  constructor(options: MazeEngineOptions) {
    this.store = createLifecycleStore(options.totalStages);
    this.levels = options.levels;
    this.analytics = options.analytics;
    this.playerId = options.playerId;
    this.autoAdvance = options.autoAdvance ?? false;
    this.clock = options.clock ?? nowInSeconds;
    this.inputs = new InputQueue(options.inputQueueDepth);
  }

  // ===== Commands =====

  /** Begins a new run at stage 1, abandoning whatever was in progress. */
  startGame(): Promise<LoadOutcome> {
    this.cancelLoad();
    this.inputs.clear();
    this.store.getState().exitToIdle();
    this.store.getState().resetGame();
    console.log(`[Engine] Starting game for ${this.playerId}`);
    this.emit(createGameStartEvent(this.playerId, this.clock()));
    return this.loadStage(1);
  }

  restart(): Promise<LoadOutcome> {
    return this.startGame();
  }

  advance(): Promise<LoadOutcome> {
    const next = this.store.getState().nextStageNumber();
    if (next === null) return Promise.resolve('ignored');
    return this.loadStage(next);
  }

  /** Reloads the stage whose load failed. */
  retry(): Promise<LoadOutcome> {
    const { phase, lastError } = this.store.getState();
    if (phase !== 'idle' || !lastError) return Promise.resolve('ignored');
    return this.loadStage(lastError.stageNumber);
  }

  /** Abandons any in-flight fetch; its late result is discarded. */
  exit(): void {
    this.cancelLoad();
    this.inputs.clear();
    this.store.getState().exitToIdle();
  }

  move(direction: Direction): MoveOutcome {
    const { phase, stage } = this.store.getState();
    if (phase !== 'active' || !stage) return 'ignored';

    const step = applyMovement(stage.grid, stage.player.position, direction);
    if (step.kind === 'rejected') return 'rejected';

    const outcome = this.store.getState().commitMove(step);
    if (outcome) this.onStageComplete(outcome);
    return 'accepted';
  }

  queueInput(direction: Direction): boolean {
    if (this.store.getState().phase !== 'active') return false;
    return this.inputs.push(direction);
  }

  /** One frame: buffered inputs in order, then the stage timer. */
  tick(dtMs: number): void {
    for (const direction of this.inputs.drain()) {
      this.move(direction);
    }
    this.store.getState().advanceTime(dtMs);
  }

  startTicker(tickRate = DEFAULT_TICK_RATE): void {
    if (!Number.isFinite(tickRate) || tickRate <= 0) {
      throw new Error(`tickRate must be a positive number, got ${tickRate}`);
    }
    if (this.tickerId) return;
    this.lastTickAt = Date.now();
    this.tickerId = setInterval(() => {
      const now = Date.now();
      this.tick(now - this.lastTickAt);
      this.lastTickAt = now;
    }, 1000 / tickRate);
  }

  stopTicker(): void {
    if (this.tickerId) {
      clearInterval(this.tickerId);
      this.tickerId = null;
    }
  }

  dispose(): void {
    this.stopTicker();
    this.exit();
    this.analytics?.close();
  }

  // ===== Render state =====

  getSnapshot(): RenderSnapshot {
    const { phase, stageNumber, totalStages, stage, game, lastError } = this.store.getState();
    return {
      phase,
      stageNumber,
      totalStages,
      grid: stage ? stage.grid : null,
      player: stage ? { x: stage.player.position.x, y: stage.player.position.y } : null,
      elapsedMs: stage ? stage.elapsedMs : 0,
      moveCount: stage ? stage.player.moves : 0,
      totalMoves: game.totalMoves,
      totalTimeMs: game.totalTimeMs,
      error: lastError,
    };
  }

  subscribe(listener: (snapshot: RenderSnapshot) => void): () => void {
    return this.store.subscribe(() => listener(this.getSnapshot()));
  }

  // ===== Internals =====

  private async loadStage(stageNumber: number): Promise<LoadOutcome> {
    this.cancelLoad();
    if (!this.store.getState().beginLoading(stageNumber)) return 'ignored';

    const generation = ++this.loadGeneration;
    const controller = new AbortController();
    this.loadController = controller;
    console.log(`[Engine] Loading stage ${stageNumber}...`);

    const result = await this.fetchGrid(stageNumber, controller.signal);
    if (this.loadController === controller) this.loadController = null;
    if (generation !== this.loadGeneration) return 'abandoned';

    if (!result.ok) {
      console.warn(`[Engine] Failed to load stage ${stageNumber}: ${result.error.message}`);
      this.store.getState().loadFailed(result.error);
      return 'failed';
    }

    this.store.getState().loadSucceeded(stageNumber, result.grid);
    console.log(`[Engine] Stage ${stageNumber} loaded and ready`);
    return 'loaded';
  }

  private async fetchGrid(
    stageNumber: number,
    signal: AbortSignal,
  ): Promise<{ ok: true; grid: MazeGrid } | { ok: false; error: LoadError }> {
    try {
      const result = await this.levels.fetchLevel(stageNumber, { signal });
      if (!result.ok) {
        return { ok: false, error: { kind: result.error.kind, stageNumber, message: result.error.message } };
      }
      const parsed = parseLevel(result.descriptor);
      if (!parsed.ok) {
        return { ok: false, error: { kind: parsed.error.kind, stageNumber, message: parsed.error.message } };
      }
      return { ok: true, grid: parsed.grid };
    } catch (err) {
      // LevelSource implementations should not throw; treat it as transport failure
      return { ok: false, error: { kind: 'network', stageNumber, message: err instanceof Error ? err.message : String(err) } };
    }
  }

  private cancelLoad(): void {
    this.loadGeneration++;
    this.loadController?.abort();
    this.loadController = null;
  }

  private onStageComplete(outcome: StageOutcome): void {
    const seconds = (outcome.elapsedMs / 1000).toFixed(1);
    console.log(`[Engine] Stage ${outcome.stageNumber} completed in ${seconds}s with ${outcome.moves} moves`);
    this.emit(createLevelCompleteEvent(this.playerId, outcome, this.clock()));

    const { phase, game } = this.store.getState();
    if (phase === 'game_complete') {
      console.log(`[Engine] Game complete: ${game.totalMoves} moves`);
      this.emit(createGameCompleteEvent(this.playerId, game, this.clock()));
    } else if (this.autoAdvance) {
      void this.advance();
    }
  }

  private emit(event: AnalyticsEvent): void {
    this.analytics?.submit(event);
  }
}

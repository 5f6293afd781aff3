import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MazeEngine } from '../src/engine/maze-engine.js';
import type { MazeEngineOptions } from '../src/engine/maze-engine.js';
import {
  CORRIDOR_SOLUTION,
  DeferredLevelSource,
  FakeLevelSource,
  RecordingSink,
  corridorLevel,
  shortLevel,
} from './fixtures.js';

function createEngine(overrides: Partial<MazeEngineOptions> = {}) {
  const sink = new RecordingSink();
  const levels = new FakeLevelSource([corridorLevel(1), corridorLevel(2)]);
  const engine = new MazeEngine({
    levels,
    analytics: sink,
    playerId: 'tester',
    totalStages: 2,
    inputQueueDepth: 8,
    clock: () => 1700000000,
    ...overrides,
  });
  return { engine, sink, levels };
}

function expectPlayerOnWalkableCell(engine: MazeEngine) {
  const snapshot = engine.getSnapshot();
  if (!snapshot.grid || !snapshot.player) return;
  expect(snapshot.grid.isWalkable(snapshot.player.x, snapshot.player.y)).toBe(true);
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('MazeEngine: corridor stage', () => {
  it('accepts no movement while the stage is loading', async () => {
    const { engine } = createEngine();

    const loading = engine.startGame();
    expect(engine.getSnapshot().phase).toBe('loading');
    expect(engine.move('down')).toBe('ignored');

    await expect(loading).resolves.toBe('loaded');
    expect(engine.getSnapshot()).toMatchObject({ phase: 'active', stageNumber: 1, player: { x: 1, y: 1 }, moveCount: 0 });
  });

  it('completes the stage after walking the corridor and reports it once', async () => {
    const { engine, sink } = createEngine();
    await engine.startGame();

    expect(engine.move('up')).toBe('rejected');
    let accepted = 0;
    for (const direction of CORRIDOR_SOLUTION) {
      if (engine.move(direction) === 'accepted') accepted++;
      expectPlayerOnWalkableCell(engine);
    }

    const snapshot = engine.getSnapshot();
    expect(accepted).toBe(28);
    expect(snapshot.phase).toBe('stage_complete');
    expect(snapshot.moveCount).toBe(28);
    expect(snapshot.player).toEqual({ x: 9, y: 7 });

    const levelEvents = sink.ofType('level_complete');
    expect(levelEvents).toHaveLength(1);
    expect(levelEvents[0]).toMatchObject({ playerId: 'tester', stageNumber: 1, movesCount: 28 });
    expect(sink.ofType('game_complete')).toHaveLength(0);
  });

  it('leaves state untouched on repeated rejected moves', async () => {
    const { engine } = createEngine();
    await engine.startGame();
    engine.move('down');
    const before = engine.store.getState().stage;

    for (let i = 0; i < 5; i++) {
      expect(engine.move('right')).toBe('rejected');
    }

    expect(engine.store.getState().stage).toBe(before);
    expect(engine.getSnapshot().moveCount).toBe(1);
  });

  it('keeps the exit out of reach of a jump through the store', async () => {
    const { engine, sink } = createEngine();
    await engine.startGame();

    const outcome = engine.store.getState().commitMove({ kind: 'accepted', position: { x: 9, y: 7 } });

    expect(outcome).toBeNull();
    expect(engine.getSnapshot()).toMatchObject({ phase: 'active', player: { x: 1, y: 1 }, moveCount: 0 });
    expect(sink.events.map((event) => event.type)).toEqual(['game_start']);
  });

  it('freezes the player once the stage is complete', async () => {
    const { engine } = createEngine();
    await engine.startGame();
    for (const direction of CORRIDOR_SOLUTION) engine.move(direction);

    expect(engine.move('left')).toBe('ignored');
    expect(engine.getSnapshot().player).toEqual({ x: 9, y: 7 });
  });
});

describe('MazeEngine: game progression', () => {
  it('reaches game complete only after the final stage, with summed totals', async () => {
    const { engine, sink } = createEngine();
    await engine.startGame();

    engine.tick(500);
    engine.tick(500);
    for (const direction of CORRIDOR_SOLUTION) engine.move(direction);
    expect(engine.getSnapshot().phase).toBe('stage_complete');

    await expect(engine.advance()).resolves.toBe('loaded');
    expect(engine.getSnapshot()).toMatchObject({ phase: 'active', stageNumber: 2, moveCount: 0, elapsedMs: 0 });

    engine.tick(250);
    engine.move('up');
    for (const direction of CORRIDOR_SOLUTION) engine.move(direction);

    const snapshot = engine.getSnapshot();
    expect(snapshot.phase).toBe('game_complete');
    expect(snapshot.totalMoves).toBe(56);
    expect(snapshot.totalTimeMs).toBe(1250);
    expect(engine.store.getState().game.status).toBe('finished');
    expect(engine.store.getState().game.completed).toEqual([
      { stageNumber: 1, moves: 28, elapsedMs: 1000 },
      { stageNumber: 2, moves: 28, elapsedMs: 250 },
    ]);

    expect(sink.events.map((event) => event.type)).toEqual([
      'game_start',
      'level_complete',
      'level_complete',
      'game_complete',
    ]);
    expect(sink.ofType('game_complete')[0]).toEqual({
      type: 'game_complete',
      playerId: 'tester',
      totalTime: 1.25,
      totalMoves: 56,
      timestamp: 1700000000,
    });
  });

  it('ignores advance when no stage has just been completed', async () => {
    const { engine } = createEngine();
    await engine.startGame();

    await expect(engine.advance()).resolves.toBe('ignored');
    expect(engine.getSnapshot().phase).toBe('active');
  });

  it('restarts from game complete with fresh aggregates', async () => {
    const { engine, sink } = createEngine({ totalStages: 1 });
    await engine.startGame();
    for (const direction of CORRIDOR_SOLUTION) engine.move(direction);
    expect(engine.getSnapshot().phase).toBe('game_complete');

    await expect(engine.restart()).resolves.toBe('loaded');

    expect(engine.getSnapshot()).toMatchObject({ phase: 'active', stageNumber: 1, totalMoves: 0, moveCount: 0 });
    expect(engine.store.getState().game).toEqual({ status: 'in_progress', completed: [], totalMoves: 0, totalTimeMs: 0 });
    expect(sink.ofType('game_start')).toHaveLength(2);
  });

  it('loads the next stage on its own when auto-advance is on', async () => {
    const { engine } = createEngine({
      levels: new FakeLevelSource([shortLevel(1), shortLevel(2)]),
      autoAdvance: true,
    });
    await engine.startGame();

    engine.move('right');
    engine.move('right');
    expect(engine.getSnapshot().phase).toBe('loading');

    await vi.waitFor(() => expect(engine.getSnapshot().phase).toBe('active'));
    expect(engine.getSnapshot().stageNumber).toBe(2);
  });
});

describe('MazeEngine: load failures', () => {
  it('goes idle with the error visible and retries the same stage', async () => {
    const levels = new FakeLevelSource();
    const { engine } = createEngine({ levels });

    await expect(engine.startGame()).resolves.toBe('failed');
    expect(engine.getSnapshot()).toMatchObject({
      phase: 'idle',
      grid: null,
      player: null,
      error: { kind: 'not_found', stageNumber: 1, message: 'Stage 1 not found' },
    });

    levels.levels.set(1, shortLevel(1));
    await expect(engine.retry()).resolves.toBe('loaded');
    expect(engine.getSnapshot()).toMatchObject({ phase: 'active', stageNumber: 1, error: null });
    expect(levels.requested).toEqual([1, 1]);
  });

  it('reports a malformed layout as a load error', async () => {
    const broken = { ...shortLevel(1), rawLayout: 'S?E' };
    const { engine } = createEngine({ levels: new FakeLevelSource([broken]) });

    await expect(engine.startGame()).resolves.toBe('failed');
    expect(engine.getSnapshot().error).toEqual({
      kind: 'malformed_layout',
      stageNumber: 1,
      message: "Unknown cell character '?' at (1, 0)",
    });
  });

  it('discards a fetch that resolves after the player exits', async () => {
    const levels = new DeferredLevelSource();
    const { engine } = createEngine({ levels });

    const loading = engine.startGame();
    const [request] = levels.pending;
    engine.exit();

    expect(request.signal?.aborted).toBe(true);
    request.resolve({ ok: true, descriptor: corridorLevel(1), cached: false });

    await expect(loading).resolves.toBe('abandoned');
    expect(engine.getSnapshot()).toMatchObject({ phase: 'idle', grid: null, player: null });
  });

  it('ignores retry when nothing failed', async () => {
    const { engine } = createEngine();

    await expect(engine.retry()).resolves.toBe('ignored');
  });
});

describe('MazeEngine: ticks and input', () => {
  it('applies queued inputs in order on the next tick', async () => {
    const { engine } = createEngine({ levels: new FakeLevelSource([shortLevel(1), shortLevel(2)]) });
    expect(engine.queueInput('right')).toBe(false);
    await engine.startGame();

    expect(engine.queueInput('left')).toBe(true);
    expect(engine.queueInput('right')).toBe(true);
    expect(engine.queueInput('right')).toBe(true);
    expect(engine.getSnapshot().moveCount).toBe(0);

    engine.tick(16);

    expect(engine.getSnapshot()).toMatchObject({ phase: 'stage_complete', moveCount: 2, player: { x: 2, y: 0 } });
  });

  it('refuses inputs beyond the queue depth', async () => {
    const { engine } = createEngine({ inputQueueDepth: 2 });
    await engine.startGame();

    expect(engine.queueInput('down')).toBe(true);
    expect(engine.queueInput('down')).toBe(true);
    expect(engine.queueInput('down')).toBe(false);
  });

  it('advances the stage timer only while active', async () => {
    const { engine } = createEngine();
    engine.tick(100);
    await engine.startGame();

    engine.tick(40);
    engine.tick(-5);
    engine.tick(Number.NaN);

    expect(engine.getSnapshot().elapsedMs).toBe(40);
  });

  it('drives ticks from its own interval', async () => {
    const { engine } = createEngine();
    await engine.startGame();
    vi.useFakeTimers();

    engine.startTicker(10);
    vi.advanceTimersByTime(300);
    engine.stopTicker();
    vi.advanceTimersByTime(300);

    expect(engine.getSnapshot().elapsedMs).toBe(300);
  });

  it('rejects a tick rate that is not a positive number', async () => {
    const { engine } = createEngine();
    await engine.startGame();

    expect(() => engine.startTicker(0)).toThrow('tickRate must be a positive number, got 0');
    expect(() => engine.startTicker(-30)).toThrow('tickRate must be a positive number, got -30');
    expect(() => engine.startTicker(Number.NaN)).toThrow('tickRate must be a positive number, got NaN');
  });

  it('notifies subscribers with render snapshots', async () => {
    const { engine } = createEngine();
    const phases: string[] = [];
    const unsubscribe = engine.subscribe((snapshot) => phases.push(snapshot.phase));

    await engine.startGame();
    unsubscribe();
    engine.move('down');

    expect(phases[phases.length - 1]).toBe('active');
    expect(phases).toContain('loading');
  });

  it('closes the analytics sink on dispose', async () => {
    const { engine, sink } = createEngine();
    await engine.startGame();

    engine.dispose();

    expect(sink.closed).toBe(true);
    expect(engine.getSnapshot().phase).toBe('idle');
  });
});

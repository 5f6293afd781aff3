import type { AnalyticsEvent, AnalyticsMessage, Direction, LevelDescriptor } from '@maze/shared';
import type { AnalyticsSink } from '../src/analytics/dispatcher.js';
import type { AnalyticsTransport } from '../src/networking/analytics-transport.js';
import type { FetchLevelResult, LevelSource } from '../src/networking/level-client.js';

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

export function corridorLevel(stageNumber: number): LevelDescriptor {
  return {
    stageNumber,
    rawLayout: CORRIDOR_LAYOUT,
    width: 11,
    height: 9,
    start: { x: 1, y: 1 },
    end: { x: 9, y: 7 },
  };
}

// Two steps right from start to exit
export function shortLevel(stageNumber: number): LevelDescriptor {
  return {
    stageNumber,
    rawLayout: 'S.E',
    width: 3,
    height: 1,
    start: { x: 0, y: 0 },
    end: { x: 2, y: 0 },
  };
}

const repeat = (direction: Direction, times: number): Direction[] =>
  Array.from({ length: times }, () => direction);

export const CORRIDOR_SOLUTION: Direction[] = [
  ...repeat('down', 2),
  ...repeat('right', 7),
  ...repeat('down', 2),
  ...repeat('left', 7),
  ...repeat('down', 2),
  ...repeat('right', 8),
];

/** Level source backed by a map; unknown stages are not found. */
export class FakeLevelSource implements LevelSource {
  readonly levels = new Map<number, LevelDescriptor>();
  readonly requested: number[] = [];

  constructor(levels: LevelDescriptor[] = []) {
    for (const level of levels) this.levels.set(level.stageNumber, level);
  }

  async fetchLevel(stageNumber: number): Promise<FetchLevelResult> {
    this.requested.push(stageNumber);
    const descriptor = this.levels.get(stageNumber);
    if (!descriptor) {
      return { ok: false, error: { kind: 'not_found', stageNumber, message: `Stage ${stageNumber} not found` } };
    }
    return { ok: true, descriptor, cached: false };
  }
}

/** Level source whose responses the test releases by hand. */
export class DeferredLevelSource implements LevelSource {
  readonly pending: Array<{ stageNumber: number; signal?: AbortSignal; resolve: (result: FetchLevelResult) => void }> = [];

  fetchLevel(stageNumber: number, options: { signal?: AbortSignal } = {}): Promise<FetchLevelResult> {
    return new Promise((resolve) => {
      this.pending.push({ stageNumber, signal: options.signal, resolve });
    });
  }
}

export class RecordingSink implements AnalyticsSink {
  readonly events: AnalyticsEvent[] = [];
  closed = false;

  submit(event: AnalyticsEvent): boolean {
    this.events.push(event);
    return true;
  }

  close(): void {
    this.closed = true;
  }

  ofType<T extends AnalyticsEvent['type']>(type: T): Array<Extract<AnalyticsEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<AnalyticsEvent, { type: T }> => event.type === type);
  }
}

/** Transport whose sends never settle until released. */
export class StalledTransport implements AnalyticsTransport {
  readonly sent: AnalyticsMessage[] = [];
  private readonly releases: Array<() => void> = [];
  closed = false;

  send(message: AnalyticsMessage): Promise<void> {
    this.sent.push(message);
    return new Promise((resolve) => this.releases.push(resolve));
  }

  releaseAll(): void {
    for (const release of this.releases.splice(0)) release();
  }

  close(): void {
    this.closed = true;
  }
}

export const nextTurn = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

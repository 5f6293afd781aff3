import type { Direction } from '@maze/shared';

/**
 * Directional commands buffered between ticks. Bounded: once full,
 * further commands are refused until the next drain.
 */
export class InputQueue {
  private pending: Direction[] = [];
  private readonly maxDepth: number;

  constructor(maxDepth: number) {
    this.maxDepth = maxDepth;
  }

  get size(): number {
    return this.pending.length;
  }

  push(direction: Direction): boolean {
    if (this.pending.length >= this.maxDepth) return false;
    this.pending.push(direction);
    return true;
  }

  drain(): Direction[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  clear() {
    this.pending = [];
  }
}

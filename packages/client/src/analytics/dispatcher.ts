import { toAnalyticsMessage } from '@maze/shared';
import type { AnalyticsEvent } from '@maze/shared';
import type { AnalyticsTransport } from '../networking/analytics-transport.js';

export type OverflowPolicy = 'drop_oldest' | 'reject_new';

export interface DispatcherOptions {
  maxQueueDepth: number;
  maxInFlight: number;
  overflow?: OverflowPolicy;
  // Runs the drain off the caller's stack
  schedule?: (task: () => void) => void;
}

export interface DispatcherStats {
  submitted: number;
  delivered: number;
  failed: number;
  dropped: number;
  rejected: number;
  queued: number;
  inFlight: number;
}

// What the engine needs from an analytics pipeline
export interface AnalyticsSink {
  submit(event: AnalyticsEvent): boolean;
  close(): void;
}

const defaultSchedule = (task: () => void) => {
  setTimeout(task, 0);
};

/**
 * Fire-and-forget delivery of lifecycle events.
 *
 * `submit` only enqueues. A drain scheduled on a later turn hands events to
 * the transport, at most `maxInFlight` at a time, each exactly once. When the
 * queue is full the oldest event is dropped, or with `reject_new` the new one
 * is refused. Failures are logged and counted, never reported back.
 */
export class AnalyticsDispatcher implements AnalyticsSink {
  private readonly transport: AnalyticsTransport;
  private readonly maxQueueDepth: number;
  private readonly maxInFlight: number;
  private readonly overflow: OverflowPolicy;
  private readonly schedule: (task: () => void) => void;

  private queue: AnalyticsEvent[] = [];
  private inFlight = 0;
  private drainScheduled = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private counters = { submitted: 0, delivered: 0, failed: 0, dropped: 0, rejected: 0 };

  constructor(transport: AnalyticsTransport, options: DispatcherOptions) {
    if (!Number.isInteger(options.maxQueueDepth) || options.maxQueueDepth < 1) {
      throw new Error(`maxQueueDepth must be a positive integer, got ${options.maxQueueDepth}`);
    }
    if (!Number.isInteger(options.maxInFlight) || options.maxInFlight < 1) {
      throw new Error(`maxInFlight must be a positive integer, got ${options.maxInFlight}`);
    }
    this.transport = transport;
    this.maxQueueDepth = options.maxQueueDepth;
    this.maxInFlight = options.maxInFlight;
    this.overflow = options.overflow ?? 'drop_oldest';
    this.schedule = options.schedule ?? defaultSchedule;
  }

  submit(event: AnalyticsEvent): boolean {
    if (this.closed) {
      this.counters.rejected++;
      return false;
    }

    if (this.queue.length >= this.maxQueueDepth) {
      if (this.overflow === 'reject_new') {
        this.counters.rejected++;
        return false;
      }
      const dropped = this.queue.shift();
      this.counters.dropped++;
      if (dropped) console.warn(`[Analytics] Queue full, dropped oldest ${dropped.type} event`);
    }

    this.queue.push(event);
    this.counters.submitted++;
    this.scheduleDrain();
    return true;
  }

  stats(): DispatcherStats {
    return { ...this.counters, queued: this.queue.length, inFlight: this.inFlight };
  }

  /** Resolves once nothing is queued or in flight. Pending while the transport stalls. */
  flush(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.counters.dropped += this.queue.length;
    this.queue = [];
    this.transport.close();
    this.notifyIfIdle();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    this.schedule(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    while (!this.closed && this.inFlight < this.maxInFlight) {
      const event = this.queue.shift();
      if (!event) break;
      this.inFlight++;
      void this.deliver(event);
    }
    this.notifyIfIdle();
  }

  private async deliver(event: AnalyticsEvent): Promise<void> {
    try {
      await this.transport.send(toAnalyticsMessage(event));
      this.counters.delivered++;
      console.log(`[Analytics] Sent ${event.type} event`);
    } catch (err) {
      this.counters.failed++;
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[Analytics] Failed to send ${event.type} event: ${reason}`);
    } finally {
      this.inFlight--;
      if (this.queue.length > 0 && !this.closed) this.scheduleDrain();
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight === 0 && !this.drainScheduled;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

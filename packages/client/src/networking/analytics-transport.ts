import { io } from 'socket.io-client';
import type { Socket } from 'socket.io-client';
import type { AnalyticsMessage, ClientEvents, ServerEvents } from '@maze/shared';
import type { FetchFn } from './level-client.js';

/**
 * One delivery attempt per call. Resolves when the endpoint accepted the
 * message, rejects otherwise; never retries.
 */
export interface AnalyticsTransport {
  send(message: AnalyticsMessage): Promise<void>;
  close(): void;
}

// ═══════════════════════════════════════════════════════════════
// Socket.io transport: `analytics:event` with an ack
// ═══════════════════════════════════════════════════════════════

export class SocketAnalyticsTransport implements AnalyticsTransport {
  private readonly socket: Socket<ServerEvents, ClientEvents>;
  private readonly ackTimeoutMs: number;

  constructor(url: string, ackTimeoutMs: number) {
    this.ackTimeoutMs = ackTimeoutMs;
    this.socket = io(url, {
      transports: ['websocket'],
      autoConnect: true,
    });

    this.socket.on('connect', () => {
      console.log('[Analytics] Connected to ingestion endpoint');
    });

    this.socket.on('connect_error', (err) => {
      console.warn(`[Analytics] Ingestion endpoint unreachable: ${err.message}`);
    });
  }

  async send(message: AnalyticsMessage): Promise<void> {
    await this.waitForConnection();
    return new Promise((resolve, reject) => {
      // A timed-out packet is also removed from the socket's send buffer
      this.socket.timeout(this.ackTimeoutMs).emit('analytics:event', message, (err, ack) => {
        if (err) {
          reject(new Error(`No ack within ${this.ackTimeoutMs}ms`));
        } else if (!ack.accepted) {
          reject(new Error(ack.error ?? 'Event rejected by ingestion endpoint'));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.socket.disconnect();
  }

  private waitForConnection(): Promise<void> {
    if (this.socket.connected) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const onConnect = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.socket.off('connect', onConnect);
        reject(new Error(`Not connected after ${this.ackTimeoutMs}ms`));
      }, this.ackTimeoutMs);
      this.socket.once('connect', onConnect);
    });
  }
}

// ═══════════════════════════════════════════════════════════════
// HTTP transport: POST JSON, transport-level status only
// ═══════════════════════════════════════════════════════════════

export class HttpAnalyticsTransport implements AnalyticsTransport {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly inflight = new Set<AbortController>();

  constructor(url: string, timeoutMs: number, fetchImpl?: FetchFn) {
    this.url = url;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async send(message: AnalyticsMessage): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    this.inflight.add(controller);

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(message),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Ingestion endpoint responded ${response.status}`);
      }
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new Error(`Ingestion request aborted after ${this.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      this.inflight.delete(controller);
    }
  }

  close(): void {
    for (const controller of this.inflight) controller.abort();
    this.inflight.clear();
  }
}

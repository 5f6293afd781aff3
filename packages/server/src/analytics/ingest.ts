import { Router } from 'express';
import type { Server } from 'socket.io';
import { AnalyticsMessageSchema } from '@maze/shared';
import type { AnalyticsMessage, ClientEvents, IngestAck, ServerEvents } from '@maze/shared';

const DEFAULT_RETAINED = 500;

export interface IngestStats {
  accepted: number;
  rejected: number;
  byType: Record<AnalyticsMessage['event_type'], number>;
}

/**
 * Accepts analytics messages and keeps the most recent ones in memory.
 * Processing ends at validation and logging; nothing is persisted.
 */
export class AnalyticsIngest {
  private readonly retained: AnalyticsMessage[] = [];
  private readonly maxRetained: number;
  private readonly counts: IngestStats = {
    accepted: 0,
    rejected: 0,
    byType: { game_start: 0, level_complete: 0, game_complete: 0 },
  };

  constructor(maxRetained = DEFAULT_RETAINED) {
    this.maxRetained = maxRetained;
  }

  accept(payload: unknown): IngestAck {
    const parsed = AnalyticsMessageSchema.safeParse(payload);
    if (!parsed.success) {
      this.counts.rejected++;
      const issue = parsed.error.issues[0];
      const error = issue
        ? `Invalid analytics message: ${issue.path.join('.') || 'body'} ${issue.message}`
        : 'Invalid analytics message';
      console.warn(`[Ingest] ${error}`);
      return { accepted: false, error };
    }

    const message = parsed.data;
    this.counts.accepted++;
    this.counts.byType[message.event_type]++;
    this.retained.push(message);
    if (this.retained.length > this.maxRetained) this.retained.shift();

    console.log(`[Ingest] ${describe(message)}`);
    return { accepted: true };
  }

  recent(): AnalyticsMessage[] {
    return [...this.retained];
  }

  stats(): IngestStats {
    return { ...this.counts, byType: { ...this.counts.byType } };
  }
}

function describe(message: AnalyticsMessage): string {
  switch (message.event_type) {
    case 'game_start':
      return `${message.player_id} started a game`;
    case 'level_complete':
      return `${message.player_id} completed stage ${message.stage_number} in ${message.time_taken.toFixed(1)}s with ${message.moves_count} moves`;
    case 'game_complete':
      return `${message.player_id} completed the game in ${message.total_time.toFixed(1)}s with ${message.total_moves} moves`;
  }
}

// POST /analytics → 202 {accepted: true} | 400 {accepted: false, error}
export function createAnalyticsRouter(ingest: AnalyticsIngest): Router {
  const router = Router();

  router.post('/analytics', (req, res) => {
    const ack = ingest.accept(req.body);
    res.status(ack.accepted ? 202 : 400).json(ack);
  });

  return router;
}

export function registerIngestHandlers(io: Server<ClientEvents, ServerEvents>, ingest: AnalyticsIngest): void {
  io.on('connection', (socket) => {
    console.log(`[Server] Analytics client connected: ${socket.id}`);
    socket.emit('connection:welcome', { connectionId: socket.id });

    socket.on('analytics:event', (message, ack) => {
      const result = ingest.accept(message);
      if (typeof ack === 'function') ack(result);
    });

    socket.on('disconnect', (reason) => {
      console.log(`[Server] Analytics client disconnected: ${socket.id} (${reason})`);
    });
  });
}

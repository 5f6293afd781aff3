import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// Analytics events: created at lifecycle boundaries
// Times are seconds, timestamps are Unix seconds
// ═══════════════════════════════════════════════════════════════

export interface GameStartEvent {
  type: 'game_start';
  playerId: string;
  timestamp: number;
}

export interface LevelCompleteEvent {
  type: 'level_complete';
  playerId: string;
  stageNumber: number;
  timeTaken: number;
  movesCount: number;
  timestamp: number;
}

export interface GameCompleteEvent {
  type: 'game_complete';
  playerId: string;
  totalTime: number;
  totalMoves: number;
  timestamp: number;
}

export type AnalyticsEvent = GameStartEvent | LevelCompleteEvent | GameCompleteEvent;

// ===== Wire messages (ingestion endpoint) =====

const playerId = z.string().min(1).max(100);
const timestamp = z.number().nonnegative();

export const GameStartMessageSchema = z.object({
  event_type: z.literal('game_start'),
  player_id: playerId,
  timestamp,
});

export const LevelCompleteMessageSchema = z.object({
  event_type: z.literal('level_complete'),
  player_id: playerId,
  stage_number: z.number().int().min(1),
  time_taken: z.number().nonnegative(),
  moves_count: z.number().int().nonnegative(),
  timestamp,
});

export const GameCompleteMessageSchema = z.object({
  event_type: z.literal('game_complete'),
  player_id: playerId,
  total_time: z.number().nonnegative(),
  total_moves: z.number().int().nonnegative(),
  timestamp,
});

export const AnalyticsMessageSchema = z.discriminatedUnion('event_type', [
  GameStartMessageSchema,
  LevelCompleteMessageSchema,
  GameCompleteMessageSchema,
]);

export type AnalyticsMessage = z.infer<typeof AnalyticsMessageSchema>;

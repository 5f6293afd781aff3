import type {
  AnalyticsEvent,
  AnalyticsMessage,
  GameCompleteEvent,
  GameStartEvent,
  LevelCompleteEvent,
} from '../types/analytics.js';
import type { StageOutcome } from '../types/game-state.js';

export function nowInSeconds(): number {
  return Date.now() / 1000;
}

export function createGameStartEvent(playerId: string, timestamp = nowInSeconds()): GameStartEvent {
  return { type: 'game_start', playerId, timestamp };
}

export function createLevelCompleteEvent(
  playerId: string,
  outcome: StageOutcome,
  timestamp = nowInSeconds(),
): LevelCompleteEvent {
  return {
    type: 'level_complete',
    playerId,
    stageNumber: outcome.stageNumber,
    timeTaken: outcome.elapsedMs / 1000,
    movesCount: outcome.moves,
    timestamp,
  };
}

export function createGameCompleteEvent(
  playerId: string,
  totals: { totalTimeMs: number; totalMoves: number },
  timestamp = nowInSeconds(),
): GameCompleteEvent {
  return {
    type: 'game_complete',
    playerId,
    totalTime: totals.totalTimeMs / 1000,
    totalMoves: totals.totalMoves,
    timestamp,
  };
}

/** Event → snake_case message accepted by the ingestion endpoint. */
export function toAnalyticsMessage(event: AnalyticsEvent): AnalyticsMessage {
  switch (event.type) {
    case 'game_start':
      return { event_type: 'game_start', player_id: event.playerId, timestamp: event.timestamp };
    case 'level_complete':
      return {
        event_type: 'level_complete',
        player_id: event.playerId,
        stage_number: event.stageNumber,
        time_taken: event.timeTaken,
        moves_count: event.movesCount,
        timestamp: event.timestamp,
      };
    case 'game_complete':
      return {
        event_type: 'game_complete',
        player_id: event.playerId,
        total_time: event.totalTime,
        total_moves: event.totalMoves,
        timestamp: event.timestamp,
      };
  }
}

export * from './types/index.js';
export { applyMovement, proposeMove, parseDirection, DIRECTION_OFFSETS } from './movement.js';
export * from './maze/index.js';
export {
  createGameStartEvent,
  createLevelCompleteEvent,
  createGameCompleteEvent,
  toAnalyticsMessage,
  nowInSeconds,
} from './analytics/events.js';

export { MazeEngine } from './engine/maze-engine.js';
export type { MazeEngineOptions, MoveOutcome, LoadOutcome } from './engine/maze-engine.js';
export { createMazeEngine } from './engine/create-engine.js';
export { InputQueue } from './engine/input-queue.js';
export { createLifecycleStore } from './stores/lifecycle-store.js';
export type { LifecycleState, LifecycleStore } from './stores/lifecycle-store.js';
export { AnalyticsDispatcher } from './analytics/dispatcher.js';
export type { AnalyticsSink, DispatcherOptions, DispatcherStats, OverflowPolicy } from './analytics/dispatcher.js';
export { LevelClient } from './networking/level-client.js';
export type {
  FetchError,
  FetchErrorKind,
  FetchFn,
  FetchInit,
  FetchLevelResult,
  LevelClientOptions,
  LevelSource,
} from './networking/level-client.js';
export { HttpAnalyticsTransport, SocketAnalyticsTransport } from './networking/analytics-transport.js';
export type { AnalyticsTransport } from './networking/analytics-transport.js';
export { EngineConfigSchema, loadEngineConfig } from './config.js';
export type { EngineConfig, EngineConfigInput, EnvRecord } from './config.js';

import { AnalyticsDispatcher } from '../analytics/dispatcher.js';
import type { EngineConfig } from '../config.js';
import { HttpAnalyticsTransport, SocketAnalyticsTransport } from '../networking/analytics-transport.js';
import type { AnalyticsTransport } from '../networking/analytics-transport.js';
import { LevelClient } from '../networking/level-client.js';
import { MazeEngine } from './maze-engine.js';

function createTransport(config: EngineConfig, analyticsUrl: string): AnalyticsTransport {
  return config.analyticsTransport === 'http'
    ? new HttpAnalyticsTransport(analyticsUrl, config.analyticsTimeoutMs)
    : new SocketAnalyticsTransport(analyticsUrl, config.analyticsTimeoutMs);
}

/** Wires level client, analytics pipeline and engine from one config. */
export function createMazeEngine(config: EngineConfig): MazeEngine {
  const levels = new LevelClient({
    baseUrl: config.levelServiceUrl,
    timeoutMs: config.fetchTimeoutMs,
    cacheLevels: config.cacheLevels,
  });

  let analytics: AnalyticsDispatcher | null = null;
  if (config.analyticsUrl) {
    analytics = new AnalyticsDispatcher(createTransport(config, config.analyticsUrl), {
      maxQueueDepth: config.analyticsQueueDepth,
      maxInFlight: config.analyticsMaxInFlight,
      overflow: config.analyticsOverflow,
    });
  } else {
    console.warn('[Analytics] ANALYTICS_URL not set. Analytics will not be sent.');
  }

  return new MazeEngine({
    levels,
    analytics,
    playerId: config.playerId,
    totalStages: config.totalStages,
    inputQueueDepth: config.inputQueueDepth,
    autoAdvance: config.autoAdvance,
  });
}

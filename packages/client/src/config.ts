import { z } from 'zod';
import { DEFAULT_GAME_SETTINGS } from '@maze/shared';

// ═══════════════════════════════════════════════════════════════
// Engine configuration: explicit values scoped to one engine.
// Hosts pass their own env record; nothing reads process.env here.
// ═══════════════════════════════════════════════════════════════

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

export const EngineConfigSchema = z.object({
  levelServiceUrl: z.string().url(),
  analyticsUrl: z.string().url().optional(),
  analyticsTransport: z.enum(['socket', 'http']).default('socket'),
  playerId: z.string().min(1).max(100).default('anonymous'),
  totalStages: positiveInt.default(DEFAULT_GAME_SETTINGS.totalStages),
  fetchTimeoutMs: positiveInt.default(DEFAULT_GAME_SETTINGS.fetchTimeoutMs),
  analyticsQueueDepth: positiveInt.default(DEFAULT_GAME_SETTINGS.analyticsQueueDepth),
  analyticsMaxInFlight: positiveInt.default(DEFAULT_GAME_SETTINGS.analyticsMaxInFlight),
  analyticsTimeoutMs: positiveInt.default(DEFAULT_GAME_SETTINGS.analyticsTimeoutMs),
  analyticsOverflow: z.enum(['drop_oldest', 'reject_new']).default('drop_oldest'),
  inputQueueDepth: positiveInt.default(DEFAULT_GAME_SETTINGS.inputQueueDepth),
  cacheLevels: booleanish.default(true),
  autoAdvance: booleanish.default(false),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type EnvRecord = Record<string, string | undefined>;

function readEnv(env: EnvRecord, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Throws a ZodError when a value is present but invalid. */
export function loadEngineConfig(env: EnvRecord): EngineConfig {
  return EngineConfigSchema.parse({
    levelServiceUrl: readEnv(env, 'LEVEL_SERVICE_URL'),
    analyticsUrl: readEnv(env, 'ANALYTICS_URL'),
    analyticsTransport: readEnv(env, 'ANALYTICS_TRANSPORT'),
    playerId: readEnv(env, 'PLAYER_ID'),
    totalStages: readEnv(env, 'TOTAL_STAGES'),
    fetchTimeoutMs: readEnv(env, 'FETCH_TIMEOUT_MS'),
    analyticsQueueDepth: readEnv(env, 'ANALYTICS_QUEUE_DEPTH'),
    analyticsMaxInFlight: readEnv(env, 'ANALYTICS_MAX_IN_FLIGHT'),
    analyticsTimeoutMs: readEnv(env, 'ANALYTICS_TIMEOUT_MS'),
    analyticsOverflow: readEnv(env, 'ANALYTICS_OVERFLOW'),
    inputQueueDepth: readEnv(env, 'INPUT_QUEUE_DEPTH'),
    cacheLevels: readEnv(env, 'CACHE_LEVELS'),
    autoAdvance: readEnv(env, 'AUTO_ADVANCE'),
  });
}

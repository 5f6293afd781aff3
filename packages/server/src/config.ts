import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_LEVELS_FILE = path.resolve(__dirname, '../data/levels.json');

const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3001),
  levelsFile: z.string().min(1).default(DEFAULT_LEVELS_FILE),
  // Highest stage number the route accepts; defaults to the file's highest
  maxStage: z.coerce.number().int().positive().optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
  const read = (key: string) => env[key]?.trim() || undefined;
  return ServerConfigSchema.parse({
    port: read('PORT'),
    levelsFile: read('LEVELS_FILE'),
    maxStage: read('MAX_STAGE'),
  });
}

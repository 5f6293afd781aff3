import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// Level Data Service wire format: GET /level/{stage_number}
// Keys are snake_case as stored in the level-definition table
// ═══════════════════════════════════════════════════════════════

const gridCoordinate = z.number().int().min(0);

export const LevelRecordSchema = z.object({
  stage_number: z.number().int().min(1),
  layout: z.string(),
  width: z.number().int().min(1),
  height: z.number().int().min(1),
  start_x: gridCoordinate,
  start_y: gridCoordinate,
  end_x: gridCoordinate,
  end_y: gridCoordinate,
});

export const LevelSuccessResponseSchema = z.object({
  success: z.literal(true),
  data: LevelRecordSchema,
});

export const LevelErrorResponseSchema = z.object({
  success: z.literal(false),
  error: z.string(),
});

export const LevelResponseSchema = z.discriminatedUnion('success', [
  LevelSuccessResponseSchema,
  LevelErrorResponseSchema,
]);

export const LevelFileSchema = z.object({
  stages: z.array(LevelRecordSchema).min(1),
});

export type LevelRecord = z.infer<typeof LevelRecordSchema>;
export type LevelResponse = z.infer<typeof LevelResponseSchema>;
export type LevelFile = z.infer<typeof LevelFileSchema>;

import type { LevelRecord } from '../types/level-data.js';
import type { LevelDescriptor } from './maze-types.js';

// Wire record (snake_case, flat coordinates) → descriptor used by the parser
export function toLevelDescriptor(record: LevelRecord): LevelDescriptor {
  return {
    stageNumber: record.stage_number,
    rawLayout: record.layout,
    width: record.width,
    height: record.height,
    start: { x: record.start_x, y: record.start_y },
    end: { x: record.end_x, y: record.end_y },
  };
}

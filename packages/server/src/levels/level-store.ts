import { readFile } from 'fs/promises';
import { LevelFileSchema } from '@maze/shared';
import type { LevelFile, LevelRecord } from '@maze/shared';

/**
 * Read-only level definitions keyed by stage number.
 * Loaded once at startup; the route never touches the file again.
 */
export class LevelStore {
  private readonly stages = new Map<number, LevelRecord>();

  constructor(file: LevelFile) {
    for (const record of file.stages) {
      if (this.stages.has(record.stage_number)) {
        throw new Error(`Duplicate stage_number ${record.stage_number} in level file`);
      }
      this.stages.set(record.stage_number, record);
    }
  }

  static async fromFile(filePath: string): Promise<LevelStore> {
    const raw = await readFile(filePath, 'utf-8');
    const parsed = LevelFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      throw new Error(`Invalid level file ${filePath} (${where})`);
    }
    const store = new LevelStore(parsed.data);
    console.log(`[Levels] Loaded ${store.size} stages from ${filePath}`);
    return store;
  }

  get size(): number {
    return this.stages.size;
  }

  get maxStage(): number {
    return Math.max(...this.stages.keys());
  }

  get(stageNumber: number): LevelRecord | null {
    return this.stages.get(stageNumber) ?? null;
  }
}

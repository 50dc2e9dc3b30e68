import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod';
import type { Logger } from '../logger';

/**
 * A single JSON value kept in one file. Absent or corrupt files yield the
 * fallback instead of failing; writes go through a temp file and rename.
 */
export class StateFile<T> {
  constructor(
    private path: string,
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private fallback: T,
    private logger: Logger,
  ) {}

  load(): T {
    if (!existsSync(this.path)) return this.fallback;

    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, 'utf-8'));
      const parsed = this.schema.safeParse(raw);
      if (parsed.success) return parsed.data;
      this.logger.warn({ path: this.path, issues: parsed.error.issues.length }, 'State file invalid, using default');
    } catch (err) {
      this.logger.warn({ err, path: this.path }, 'State file unreadable, using default');
    }
    return this.fallback;
  }

  save(value: T): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(value), 'utf-8');
    renameSync(tmpPath, this.path);
  }
}

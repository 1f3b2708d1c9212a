import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';

import { ServiceLogger } from '../utils/logger';

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
const MemoryEntrySchema = z.object({
  source: z.string(),
  targetLang: z.string(),
  translation: z.string(),
  lastAccess: z.number(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
const MemoryMetricsSchema = z.object({
  hits: z.number().nonnegative(),
  misses: z.number().nonnegative(),
  fuzzyHits: z.number().nonnegative(),
  totalLookups: z.number().nonnegative(),
  totalLookupTimeMs: z.number().nonnegative(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
const PersistedMemorySchema = z.object({
  version: z.literal(1),
  config: z.object({
    maxEntries: z.number().int().positive(),
    fuzzyThreshold: z.number().min(0).max(1),
  }),
  entries: z.array(MemoryEntrySchema),
  metrics: MemoryMetricsSchema,
});

export type MemoryEntry = z.infer<typeof MemoryEntrySchema>;
export type MemoryMetrics = z.infer<typeof MemoryMetricsSchema>;
export type PersistedMemory = z.infer<typeof PersistedMemorySchema>;

export class TranslationMemoryStore {
  constructor(
    readonly filePath: string,
    private readonly logger: ServiceLogger,
  ) {}

  /** Missing, unreadable and malformed files all read as "nothing stored". */
  async load(): Promise<PersistedMemory | undefined> {
    let raw: string;

    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      this.logger.warn(`Failed to read translation memory at ${this.filePath}: ${describe(error)}.`);
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Failed to parse translation memory at ${this.filePath}: ${describe(error)}.`);
      return undefined;
    }

    const parsed = PersistedMemorySchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Ignoring translation memory at ${this.filePath}: unexpected shape.`);
      return undefined;
    }

    return parsed.data;
  }

  async save(snapshot: PersistedMemory): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      this.logger.warn(`Failed to persist translation memory at ${this.filePath}: ${describe(error)}.`);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { performance } from 'perf_hooks';

import type { FuzzyMatch, TranslationMemoryStats } from '../types/translation';
import { ServiceLogger } from '../utils/logger';
import { similarityRatio } from '../utils/similarity';
import type { MemoryEntry, MemoryMetrics, PersistedMemory, TranslationMemoryStore } from './TranslationMemoryStore';

export interface TranslationMemoryOptions {
  maxEntries?: number;
  fuzzyThreshold?: number;
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 1000;
const DEFAULT_FUZZY_THRESHOLD = 0.8;

function emptyMetrics(): MemoryMetrics {
  return { hits: 0, misses: 0, fuzzyHits: 0, totalLookups: 0, totalLookupTimeMs: 0 };
}

/**
 * Bounded LRU of finished translations keyed by (source text, target
 * language). Map insertion order doubles as recency: the head is the least
 * recently used entry.
 */
export class TranslationMemory {
  private readonly entries = new Map<string, MemoryEntry>();
  private metrics: MemoryMetrics = emptyMetrics();
  private readonly maxEntries: number;
  private readonly fuzzyThreshold: number;
  private readonly now: () => number;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly logger: ServiceLogger,
    options: TranslationMemoryOptions = {},
    private readonly persistence?: TranslationMemoryStore,
  ) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? DEFAULT_MAX_ENTRIES));
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
    this.now = options.now ?? Date.now;
  }

  /** Builds a memory and loads whatever the store holds. Explicit options win over the stored config. */
  static async open(
    logger: ServiceLogger,
    options: TranslationMemoryOptions = {},
    store?: TranslationMemoryStore,
  ): Promise<TranslationMemory> {
    const persisted = await store?.load();
    const memory = new TranslationMemory(
      logger,
      {
        ...options,
        maxEntries: options.maxEntries ?? persisted?.config.maxEntries,
        fuzzyThreshold: options.fuzzyThreshold ?? persisted?.config.fuzzyThreshold,
      },
      store,
    );

    if (persisted) {
      memory.restore(persisted);
      logger.info(`Loaded ${memory.size} translation memory entries.`);
    }

    return memory;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(text: string, targetLang: string): string | undefined {
    const started = performance.now();
    const key = memoryKey(text, targetLang);
    const entry = this.entries.get(key);

    if (entry) {
      this.touch(key, entry);
      this.metrics.hits += 1;
    } else {
      this.metrics.misses += 1;
    }

    this.recordLookup(started);
    return entry?.translation;
  }

  fuzzyLookup(text: string, targetLang: string): FuzzyMatch | undefined {
    const started = performance.now();
    let bestKey: string | undefined;
    let best: MemoryEntry | undefined;
    let bestScore = 0;

    for (const [key, entry] of this.entries) {
      if (entry.targetLang !== targetLang) {
        continue;
      }
      const score = similarityRatio(text, entry.source);
      if (score >= this.fuzzyThreshold && score > bestScore) {
        bestKey = key;
        best = entry;
        bestScore = score;
      }
    }

    if (bestKey !== undefined && best) {
      this.touch(bestKey, best);
      this.metrics.fuzzyHits += 1;
    } else {
      this.metrics.misses += 1;
    }

    this.recordLookup(started);
    return best ? { translation: best.translation, score: bestScore } : undefined;
  }

  async store(text: string, targetLang: string, translation: string): Promise<void> {
    const key = memoryKey(text, targetLang);
    this.entries.delete(key);
    this.entries.set(key, { source: text, targetLang, translation, lastAccess: this.now() });
    this.evictOverflow();
    await this.persist();
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.metrics = emptyMetrics();
    await this.persist();
  }

  stats(): TranslationMemoryStats {
    const lookups = this.metrics.totalLookups;
    return {
      ...this.metrics,
      hitRate: (this.metrics.hits + this.metrics.fuzzyHits) / Math.max(1, lookups),
      averageLookupMs: this.metrics.totalLookupTimeMs / Math.max(1, lookups),
      size: this.entries.size,
      maxEntries: this.maxEntries,
    };
  }

  /** Resolves once every pending write has settled. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  snapshot(): PersistedMemory {
    return {
      version: 1,
      config: { maxEntries: this.maxEntries, fuzzyThreshold: this.fuzzyThreshold },
      entries: [...this.entries.values()].map((entry) => ({ ...entry })),
      metrics: { ...this.metrics },
    };
  }

  private restore(persisted: PersistedMemory): void {
    const ordered = [...persisted.entries].sort((a, b) => a.lastAccess - b.lastAccess);
    for (const entry of ordered) {
      const key = memoryKey(entry.source, entry.targetLang);
      this.entries.delete(key);
      this.entries.set(key, { ...entry });
    }
    this.metrics = { ...persisted.metrics };
    this.evictOverflow();
  }

  private touch(key: string, entry: MemoryEntry): void {
    entry.lastAccess = this.now();
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private evictOverflow(): void {
    let evicted = 0;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      evicted += 1;
    }

    if (evicted > 0) {
      this.logger.debug(`Evicted ${evicted} translation memory entries.`, { size: this.entries.size });
    }
  }

  private recordLookup(started: number): void {
    this.metrics.totalLookups += 1;
    this.metrics.totalLookupTimeMs += performance.now() - started;
  }

  private persist(): Promise<void> {
    const store = this.persistence;
    if (!store) {
      return this.writeChain;
    }

    const snapshot = this.snapshot();
    this.writeChain = this.writeChain.then(() => store.save(snapshot));
    return this.writeChain;
  }
}

function memoryKey(text: string, targetLang: string): string {
  return `${targetLang}\u0000${text}`;
}

/**
 * Intent Cache - LRU cache for analyzed query intents
 *
 * An identical question against an unchanged schema catalog maps onto
 * the same databases and tables, so the analysis AI call is skipped.
 * Cleared whenever the schema catalog refreshes.
 */

import { LRUCache } from 'lru-cache';
import type { QueryIntent } from '../types.js';
import { collapseWhitespace } from '../utils/text.js';
import { logDebug } from './logger.js';

export interface IntentCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
}

export interface IntentCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export class QueryIntentCache {
  private readonly cache: LRUCache<string, QueryIntent>;
  private hits = 0;
  private misses = 0;

  constructor(options: IntentCacheOptions = {}) {
    this.cache = new LRUCache<string, QueryIntent>({
      max: options.maxEntries ?? 200,
      ttl: options.ttlMs ?? 30 * 60 * 1000,
    });
  }

  /**
   * Cache key: lowercase, whitespace-collapsed query text
   */
  static keyFor(query: string): string {
    return collapseWhitespace(query).toLowerCase();
  }

  /**
   * Returns a copy marked as replayed, so callers may fill in SQL freely
   */
  get(query: string): QueryIntent | undefined {
    const cached = this.cache.get(QueryIntentCache.keyFor(query));
    if (!cached) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    logDebug('Intent cache hit', { hits: this.hits, misses: this.misses });
    return { ...cloneIntent(cached), originalQuery: query, source: 'cache' };
  }

  set(query: string, intent: QueryIntent): void {
    this.cache.set(QueryIntentCache.keyFor(query), cloneIntent(intent));
  }

  clear(): void {
    const previousSize = this.cache.size;
    this.cache.clear();
    logDebug('Intent cache cleared', { entries_removed: previousSize });
  }

  getStats(): IntentCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? Math.round((this.hits / total) * 100) : 0,
    };
  }
}

/**
 * Copy with every sub-intent reset to pending and without generated SQL
 */
function cloneIntent(intent: QueryIntent): QueryIntent {
  return {
    ...intent,
    databaseQueries: intent.databaseQueries.map((q) => ({
      databaseId: q.databaseId,
      databaseName: q.databaseName,
      requiredTables: [...q.requiredTables],
      purpose: q.purpose,
      priority: q.priority,
      validation: { state: 'pending', errors: [] },
    })),
    dropped: intent.dropped.map((target) => ({ ...target })),
  };
}

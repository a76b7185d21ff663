/**
 * Schema Catalog
 *
 * Owns the SchemaSnapshot of every connected database. The pipeline
 * only reads from it; refreshes come from registered loaders.
 *
 * Injected into the analyzer and synthesizer rather than reached
 * through a module-level singleton, so tests build their own.
 */

import type { SchemaSnapshot, TableInfo } from '../types.js';
import { errorMessage } from '../errors.js';
import { logInfo, logWarn } from './logger.js';

// =============================================================================
// INTERFACES
// =============================================================================

export interface SchemaCatalog {
  getSchema(databaseId: string): SchemaSnapshot | undefined;
  getAllSchemas(): SchemaSnapshot[];
}

/** Builds a fresh snapshot of one database */
export interface SchemaLoader {
  readonly databaseId: string;
  load(): Promise<SchemaSnapshot>;
}

export interface RefreshResult {
  refreshed: string[];
  failed: Array<{ databaseId: string; error: string }>;
  durationMs: number;
}

export type RefreshListener = (result: RefreshResult) => void;

// =============================================================================
// IN-MEMORY CATALOG
// =============================================================================

export class InMemorySchemaCatalog implements SchemaCatalog {
  private readonly snapshots = new Map<string, SchemaSnapshot>();
  private readonly loaders = new Map<string, SchemaLoader>();
  private readonly listeners: RefreshListener[] = [];

  constructor(snapshots: SchemaSnapshot[] = []) {
    for (const snapshot of snapshots) {
      this.snapshots.set(snapshot.databaseId, snapshot);
    }
  }

  getSchema(databaseId: string): SchemaSnapshot | undefined {
    return this.snapshots.get(databaseId);
  }

  getAllSchemas(): SchemaSnapshot[] {
    return [...this.snapshots.values()];
  }

  /** Replace (or add) one snapshot */
  setSchema(snapshot: SchemaSnapshot): void {
    this.snapshots.set(snapshot.databaseId, snapshot);
  }

  registerLoader(loader: SchemaLoader): void {
    this.loaders.set(loader.databaseId, loader);
  }

  /**
   * Subscribe to refresh completions; returns an unsubscribe function
   */
  onRefresh(listener: RefreshListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  /**
   * Reload every registered database
   *
   * A loader that fails keeps its previous snapshot.
   */
  async refresh(): Promise<RefreshResult> {
    const start = Date.now();
    const refreshed: string[] = [];
    const failed: RefreshResult['failed'] = [];

    await Promise.all(
      [...this.loaders.values()].map(async (loader) => {
        try {
          const snapshot = await loader.load();
          this.snapshots.set(loader.databaseId, snapshot);
          refreshed.push(loader.databaseId);
        } catch (error) {
          failed.push({ databaseId: loader.databaseId, error: errorMessage(error) });
          logWarn('Schema refresh failed', {
            database_id: loader.databaseId,
            error: errorMessage(error),
          });
        }
      })
    );

    const result: RefreshResult = {
      refreshed: refreshed.sort(),
      failed,
      durationMs: Date.now() - start,
    };

    logInfo('Schema catalog refreshed', {
      refreshed: result.refreshed.length,
      failed: failed.length,
      duration_ms: result.durationMs,
    });

    for (const listener of this.listeners) {
      listener(result);
    }

    return result;
  }
}

// =============================================================================
// LOOKUP HELPERS
// =============================================================================

/**
 * Find a table by name, case-insensitively
 */
export function findTable(snapshot: SchemaSnapshot, name: string): TableInfo | undefined {
  const lower = name.toLowerCase();
  return snapshot.tables.find((t) => t.name.toLowerCase() === lower);
}

/**
 * Snapshot restricted to the named tables (the SQL whitelist)
 *
 * Foreign keys pointing outside the subset are kept; the prompt builder
 * filters them when rendering join hints.
 */
export function restrictSnapshot(snapshot: SchemaSnapshot, tableNames: string[]): SchemaSnapshot {
  const wanted = new Set(tableNames.map((n) => n.toLowerCase()));
  return {
    ...snapshot,
    tables: snapshot.tables.filter((t) => wanted.has(t.name.toLowerCase())),
  };
}

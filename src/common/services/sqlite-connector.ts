/**
 * SQLite connector (better-sqlite3)
 *
 * - SqliteSchemaLoader: introspects a database into a SchemaSnapshot
 * - SqliteReadOnlyRunner: executes reader statements only, row-capped,
 *   on a worker thread per database
 *
 * The loader accepts either a file path (opened read-only) or an already
 * open Database handle, which is how tests pass in-memory databases. The
 * runner takes a file path, since a worker opens its own handle.
 */

import { Worker } from 'worker_threads';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  CellValue,
  ColumnInfo,
  ForeignKeyInfo,
  QueryRunOptions,
  QueryRunOutput,
  ReadOnlyQueryRunner,
  ResultRow,
  SampleRow,
  SchemaSnapshot,
  TableInfo,
} from '../types.js';
import { PROMPT_SAMPLE_ROWS } from '../constants.js';
import {
  PipelineCancelledError,
  QueryExecutionError,
  QueryTimeoutError,
  errorMessage,
  throwIfAborted,
} from '../errors.js';
import type { SchemaLoader } from './schema-catalog.js';
import { logDebug, logWarn } from './logger.js';
import {
  SQLITE_WORKER_SOURCE,
  SqliteWorkerReply,
  type SqliteWorkerData,
  type SqliteWorkerRequest,
} from './sqlite-worker.js';

type DatabaseSource = string | Database.Database;

function openReadOnly(source: DatabaseSource): { db: Database.Database; owned: boolean } {
  if (typeof source !== 'string') {
    return { db: source, owned: false };
  }
  return { db: new Database(source, { readonly: true, fileMustExist: true }), owned: true };
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Convert a driver value into a plain cell value
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  // Blobs arrive from the worker as Uint8Array
  if (value instanceof Uint8Array) return `<blob ${value.length} bytes>`;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

// =============================================================================
// SCHEMA LOADER
// =============================================================================

const TableNameRow = z.object({ name: z.string() });

const TableInfoRow = z.object({
  name: z.string(),
  type: z.string().nullable().transform((t) => t ?? ''),
  notnull: z.number(),
  pk: z.number(),
});

const ForeignKeyRow = z.object({
  table: z.string(),
  from: z.string(),
  to: z.string().nullable(),
});

const CountRow = z.object({ n: z.union([z.number(), z.bigint()]) });

export interface SqliteSchemaLoaderOptions {
  databaseId: string;
  databaseName: string;
  source: DatabaseSource;
  sampleRows?: number;
}

export class SqliteSchemaLoader implements SchemaLoader {
  readonly databaseId: string;
  private readonly databaseName: string;
  private readonly source: DatabaseSource;
  private readonly sampleRows: number;

  constructor(options: SqliteSchemaLoaderOptions) {
    this.databaseId = options.databaseId;
    this.databaseName = options.databaseName;
    this.source = options.source;
    this.sampleRows = options.sampleRows ?? PROMPT_SAMPLE_ROWS;
  }

  async load(): Promise<SchemaSnapshot> {
    const { db, owned } = openReadOnly(this.source);

    try {
      const tableNames = z
        .array(TableNameRow)
        .parse(
          db
            .prepare(
              "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
            )
            .all()
        )
        .map((row) => row.name);

      const tables = tableNames.map((name) => this.describeTable(db, name));

      logDebug('SQLite schema loaded', {
        database_id: this.databaseId,
        tables: tables.length,
      });

      return {
        databaseId: this.databaseId,
        databaseName: this.databaseName,
        dialect: 'sqlite',
        tables,
        lastRefreshedAt: new Date(),
      };
    } finally {
      if (owned) db.close();
    }
  }

  private describeTable(db: Database.Database, name: string): TableInfo {
    const quoted = quoteIdentifier(name);

    const columns: ColumnInfo[] = z
      .array(TableInfoRow)
      .parse(db.prepare(`PRAGMA table_info(${quoted})`).all())
      .map((row) => ({
        name: row.name,
        dataType: row.type,
        nullable: row.notnull === 0 && row.pk === 0,
        isPrimaryKey: row.pk > 0,
      }));

    const foreignKeys: ForeignKeyInfo[] = z
      .array(ForeignKeyRow)
      .parse(db.prepare(`PRAGMA foreign_key_list(${quoted})`).all())
      .map((row) => ({
        column: row.from,
        referencedTable: row.table,
        // A null target means the referenced table's primary key
        referencedColumn: row.to ?? 'id',
      }));

    const sampleRows: SampleRow[] = [];
    if (this.sampleRows > 0) {
      const stmt = db.prepare(`SELECT * FROM ${quoted} LIMIT ?`).raw(true);
      const names = stmt.columns().map((c) => c.name);
      for (const raw of stmt.iterate(this.sampleRows)) {
        if (!Array.isArray(raw)) continue;
        const sample: SampleRow = {};
        names.forEach((column, i) => {
          const cell = toCellValue(raw[i]);
          sample[column] = cell === null ? null : String(cell);
        });
        sampleRows.push(sample);
      }
    }

    const count = CountRow.parse(db.prepare(`SELECT COUNT(*) AS n FROM ${quoted}`).get());

    return {
      name,
      columns,
      foreignKeys,
      sampleRows,
      rowCount: Number(count.n),
    };
  }
}

// =============================================================================
// READ-ONLY RUNNER
// =============================================================================

/**
 * Column names as they will appear in result rows.
 * Duplicates (e.g. two joined "id" columns) get a numeric suffix.
 */
export function uniqueColumnNames(names: string[]): string[] {
  const seen = new Map<string, number>();
  return names.map((name) => {
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count === 0 ? name : `${name}_${count + 1}`;
  });
}

type WorkerSuccess = Extract<SqliteWorkerReply, { ok: true }>;

// Resolved here so the worker loads the same driver build
const DRIVER_PATH = require.resolve('better-sqlite3');

/**
 * Runs reader statements on a worker thread that owns a read-only handle
 * to the database file. One statement at a time; a statement that passes
 * its timeout or whose signal aborts terminates the worker, and the next
 * statement starts a fresh one.
 */
export class SqliteReadOnlyRunner implements ReadOnlyQueryRunner {
  private worker: Worker | undefined;
  private queue: Promise<void> = Promise.resolve();
  private nextId = 0;

  constructor(
    private readonly databaseId: string,
    private readonly filename: string
  ) {}

  execute(sql: string, options: QueryRunOptions): Promise<QueryRunOutput> {
    const run = this.queue.then(() => this.run(sql, options));
    // The next statement waits for this one to settle, whatever its outcome
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    const worker = this.worker;
    this.worker = undefined;
    if (worker) {
      await worker.terminate();
    }
  }

  private run(sql: string, options: QueryRunOptions): Promise<QueryRunOutput> {
    throwIfAborted(options.signal, 'execution');

    const worker = this.ensureWorker();
    const id = ++this.nextId;

    return new Promise<QueryRunOutput>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const settle = () => {
        clearTimeout(timer);
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
        options.signal?.removeEventListener('abort', onAbort);
      };

      const stop = (error: Error) => {
        settle();
        this.discard(worker);
        reject(error);
      };

      const onMessage = (message: unknown) => {
        const reply = SqliteWorkerReply.safeParse(message);
        if (!reply.success || reply.data.id !== id) return;
        settle();
        if (reply.data.ok) {
          resolve(toRunOutput(reply.data));
        } else {
          reject(new QueryExecutionError(this.databaseId, reply.data.message));
        }
      };
      const onError = (error: Error) => stop(new QueryExecutionError(this.databaseId, error.message));
      const onExit = (code: number) =>
        stop(new QueryExecutionError(this.databaseId, `SQLite worker exited with code ${code}`));
      const onAbort = () => stop(new PipelineCancelledError('execution'));

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
      options.signal?.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => stop(new QueryTimeoutError(this.databaseId, options.timeoutMs)), options.timeoutMs);

      const request: SqliteWorkerRequest = { id, sql, maxRows: options.maxRows };
      worker.postMessage(request);
    });
  }

  private ensureWorker(): Worker {
    if (this.worker) return this.worker;

    const workerData: SqliteWorkerData = { driverPath: DRIVER_PATH, filename: this.filename };
    const worker = new Worker(SQLITE_WORKER_SOURCE, { eval: true, workerData });
    worker.unref();
    worker.once('exit', () => {
      if (this.worker === worker) this.worker = undefined;
    });

    logDebug('SQLite worker started', { database_id: this.databaseId, thread_id: worker.threadId });
    this.worker = worker;
    return worker;
  }

  private discard(worker: Worker): void {
    if (this.worker === worker) this.worker = undefined;

    worker.terminate().then(
      (code) => logDebug('SQLite worker stopped', { database_id: this.databaseId, exit_code: code }),
      (error: unknown) => logWarn('SQLite worker did not stop', { database_id: this.databaseId, error: errorMessage(error) })
    );
  }
}

function toRunOutput(reply: WorkerSuccess): QueryRunOutput {
  const columns = uniqueColumnNames(reply.columns);
  const rows: ResultRow[] = reply.rows.map((raw) => {
    const row: ResultRow = {};
    columns.forEach((column, i) => {
      row[column] = toCellValue(raw[i]);
    });
    return row;
  });
  return { columns, rows, truncated: reply.truncated };
}

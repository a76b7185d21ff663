/**
 * PostgreSQL connector (pg)
 *
 * - PostgresSchemaLoader: introspects one schema through information_schema
 * - PostgresReadOnlyRunner: runs each statement inside a READ ONLY
 *   transaction with a statement_timeout, then rolls back
 *
 * Both take a PgConnectionPool; createPgPool wraps a pg.Pool, tests hand
 * in an in-process stand-in.
 */

import { Pool } from 'pg';
import { z } from 'zod';
import type {
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
import { PipelineCancelledError, QueryExecutionError, QueryTimeoutError, errorMessage, throwIfAborted } from '../errors.js';
import type { SchemaLoader } from './schema-catalog.js';
import { logDebug, logWarn } from './logger.js';
import { quoteIdentifier, toCellValue, uniqueColumnNames } from './sqlite-connector.js';

// =============================================================================
// POOL INTERFACE (satisfied by pg.Pool)
// =============================================================================

export interface PgArrayQuery {
  text: string;
  values?: unknown[];
  rowMode: 'array';
}

export interface PgArrayResult {
  rows: unknown[][];
  fields: Array<{ name: string }>;
}

export interface PgQueryClient {
  query(config: PgArrayQuery): Promise<PgArrayResult>;
  release(): void;
}

export interface PgConnectionPool {
  connect(): Promise<PgQueryClient>;
  end(): Promise<void>;
}

export interface PgPoolOptions {
  connectionString: string;
  connectionTimeoutMs?: number;
  maxConnections?: number;
}

/**
 * pg.Pool behind the narrow pool interface
 */
export function createPgPool(options: PgPoolOptions): PgConnectionPool {
  const pool = new Pool({
    connectionString: options.connectionString,
    connectionTimeoutMillis: options.connectionTimeoutMs ?? 10_000,
    max: options.maxConnections ?? 4,
  });

  pool.on('error', (error) => {
    logWarn('Idle PostgreSQL client error', { error: error.message });
  });

  return {
    async connect(): Promise<PgQueryClient> {
      const client = await pool.connect();
      return {
        async query(config: PgArrayQuery): Promise<PgArrayResult> {
          const result = await client.query<unknown[]>({
            text: config.text,
            values: config.values,
            rowMode: 'array',
          });
          return { rows: result.rows, fields: result.fields.map((f) => ({ name: f.name })) };
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

function arrayQuery(text: string, values?: unknown[]): PgArrayQuery {
  return { text, values, rowMode: 'array' };
}

/** SQLSTATE for a statement cancelled by statement_timeout */
const QUERY_CANCELED = '57014';

const PgErrorShape = z.object({ code: z.string() });

function isStatementTimeout(error: unknown): boolean {
  const parsed = PgErrorShape.safeParse(error);
  return parsed.success && parsed.data.code === QUERY_CANCELED;
}

// =============================================================================
// SCHEMA LOADER
// =============================================================================

const TABLES_SQL = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1 AND table_type = 'BASE TABLE'
  ORDER BY table_name`;

const COLUMNS_SQL = `
  SELECT table_name, column_name, data_type, is_nullable
  FROM information_schema.columns
  WHERE table_schema = $1
  ORDER BY table_name, ordinal_position`;

const PRIMARY_KEYS_SQL = `
  SELECT kcu.table_name, kcu.column_name
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1`;

const FOREIGN_KEYS_SQL = `
  SELECT kcu.table_name, kcu.column_name, ccu.table_name, ccu.column_name
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage ccu
    ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = $1`;

// reltuples is the planner's estimate; -1 means never analyzed
const ROW_ESTIMATES_SQL = `
  SELECT c.relname, c.reltuples::bigint::text
  FROM pg_class c
  JOIN pg_namespace n ON n.oid = c.relnamespace
  WHERE n.nspname = $1 AND c.relkind = 'r'`;

const TableRow = z.tuple([z.string()]);
const ColumnRow = z.tuple([z.string(), z.string(), z.string(), z.string()]);
const KeyColumnRow = z.tuple([z.string(), z.string()]);
const ForeignKeyRow = z.tuple([z.string(), z.string(), z.string(), z.string()]);
const EstimateRow = z.tuple([z.string(), z.string()]);

export interface PostgresSchemaLoaderOptions {
  databaseId: string;
  databaseName: string;
  pool: PgConnectionPool;
  schema?: string;
  sampleRows?: number;
}

export class PostgresSchemaLoader implements SchemaLoader {
  readonly databaseId: string;
  private readonly databaseName: string;
  private readonly pool: PgConnectionPool;
  private readonly schema: string;
  private readonly sampleRows: number;

  constructor(options: PostgresSchemaLoaderOptions) {
    this.databaseId = options.databaseId;
    this.databaseName = options.databaseName;
    this.pool = options.pool;
    this.schema = options.schema ?? 'public';
    this.sampleRows = options.sampleRows ?? PROMPT_SAMPLE_ROWS;
  }

  async load(): Promise<SchemaSnapshot> {
    const client = await this.pool.connect();

    try {
      const rowsOf = async <T extends z.ZodTypeAny>(sql: string, shape: T): Promise<Array<z.infer<T>>> => {
        const result = await client.query(arrayQuery(sql, [this.schema]));
        return z.array(shape).parse(result.rows);
      };

      const tableNames = (await rowsOf(TABLES_SQL, TableRow)).map(([name]) => name);
      const columnRows = await rowsOf(COLUMNS_SQL, ColumnRow);
      const primaryKeys = new Set((await rowsOf(PRIMARY_KEYS_SQL, KeyColumnRow)).map(([t, c]) => `${t}.${c}`));
      const foreignKeyRows = await rowsOf(FOREIGN_KEYS_SQL, ForeignKeyRow);
      const estimates = new Map((await rowsOf(ROW_ESTIMATES_SQL, EstimateRow)).map(([t, n]) => [t, Number(n)]));

      const tables: TableInfo[] = [];
      for (const name of tableNames) {
        const columns: ColumnInfo[] = columnRows
          .filter(([table]) => table === name)
          .map(([, column, dataType, isNullable]) => ({
            name: column,
            dataType,
            nullable: isNullable === 'YES',
            isPrimaryKey: primaryKeys.has(`${name}.${column}`),
          }));

        const foreignKeys: ForeignKeyInfo[] = foreignKeyRows
          .filter(([table]) => table === name)
          .map(([, column, referencedTable, referencedColumn]) => ({ column, referencedTable, referencedColumn }));

        const estimate = estimates.get(name);
        tables.push({
          name,
          columns,
          foreignKeys,
          sampleRows: await this.sample(client, name),
          rowCount: estimate !== undefined && estimate >= 0 ? estimate : undefined,
        });
      }

      logDebug('PostgreSQL schema loaded', {
        database_id: this.databaseId,
        schema: this.schema,
        tables: tables.length,
      });

      return {
        databaseId: this.databaseId,
        databaseName: this.databaseName,
        dialect: 'postgresql',
        tables,
        lastRefreshedAt: new Date(),
      };
    } finally {
      client.release();
    }
  }

  private async sample(client: PgQueryClient, table: string): Promise<SampleRow[]> {
    if (this.sampleRows <= 0) return [];

    const qualified = `${quoteIdentifier(this.schema)}.${quoteIdentifier(table)}`;
    const result = await client.query(arrayQuery(`SELECT * FROM ${qualified} LIMIT $1`, [this.sampleRows]));
    const names = result.fields.map((f) => f.name);

    return result.rows.map((raw) => {
      const sample: SampleRow = {};
      names.forEach((column, i) => {
        const cell = toCellValue(raw[i]);
        sample[column] = cell === null ? null : String(cell);
      });
      return sample;
    });
  }
}

// =============================================================================
// READ-ONLY RUNNER
// =============================================================================

export class PostgresReadOnlyRunner implements ReadOnlyQueryRunner {
  constructor(
    private readonly databaseId: string,
    private readonly pool: PgConnectionPool
  ) {}

  async execute(sql: string, options: QueryRunOptions): Promise<QueryRunOutput> {
    throwIfAborted(options.signal, 'execution');

    const client = await this.pool.connect();
    let open = false;

    try {
      await client.query(arrayQuery('BEGIN READ ONLY'));
      open = true;
      await client.query(arrayQuery(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`));

      const result = await client.query(arrayQuery(sql));
      throwIfAborted(options.signal, 'execution');

      const columns = uniqueColumnNames(result.fields.map((f) => f.name));
      const rows: ResultRow[] = result.rows.slice(0, options.maxRows).map((raw) => {
        const row: ResultRow = {};
        columns.forEach((column, i) => {
          row[column] = toCellValue(raw[i]);
        });
        return row;
      });

      return { columns, rows, truncated: result.rows.length > options.maxRows };
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;
      if (isStatementTimeout(error)) throw new QueryTimeoutError(this.databaseId, options.timeoutMs);
      throw new QueryExecutionError(this.databaseId, errorMessage(error));
    } finally {
      if (open) {
        await client.query(arrayQuery('ROLLBACK')).catch((error: unknown) => {
          logWarn('Rollback failed', { database_id: this.databaseId, error: errorMessage(error) });
        });
      }
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

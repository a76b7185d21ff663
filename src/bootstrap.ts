/**
 * Federation bootstrap
 *
 * Builds a ready pipeline from configuration:
 *   federation.config.json ──► catalog + runners + document searcher
 *   environment            ──► FederationConfig + Claude providers
 *
 * SQLite and PostgreSQL databases get a built-in connection. MySQL and
 * SQL Server are accepted by the file format and need a
 * ReadOnlyQueryRunner and a SchemaLoader registered in code.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import type { DatabaseConnection, DocumentSearcher } from './common/types.js';
import { FederationFileSchema, type DatabaseEntry, type FederationFile } from './common/schemas/index.js';
import { ConfigurationError, errorMessage } from './common/errors.js';
import { logInfo, logWarn } from './common/services/logger.js';
import { InMemorySchemaCatalog, type SchemaLoader } from './common/services/schema-catalog.js';
import { SqliteReadOnlyRunner, SqliteSchemaLoader } from './common/services/sqlite-connector.js';
import { PostgresReadOnlyRunner, PostgresSchemaLoader, createPgPool } from './common/services/postgres-connector.js';
import { KeywordDocumentSearcher } from './common/services/document-search.js';
import { QueryIntentCache } from './common/services/intent-cache.js';
import {
  AnthropicTextGenerator,
  ResilientTextGenerator,
  UnconfiguredTextGenerator,
  isClaudeAvailable,
  type ProviderEntry,
  type TextGenerator,
} from './common/services/text-generator.js';
import { QueryIntentClassifier } from './intent/query-intent-classifier.js';
import { QueryIntentAnalyzer } from './intent/query-intent-analyzer.js';
import { SqlSynthesizer } from './sql/sql-synthesizer.js';
import { ParallelQueryExecutor } from './execution/parallel-query-executor.js';
import { ResultMerger } from './merge/result-merger.js';
import { FederatedQueryPipeline } from './pipeline/federated-query-pipeline.js';
import { loadFederationConfig, validateFederationConfig, type FederationConfig } from './pipeline/config.js';

export const DEFAULT_CONFIG_FILE = 'federation.config.json';

export interface FederationOptions {
  /** Path of federation.config.json (default: FEDERATION_CONFIG env, then ./federation.config.json) */
  configPath?: string;
  config?: Partial<FederationConfig>;
  /** Replaces the Claude provider chain */
  generator?: TextGenerator;
  /** Extra connections for dialects without a built-in runner */
  connections?: DatabaseConnection[];
  /** Schema loaders that go with the extra connections */
  loaders?: SchemaLoader[];
}

export interface Federation {
  pipeline: FederatedQueryPipeline;
  catalog: InMemorySchemaCatalog;
  classifier: QueryIntentClassifier;
  executor: ParallelQueryExecutor;
  config: FederationConfig;
  documentSearcher?: DocumentSearcher;
  close(): Promise<void>;
}

/**
 * Read and validate the federation file; a missing file means no databases
 */
export function loadFederationFile(path: string): FederationFile {
  if (!existsSync(path)) {
    logWarn('Federation config file not found; starting without databases', { path });
    return { databases: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(error)}`);
  }

  const parsed = FederationFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid federation config file ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Claude provider chain: primary model, then the fallback model if set.
 * Without an API key every call is refused up front.
 */
export function createTextGenerator(config: FederationConfig): TextGenerator {
  if (!isClaudeAvailable()) {
    logWarn('ANTHROPIC_API_KEY is not set; every AI stage will use its fallback');
    return new UnconfiguredTextGenerator();
  }

  const providers: ProviderEntry[] = [
    { name: config.claudeModel, generator: new AnthropicTextGenerator({ model: config.claudeModel }) },
  ];
  if (config.claudeFallbackModel && config.claudeFallbackModel !== config.claudeModel) {
    providers.push({
      name: config.claudeFallbackModel,
      generator: new AnthropicTextGenerator({ model: config.claudeFallbackModel }),
    });
  }
  return new ResilientTextGenerator(providers);
}

function resolvePath(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

interface OpenedDatabase {
  connection: DatabaseConnection;
  loader: SchemaLoader;
}

function openSqlite(entry: DatabaseEntry, baseDir: string, config: FederationConfig): OpenedDatabase {
  if (!entry.path) {
    throw new ConfigurationError(`Database ${entry.id} has no path`);
  }
  const path = resolvePath(baseDir, entry.path);
  return {
    connection: {
      databaseId: entry.id,
      runner: new SqliteReadOnlyRunner(entry.id, path),
      maxRows: entry.maxRows ?? config.maxRows,
      timeoutMs: entry.timeoutMs ?? config.queryTimeoutMs,
    },
    loader: new SqliteSchemaLoader({ databaseId: entry.id, databaseName: entry.name, source: path }),
  };
}

function openPostgres(entry: DatabaseEntry, config: FederationConfig): OpenedDatabase {
  if (!entry.connectionString) {
    throw new ConfigurationError(`Database ${entry.id} has no connectionString`);
  }
  const pool = createPgPool({ connectionString: entry.connectionString });
  return {
    connection: {
      databaseId: entry.id,
      runner: new PostgresReadOnlyRunner(entry.id, pool),
      maxRows: entry.maxRows ?? config.maxRows,
      timeoutMs: entry.timeoutMs ?? config.queryTimeoutMs,
    },
    loader: new PostgresSchemaLoader({
      databaseId: entry.id,
      databaseName: entry.name,
      pool,
      schema: entry.schema,
    }),
  };
}

function openDatabase(entry: DatabaseEntry, baseDir: string, config: FederationConfig): OpenedDatabase | undefined {
  switch (entry.dialect) {
    case 'sqlite':
      return openSqlite(entry, baseDir, config);
    case 'postgresql':
      return openPostgres(entry, config);
    default:
      return undefined;
  }
}

export async function createFederation(options: FederationOptions = {}): Promise<Federation> {
  const config = loadFederationConfig(options.config);
  const problems = validateFederationConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError('Invalid federation configuration', problems);
  }

  const configPath = resolve(options.configPath ?? process.env.FEDERATION_CONFIG ?? DEFAULT_CONFIG_FILE);
  const baseDir = dirname(configPath);
  const file = loadFederationFile(configPath);

  const catalog = new InMemorySchemaCatalog();
  const connections: DatabaseConnection[] = [...(options.connections ?? [])];
  for (const loader of options.loaders ?? []) {
    catalog.registerLoader(loader);
  }

  for (const entry of file.databases) {
    if (!entry.enabled) continue;

    try {
      const opened = openDatabase(entry, baseDir, config);
      if (!opened) {
        logWarn('No built-in connection for dialect; register a runner in code', {
          database_id: entry.id,
          dialect: entry.dialect,
        });
        continue;
      }
      connections.push(opened.connection);
      catalog.registerLoader(opened.loader);
    } catch (error) {
      logWarn('Database unavailable; skipping', { database_id: entry.id, error: errorMessage(error) });
    }
  }

  await catalog.refresh();

  const documentSearcher = file.documents
    ? KeywordDocumentSearcher.fromFile(resolvePath(baseDir, file.documents))
    : undefined;

  const generator = options.generator ?? createTextGenerator(config);
  const classifier = new QueryIntentClassifier(generator, config);
  const executor = new ParallelQueryExecutor(connections);

  const pipeline = new FederatedQueryPipeline(
    {
      classifier,
      analyzer: new QueryIntentAnalyzer(generator, catalog),
      synthesizer: new SqlSynthesizer(generator, catalog),
      executor,
      merger: new ResultMerger(generator),
      documentSearcher,
      intentCache: config.intentCacheEnabled ? new QueryIntentCache() : undefined,
      catalog,
    },
    config
  );

  logInfo('Federation ready', {
    databases: catalog.getAllSchemas().length,
    documents: documentSearcher ? documentSearcher.size : 0,
  });

  return {
    pipeline,
    catalog,
    classifier,
    executor,
    config,
    documentSearcher,
    async close() {
      pipeline.dispose();
      await Promise.all(
        connections.map(async (connection) => {
          try {
            await connection.runner.close?.();
          } catch (error) {
            logWarn('Failed to close connection', { database_id: connection.databaseId, error: errorMessage(error) });
          }
        })
      );
    },
  };
}

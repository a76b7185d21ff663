/**
 * federated-query-mcp public API
 */

export * from './common/types.js';
export * from './common/errors.js';
export * from './common/constants.js';

export { createFederation, createTextGenerator, loadFederationFile } from './bootstrap.js';
export type { Federation, FederationOptions } from './bootstrap.js';
export { loadFederationConfig, validateFederationConfig, DEFAULT_FEDERATION_CONFIG } from './pipeline/config.js';
export type { FederationConfig } from './pipeline/config.js';
export { FederatedQueryPipeline } from './pipeline/federated-query-pipeline.js';
export type { PipelineStages, RunOptions } from './pipeline/federated-query-pipeline.js';

export { QueryIntentClassifier } from './intent/query-intent-classifier.js';
export { QueryIntentAnalyzer } from './intent/query-intent-analyzer.js';
export { scoreQuery } from './intent/heuristic-classifier.js';
export { parseQueryCommand } from './intent/query-command-parser.js';
export { planRoute, confidenceBucket, executionPath } from './intent/routing.js';

export { SqlSynthesizer, extractSql } from './sql/sql-synthesizer.js';
export { validateSql } from './sql/sql-validator.js';
export { getDialectStrategy } from './sql/dialects/index.js';
export type { SqlDialectStrategy } from './sql/dialects/index.js';

export { ParallelQueryExecutor } from './execution/parallel-query-executor.js';
export { ResultMerger } from './merge/result-merger.js';
export { joinResults } from './merge/in-memory-join.js';

export { InMemorySchemaCatalog } from './common/services/schema-catalog.js';
export type { SchemaCatalog, SchemaLoader } from './common/services/schema-catalog.js';
export { SqliteReadOnlyRunner, SqliteSchemaLoader } from './common/services/sqlite-connector.js';
export { PostgresReadOnlyRunner, PostgresSchemaLoader, createPgPool } from './common/services/postgres-connector.js';
export type { PgConnectionPool, PgQueryClient } from './common/services/postgres-connector.js';
export { KeywordDocumentSearcher } from './common/services/document-search.js';
export { QueryIntentCache } from './common/services/intent-cache.js';
export { AnthropicTextGenerator, ResilientTextGenerator } from './common/services/text-generator.js';
export type { TextGenerator, GenerateOptions } from './common/services/text-generator.js';

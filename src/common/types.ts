/**
 * Shared types for the federated query engine
 *
 * Everything that crosses a stage boundary lives here:
 *   classifier → analyzer → synthesizer → executor → merger
 *
 * Each stage's output is the next stage's only input, so these
 * shapes are the contract of the pipeline.
 */

// =============================================================================
// SCHEMA SNAPSHOTS (owned by the schema catalog, read-only in the pipeline)
// =============================================================================

export type SqlDialect = 'sqlite' | 'postgresql' | 'mysql' | 'sqlserver';

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

export interface ForeignKeyInfo {
  /** Column in the owning table */
  column: string;
  referencedTable: string;
  referencedColumn: string;
}

/** One sample row; values are kept as display strings */
export type SampleRow = Record<string, string | null>;

export interface TableInfo {
  name: string;
  columns: ColumnInfo[];
  foreignKeys: ForeignKeyInfo[];
  sampleRows: SampleRow[];
  rowCount?: number;
}

export interface SchemaSnapshot {
  databaseId: string;
  databaseName: string;
  dialect: SqlDialect;
  tables: TableInfo[];
  lastRefreshedAt: Date;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export type QueryCommandType = 'new_conversation' | 'force_conversation';

export interface QueryCommand {
  command: QueryCommandType;
  /** Text following the command, trimmed (may be empty) */
  payload: string;
}

export type HeuristicDecision = 'conversation' | 'information' | 'unknown';

export type HeuristicSignal =
  | 'question_punctuation'
  | 'unicode_digits'
  | 'multiple_numeric_groups'
  | 'long_query'
  | 'operators_or_symbols'
  | 'date_or_time'
  | 'numeric_range_or_list'
  | 'id_like_token';

export interface HeuristicResult {
  decision: HeuristicDecision;
  score: number;
  signals: HeuristicSignal[];
  tokenCount: number;
}

export type ClassificationSource = 'command' | 'heuristic' | 'ai' | 'ai_text_scan' | 'override' | 'fallback';

export type ClassificationResult =
  | {
      kind: 'conversation';
      answer?: string;
      source: ClassificationSource;
      /** Why the AI verdict was replaced by the conversation fallback */
      error?: string;
    }
  | { kind: 'information'; tokens: string[]; source: ClassificationSource }
  | { kind: 'command'; command: QueryCommand; source: 'command' };

// =============================================================================
// QUERY INTENT
// =============================================================================

export type ValidationState = 'pending' | 'valid' | 'invalid';

export interface DatabaseQueryIntent {
  databaseId: string;
  databaseName: string;
  /** Always a subset of the database's schema tables (exact casing) */
  requiredTables: string[];
  purpose: string;
  priority: number;
  /** Filled by the SQL synthesizer */
  generatedSql?: string;
  validation: {
    state: ValidationState;
    errors: string[];
  };
}

/** A database or table the analysis named but the schemas do not have */
export interface DroppedTarget {
  databaseId: string;
  databaseName: string;
  error: string;
}

export interface QueryIntent {
  originalQuery: string;
  /** Self-reported certainty in [0, 1] */
  confidence: number;
  databaseQueries: DatabaseQueryIntent[];
  requiresCrossDatabaseJoin: boolean;
  understanding: string;
  reasoning?: string;
  /** Where the intent came from */
  source: 'ai' | 'vocabulary_fallback' | 'cache' | 'none';
  dropped: DroppedTarget[];
}

// =============================================================================
// ROUTING
// =============================================================================

export type ConfidenceBucket = 'high' | 'medium' | 'low';

export type ExecutionPath = 'database' | 'document' | 'hybrid' | 'none';

export interface RoutePlan {
  bucket: ConfidenceBucket;
  runDatabase: boolean;
  runDocuments: boolean;
  reason: string;
}

// =============================================================================
// EXECUTION
// =============================================================================

export type ExecutionErrorKind = 'validation' | 'connection' | 'timeout' | 'execution' | 'cancelled';

export type CellValue = string | number | boolean | null;

export type ResultRow = Record<string, CellValue>;

export interface QueryExecutionResult {
  databaseId: string;
  databaseName: string;
  executedSql: string;
  rowCount: number;
  columns: string[];
  rows: ResultRow[];
  truncated: boolean;
  success: boolean;
  errorMessage?: string;
  errorKind?: ExecutionErrorKind;
  elapsedMs: number;
}

export interface QueryRunOptions {
  maxRows: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface QueryRunOutput {
  columns: string[];
  rows: ResultRow[];
  truncated: boolean;
}

/**
 * A read-only connection to one database.
 * Implementations must refuse anything but reader statements.
 */
export interface ReadOnlyQueryRunner {
  execute(sql: string, options: QueryRunOptions): Promise<QueryRunOutput>;
  close?(): void | Promise<void>;
}

export interface DatabaseConnection {
  databaseId: string;
  runner: ReadOnlyQueryRunner;
  maxRows: number;
  timeoutMs: number;
}

// =============================================================================
// DOCUMENTS (external capability)
// =============================================================================

export interface DocumentChunk {
  documentId: string;
  documentName: string;
  content: string;
  /** Relevance in [0, 1] */
  relevance: number;
  chunkIndex?: number;
}

export interface DocumentSearcher {
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<DocumentChunk[]>;
}

// =============================================================================
// MERGED ANSWER
// =============================================================================

export type SourceType = 'database' | 'document';

export interface AnswerSource {
  type: SourceType;
  identifier: string;
  excerpt: string;
  /** Row count for database sources, relevance score for documents */
  rowCountOrRelevance: number;
  /** Present when this source failed and contributed nothing */
  error?: string;
}

export interface MergedTable {
  label: string;
  joinColumns: string[];
  columns: string[];
  rows: ResultRow[];
}

export interface MergedAnswer {
  answer: string;
  sources: AnswerSource[];
  confidenceBucket: ConfidenceBucket;
  executionTimeMs: number;
  mergedTable?: MergedTable;
  noData: boolean;
}

export interface FederatedResponse {
  kind: 'conversation' | 'information' | 'command';
  answer: string;
  sources: AnswerSource[];
  confidenceBucket: ConfidenceBucket;
  executionTimeMs: number;
  path: ExecutionPath;
  requestId: string;
  command?: QueryCommand;
  /** Degradations that are not tied to a source */
  warnings?: string[];
}

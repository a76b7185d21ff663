/**
 * Query Intent Analyzer
 *
 * Maps an information query onto databases and tables:
 *
 *   tokens + query + schemas ──► AI analysis ──► validated QueryIntent
 *                                    │
 *                                    └─(failure)──► vocabulary fallback
 *
 * Whatever the AI says, every requiredTables entry that leaves this
 * module exists in its database's snapshot with the snapshot's casing.
 */

import type { DatabaseQueryIntent, DroppedTarget, QueryIntent, SchemaSnapshot, TableInfo } from '../common/types.js';
import type { TextGenerator } from '../common/services/text-generator.js';
import { findTable, type SchemaCatalog } from '../common/services/schema-catalog.js';
import { IntentAnalysisResponseSchema, type IntentAnalysisResponse } from '../common/schemas/index.js';
import { parseStructured } from '../common/utils/json-parser.js';
import {
  contentTokens,
  extractQueryTokens,
  identifierFragments,
  normalizeTokens,
  tokenMatchesFragment,
} from '../common/utils/text.js';
import {
  ANALYSIS_MAX_COLUMNS,
  ANALYSIS_MAX_TABLES,
  FALLBACK_CONFIDENCE,
  FALLBACK_MAX_TABLES,
} from '../common/constants.js';
import { PipelineCancelledError, SchemaValidationError, errorMessage } from '../common/errors.js';
import { logDebug, logInfo, logWarn } from '../common/services/logger.js';

export interface AnalyzeOptions {
  signal?: AbortSignal;
  requestId?: string;
}

// =============================================================================
// PROMPT
// =============================================================================

export function buildAnalysisPrompt(query: string, schemas: SchemaSnapshot[]): string {
  const lines: string[] = [];

  lines.push('# DATABASE QUERY ANALYZER');
  lines.push('');
  lines.push(`User query: "${query}"`);
  lines.push('');
  lines.push('## Available databases');
  lines.push('');

  for (const schema of schemas) {
    const totalRows = schema.tables.reduce((sum, t) => sum + (t.rowCount ?? 0), 0);
    lines.push(`DATABASE: ${schema.databaseName} (ID: ${schema.databaseId})`);
    lines.push(`  Dialect: ${schema.dialect}, Total rows: ${totalRows}`);
    lines.push('  Tables:');

    for (const table of schema.tables.slice(0, ANALYSIS_MAX_TABLES)) {
      const keyColumns = table.columns
        .slice(0, ANALYSIS_MAX_COLUMNS)
        .map((c) => `${c.name}(${c.dataType})`)
        .join(', ');
      const fkTargets = [...new Set(table.foreignKeys.map((fk) => fk.referencedTable))];
      const fkInfo = fkTargets.length > 0 ? ` [FK: ${fkTargets.join(', ')}]` : '';
      lines.push(`    - ${table.name}: ${keyColumns}${fkInfo}`);
    }
    lines.push('');
  }

  lines.push('## Rules');
  lines.push('');
  lines.push('1. Each table exists in exactly one database. Only list a table under the database that contains it.');
  lines.push('2. Use table names exactly as written above.');
  lines.push('3. Numeric or aggregate questions need the table holding the numbers and foreign key IDs.');
  lines.push('4. Questions asking for names or descriptions need the reference table too (names, titles).');
  lines.push('5. Only select databases that can contribute to the answer.');
  lines.push('6. Set requiresCrossDatabaseJoin when the answer combines rows from more than one database.');
  lines.push('');
  lines.push('## Output');
  lines.push('');
  lines.push('Return ONLY valid JSON (no markdown, no extra text):');
  lines.push('{');
  lines.push('  "understanding": "Brief explanation",');
  lines.push('  "confidence": 0.95,');
  lines.push('  "requiresCrossDatabaseJoin": false,');
  lines.push('  "reasoning": "Why these were selected",');
  lines.push('  "databases": [');
  lines.push('    {');
  lines.push('      "databaseId": "EXACT_ID",');
  lines.push('      "databaseName": "EXACT_NAME",');
  lines.push('      "requiredTables": ["Table1", "Table2"],');
  lines.push('      "purpose": "What this database contributes",');
  lines.push('      "priority": 1');
  lines.push('    }');
  lines.push('  ]');
  lines.push('}');

  return lines.join('\n');
}

// =============================================================================
// VALIDATION
// =============================================================================

function resolveSchema(
  schemas: SchemaSnapshot[],
  databaseId: string,
  databaseName: string
): SchemaSnapshot | undefined {
  const id = databaseId.toLowerCase();
  const name = databaseName.toLowerCase();
  return (
    schemas.find((s) => id !== '' && s.databaseId.toLowerCase() === id) ??
    schemas.find((s) => name !== '' && s.databaseName.toLowerCase() === name)
  );
}

function newSubIntent(schema: SchemaSnapshot, purpose: string, priority: number): DatabaseQueryIntent {
  return {
    databaseId: schema.databaseId,
    databaseName: schema.databaseName,
    requiredTables: [],
    purpose,
    priority,
    validation: { state: 'pending', errors: [] },
  };
}

/**
 * Add every table reachable through outgoing foreign keys, transitively
 */
export function expandForeignKeys(tables: string[], schema: SchemaSnapshot): string[] {
  const result = [...tables];
  const seen = new Set(tables.map((t) => t.toLowerCase()));
  const queue = [...tables];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const table = findTable(schema, current);
    if (!table) continue;

    for (const fk of table.foreignKeys) {
      const referenced = findTable(schema, fk.referencedTable);
      if (!referenced || seen.has(referenced.name.toLowerCase())) continue;
      seen.add(referenced.name.toLowerCase());
      result.push(referenced.name);
      queue.push(referenced.name);
    }
  }

  return result;
}

export interface AnalysisValidation {
  databaseQueries: DatabaseQueryIntent[];
  /** One entry per unknown database or table */
  rejected: SchemaValidationError[];
}

/**
 * Turn the AI's database list into sub-intents that respect the schemas
 *
 * - unknown databases are dropped
 * - tables are matched case-insensitively and restored to schema casing
 * - a table listed under the wrong database moves to its owner
 * - tables are expanded along foreign keys; empty sub-intents are dropped
 */
export function validateAnalysis(
  response: IntentAnalysisResponse,
  schemas: SchemaSnapshot[],
  requestId?: string
): AnalysisValidation {
  const byDatabase = new Map<string, DatabaseQueryIntent>();
  const rejected: SchemaValidationError[] = [];

  const reject = (error: SchemaValidationError) => {
    logWarn('Dropping analysis target', { request_id: requestId, database_id: error.databaseId, error: error.message });
    rejected.push(error);
  };

  const subIntentFor = (schema: SchemaSnapshot, purpose: string, priority: number): DatabaseQueryIntent => {
    let entry = byDatabase.get(schema.databaseId);
    if (!entry) {
      entry = newSubIntent(schema, purpose, priority);
      byDatabase.set(schema.databaseId, entry);
    }
    return entry;
  };

  const addTable = (entry: DatabaseQueryIntent, table: TableInfo) => {
    if (!entry.requiredTables.includes(table.name)) {
      entry.requiredTables.push(table.name);
    }
  };

  for (const db of response.databases) {
    const schema = resolveSchema(schemas, db.databaseId, db.databaseName);
    if (!schema) {
      const label = db.databaseName || db.databaseId;
      reject(new SchemaValidationError(db.databaseId || label, label, `Database '${label}' is not connected`));
      continue;
    }

    const entry = subIntentFor(schema, db.purpose, db.priority);
    entry.priority = Math.min(entry.priority, db.priority);

    for (const tableName of db.requiredTables) {
      const own = findTable(schema, tableName);
      if (own) {
        addTable(entry, own);
        continue;
      }

      const owner = schemas.find((s) => s !== schema && findTable(s, tableName) !== undefined);
      const ownerTable = owner ? findTable(owner, tableName) : undefined;
      if (owner && ownerTable) {
        logDebug('Re-homing table to its owning database', {
          request_id: requestId,
          database_id: owner.databaseId,
          table: ownerTable.name,
          from: schema.databaseId,
        });
        addTable(subIntentFor(owner, db.purpose, db.priority + 1), ownerTable);
        continue;
      }

      reject(
        new SchemaValidationError(
          schema.databaseId,
          schema.databaseName,
          `Table '${tableName}' does not exist in ${schema.databaseName}`
        )
      );
    }
  }

  const result: DatabaseQueryIntent[] = [];
  for (const entry of byDatabase.values()) {
    const schema = schemas.find((s) => s.databaseId === entry.databaseId);
    if (!schema || entry.requiredTables.length === 0) continue;
    entry.requiredTables = expandForeignKeys(entry.requiredTables, schema);
    result.push(entry);
  }

  // Stable: equal priorities keep the order the AI gave
  return { databaseQueries: result.sort((a, b) => a.priority - b.priority), rejected };
}

export function toDroppedTarget(error: SchemaValidationError): DroppedTarget {
  return { databaseId: error.databaseId, databaseName: error.databaseName, error: error.message };
}

// =============================================================================
// VOCABULARY FALLBACK
// =============================================================================

export interface VocabularyMatch {
  schema: SchemaSnapshot;
  score: number;
  tables: Array<{ table: TableInfo; score: number }>;
}

/**
 * Score each table by overlap between query terms and name fragments:
 * 2 points per term matching the table name, 1 per term matching a column
 */
export function scoreVocabulary(terms: string[], schemas: SchemaSnapshot[]): VocabularyMatch[] {
  return schemas.map((schema) => {
    const tables = schema.tables
      .map((table) => {
        const tableFragments = identifierFragments(table.name);
        const columnFragments = table.columns.flatMap((c) => identifierFragments(c.name));
        let score = 0;
        for (const term of terms) {
          if (tableFragments.some((f) => tokenMatchesFragment(term, f))) {
            score += 2;
          } else if (columnFragments.some((f) => tokenMatchesFragment(term, f))) {
            score += 1;
          }
        }
        return { table, score };
      })
      .filter((t) => t.score > 0);

    return {
      schema,
      score: tables.reduce((sum, t) => sum + t.score, 0),
      tables,
    };
  });
}

function vocabularyTerms(query: string, tokens: string[]): string[] {
  return contentTokens(normalizeTokens([...tokens, ...extractQueryTokens(query)]));
}

export function vocabularyFallback(
  query: string,
  tokens: string[],
  schemas: SchemaSnapshot[]
): QueryIntent {
  const matches = scoreVocabulary(vocabularyTerms(query, tokens), schemas)
    .filter((m) => m.score > 0)
    .sort((a, b) => b.score - a.score);

  const databaseQueries = matches.map((match, index) => {
    const best = [...match.tables]
      .sort((a, b) => b.score - a.score)
      .slice(0, FALLBACK_MAX_TABLES)
      .map((t) => t.table.name);

    return {
      ...newSubIntent(match.schema, 'Retrieve data matching the query vocabulary', index + 1),
      requiredTables: expandForeignKeys(best, match.schema),
    };
  });

  return {
    originalQuery: query,
    confidence: databaseQueries.length > 0 ? FALLBACK_CONFIDENCE : 0,
    databaseQueries,
    requiresCrossDatabaseJoin: false,
    understanding:
      databaseQueries.length > 0
        ? `Vocabulary match against ${databaseQueries.length} database(s)`
        : 'No database matched the query vocabulary',
    reasoning: 'Fallback: AI analysis unavailable or produced no usable selection',
    source: 'vocabulary_fallback',
    dropped: [],
  };
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// =============================================================================
// ANALYZER
// =============================================================================

export class QueryIntentAnalyzer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly catalog: SchemaCatalog
  ) {}

  async analyze(query: string, tokens: string[], options: AnalyzeOptions = {}): Promise<QueryIntent> {
    const logCtx = { request_id: options.requestId, stage: 'analyze' };
    const schemas = this.catalog.getAllSchemas();

    if (schemas.length === 0) {
      logWarn('No database schemas available', logCtx);
      return {
        originalQuery: query,
        confidence: 0,
        databaseQueries: [],
        requiresCrossDatabaseJoin: false,
        understanding: 'No databases are connected',
        source: 'none',
        dropped: [],
      };
    }

    const rejected: SchemaValidationError[] = [];
    let intent = await this.analyzeWithAi(query, schemas, rejected, options);
    if (!intent) {
      intent = vocabularyFallback(query, tokens, schemas);
      logInfo('Using vocabulary fallback', {
        ...logCtx,
        confidence: intent.confidence,
        databases: intent.databaseQueries.length,
      });
    }

    const vocabularySpread = scoreVocabulary(vocabularyTerms(query, tokens), schemas).filter(
      (m) => m.score > 0
    ).length;

    return {
      ...intent,
      dropped: rejected.map(toDroppedTarget),
      confidence: clampConfidence(intent.confidence),
      requiresCrossDatabaseJoin:
        intent.requiresCrossDatabaseJoin || (intent.databaseQueries.length > 1 && vocabularySpread > 1),
    };
  }

  /**
   * AI analysis, or null when the caller should fall back
   * Targets the schemas do not have are added to `rejected` either way.
   */
  private async analyzeWithAi(
    query: string,
    schemas: SchemaSnapshot[],
    rejected: SchemaValidationError[],
    options: AnalyzeOptions
  ): Promise<QueryIntent | null> {
    const logCtx = { request_id: options.requestId, stage: 'analyze' };

    let raw: string;
    try {
      raw = await this.generator.generate(buildAnalysisPrompt(query, schemas), {
        maxTokens: 1200,
        temperature: 0,
        signal: options.signal,
        requestId: options.requestId,
      });
    } catch (error) {
      if (options.signal?.aborted) throw new PipelineCancelledError('intent analysis');
      logWarn('Intent analysis call failed', { ...logCtx, error: errorMessage(error) });
      return null;
    }

    const outcome = parseStructured(raw, IntentAnalysisResponseSchema);
    if (outcome.kind !== 'structured') {
      logWarn('Intent analysis response unusable', { ...logCtx, reason: outcome.reason });
      return null;
    }

    const { databaseQueries, rejected: dropped } = validateAnalysis(outcome.value, schemas, options.requestId);
    rejected.push(...dropped);
    if (databaseQueries.length === 0) {
      logWarn('No sub-intent survived validation', logCtx);
      return null;
    }

    logInfo('Intent analyzed', {
      ...logCtx,
      confidence: outcome.value.confidence,
      databases: databaseQueries.map((q) => q.databaseId).join(','),
    });

    return {
      originalQuery: query,
      confidence: outcome.value.confidence,
      databaseQueries,
      requiresCrossDatabaseJoin: outcome.value.requiresCrossDatabaseJoin,
      understanding: outcome.value.understanding,
      reasoning: outcome.value.reasoning,
      source: 'ai',
      dropped: [],
    };
  }
}

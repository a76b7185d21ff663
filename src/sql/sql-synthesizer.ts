/**
 * SQL Synthesizer
 *
 * Turns each sub-intent into one validated, dialect-correct SELECT:
 *
 *   whitelist ──► prompt ──► generate ──► extract ──► format ──► limit ──► validate
 *
 * Sub-intents are synthesized concurrently. A sub-intent that fails any
 * step is marked invalid with its errors and is never executed; there
 * is no retry.
 */

import type { DatabaseQueryIntent, QueryIntent } from '../common/types.js';
import type { TextGenerator } from '../common/services/text-generator.js';
import { restrictSnapshot, type SchemaCatalog } from '../common/services/schema-catalog.js';
import { DEFAULT_MAX_ROWS } from '../common/constants.js';
import { PipelineCancelledError, SqlValidationError, errorMessage, throwIfAborted } from '../common/errors.js';
import { logDebug, logInfo, logWarn } from '../common/services/logger.js';
import { getDialectStrategy, type SqlDialectStrategy } from './dialects/index.js';
import { buildSqlPrompt, computeForbiddenKeywords, requestedRowCount } from './sql-prompt-builder.js';
import { validateSql } from './sql-validator.js';

export interface SynthesizeOptions {
  /** Row budget of the request */
  maxRows?: number;
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Pull the SQL statement out of a model response
 *
 * Tries a ```sql fence, then any fence, then raw text from the first
 * SELECT/WITH up to the first blank line.
 */
export function extractSql(raw: string): string | null {
  const sqlFence = /```sql\s*\n?([\s\S]*?)```/i.exec(raw);
  if (sqlFence && sqlFence[1].trim()) return sqlFence[1].trim();

  const anyFence = /```[a-z]*\s*\n?([\s\S]*?)```/i.exec(raw);
  if (anyFence && anyFence[1].trim()) return anyFence[1].trim();

  const start = /\b(SELECT|WITH)\b/i.exec(raw);
  if (!start) return null;

  const tail = raw.substring(start.index);
  const blank = /\n\s*\n/.exec(tail);
  const statement = (blank ? tail.substring(0, blank.index) : tail).trim();
  return statement.length > 0 ? statement : null;
}

export class SqlSynthesizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly catalog: SchemaCatalog
  ) {}

  /**
   * Synthesize every sub-intent; returns a new intent, the input is untouched
   */
  async synthesize(intent: QueryIntent, options: SynthesizeOptions = {}): Promise<QueryIntent> {
    throwIfAborted(options.signal, 'SQL synthesis');
    const crossDatabase = intent.requiresCrossDatabaseJoin || intent.databaseQueries.length > 1;

    const databaseQueries = await Promise.all(
      intent.databaseQueries.map((subIntent) =>
        this.synthesizeOne(intent.originalQuery, subIntent, crossDatabase, options)
      )
    );

    const validCount = databaseQueries.filter((q) => q.validation.state === 'valid').length;
    logInfo('SQL synthesized', {
      request_id: options.requestId,
      stage: 'synthesize',
      valid: validCount,
      invalid: databaseQueries.length - validCount,
    });

    return { ...intent, databaseQueries };
  }

  /**
   * One sub-intent; only cancellation escapes
   */
  async synthesizeOne(
    query: string,
    subIntent: DatabaseQueryIntent,
    crossDatabase: boolean,
    options: SynthesizeOptions = {}
  ): Promise<DatabaseQueryIntent> {
    try {
      const sql = await this.buildSql(query, subIntent, crossDatabase, options);
      return {
        ...subIntent,
        generatedSql: sql,
        validation: { state: 'valid', errors: [] },
      };
    } catch (error) {
      if (!(error instanceof SqlValidationError)) throw error;
      return {
        ...subIntent,
        generatedSql: error.sql,
        validation: { state: 'invalid', errors: error.errors },
      };
    }
  }

  /**
   * Generate and check the statement
   * @throws SqlValidationError at the first step that fails
   */
  private async buildSql(
    query: string,
    subIntent: DatabaseQueryIntent,
    crossDatabase: boolean,
    options: SynthesizeOptions
  ): Promise<string> {
    const { databaseId } = subIntent;
    const logCtx = { request_id: options.requestId, stage: 'synthesize', database_id: databaseId };

    const schema = this.catalog.getSchema(databaseId);
    if (!schema) {
      throw new SqlValidationError(databaseId, [`No schema for database '${databaseId}'`]);
    }

    let strategy: SqlDialectStrategy;
    try {
      strategy = getDialectStrategy(schema.dialect);
    } catch (error) {
      throw new SqlValidationError(databaseId, [errorMessage(error)]);
    }

    const whitelist = restrictSnapshot(schema, subIntent.requiredTables);
    if (whitelist.tables.length === 0) {
      throw new SqlValidationError(databaseId, ['No required tables to query']);
    }

    const forbiddenKeywords = computeForbiddenKeywords(query, whitelist);
    const rowLimit = requestedRowCount(query, options.maxRows ?? DEFAULT_MAX_ROWS);
    const { system, prompt } = buildSqlPrompt({
      query,
      subIntent,
      whitelist,
      strategy,
      rowLimit,
      forbiddenKeywords,
      crossDatabase,
    });

    let raw: string;
    try {
      raw = await this.generator.generate(prompt, {
        system,
        maxTokens: 800,
        temperature: 0,
        signal: options.signal,
        requestId: options.requestId,
      });
    } catch (error) {
      if (options.signal?.aborted) throw new PipelineCancelledError('SQL synthesis');
      logWarn('SQL generation failed', { ...logCtx, error: errorMessage(error) });
      throw new SqlValidationError(databaseId, [`SQL generation failed: ${errorMessage(error)}`]);
    }

    const extracted = extractSql(raw);
    if (!extracted) {
      throw new SqlValidationError(databaseId, ['No SQL statement found in the generated response']);
    }

    const sql = strategy.applyRowLimit(strategy.formatSql(extracted), rowLimit);
    const errors = validateSql(sql, { whitelist, strategy, forbiddenKeywords, maxRows: rowLimit });

    if (errors.length > 0) {
      const rejected = new SqlValidationError(databaseId, errors, sql);
      logWarn('Generated SQL rejected', { ...logCtx, error: rejected.message });
      throw rejected;
    }

    logDebug('Generated SQL accepted', { ...logCtx, sql });
    return sql;
  }
}

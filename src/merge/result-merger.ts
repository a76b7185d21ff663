/**
 * Result Merger
 *
 * Turns sub-query results and document chunks into one answer with
 * attribution. Every sub-query shows up as a source, failed ones
 * included, so nothing disappears silently.
 *
 * Degradation, in order:
 *   no database rows, some chunks ──► document-only answer + note
 *   no database rows, no chunks   ──► fixed "no data" answer
 *   answer generation fails       ──► deterministic summary
 */

import type {
  AnswerSource,
  CellValue,
  ConfidenceBucket,
  DocumentChunk,
  DroppedTarget,
  MergedAnswer,
  MergedTable,
  QueryExecutionResult,
  ResultRow,
} from '../common/types.js';
import type { TextGenerator } from '../common/services/text-generator.js';
import {
  CONTEXT_MAX_ROWS,
  DOCUMENT_EXCERPT_CHARS,
  DOCUMENT_ONLY_NOTE,
  NO_DATA_ANSWER,
  SOURCE_SQL_PREVIEW_CHARS,
} from '../common/constants.js';
import { PipelineCancelledError, errorMessage } from '../common/errors.js';
import { collapseWhitespace, truncate } from '../common/utils/text.js';
import { logInfo, logWarn } from '../common/services/logger.js';
import { joinResults } from './in-memory-join.js';

export interface MergeInput {
  query: string;
  results: Map<string, QueryExecutionResult>;
  documents: DocumentChunk[];
  /** Databases and tables the analysis named but the schemas lack */
  dropped?: DroppedTarget[];
  confidenceBucket: ConfidenceBucket;
  conversationContext?: string;
  /** Request start, for executionTimeMs */
  startedAt?: number;
}

export interface MergeOptions {
  signal?: AbortSignal;
  requestId?: string;
}

// =============================================================================
// SOURCES
// =============================================================================

export function databaseSource(result: QueryExecutionResult): AnswerSource {
  const sql = truncate(collapseWhitespace(result.executedSql), SOURCE_SQL_PREVIEW_CHARS);

  if (!result.success) {
    const error = result.errorMessage ?? 'Query failed';
    return {
      type: 'database',
      identifier: result.databaseName,
      excerpt: `Database: ${result.databaseName} | Error (${result.errorKind ?? 'execution'}): ${error}`,
      rowCountOrRelevance: 0,
      error,
    };
  }

  return {
    type: 'database',
    identifier: result.databaseName,
    excerpt: `Database: ${result.databaseName} | Rows: ${result.rowCount} | Query: ${sql}`,
    rowCountOrRelevance: result.rowCount,
  };
}

export function droppedSource(target: DroppedTarget): AnswerSource {
  return {
    type: 'database',
    identifier: target.databaseName,
    excerpt: `Database: ${target.databaseName} | Dropped: ${target.error}`,
    rowCountOrRelevance: 0,
    error: target.error,
  };
}

export function documentSource(chunk: DocumentChunk): AnswerSource {
  return {
    type: 'document',
    identifier: chunk.documentName || chunk.documentId,
    excerpt: truncate(collapseWhitespace(chunk.content), DOCUMENT_EXCERPT_CHARS),
    rowCountOrRelevance: chunk.relevance,
  };
}

// =============================================================================
// CONTEXT
// =============================================================================

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return 'NULL';
  return String(value);
}

/**
 * Compact pipe-separated table text
 */
export function renderTable(columns: string[], rows: ResultRow[], maxRows = CONTEXT_MAX_ROWS): string {
  const lines = [columns.join(' | ')];
  for (const row of rows.slice(0, maxRows)) {
    lines.push(columns.map((c) => formatCell(row[c])).join(' | '));
  }
  if (rows.length > maxRows) {
    lines.push(`... ${rows.length - maxRows} more rows`);
  }
  return lines.join('\n');
}

export function buildAnswerContext(
  successful: QueryExecutionResult[],
  documents: DocumentChunk[],
  mergedTable: MergedTable | undefined,
  conversationContext: string | undefined
): string {
  const sections: string[] = [];

  if (mergedTable) {
    sections.push(
      `=== ${mergedTable.label} joined on ${mergedTable.joinColumns.join(' = ')} ===\n` +
        renderTable(mergedTable.columns, mergedTable.rows)
    );
  }

  for (const result of successful) {
    const truncated = result.truncated ? ' (truncated)' : '';
    sections.push(
      `=== Database: ${result.databaseName} | Rows: ${result.rowCount}${truncated} ===\n` +
        renderTable(result.columns, result.rows)
    );
  }

  for (const chunk of documents) {
    sections.push(`=== Document: ${chunk.documentName} (relevance ${chunk.relevance}) ===\n${chunk.content}`);
  }

  if (conversationContext) {
    sections.push(`=== Conversation so far ===\n${conversationContext}`);
  }

  return sections.join('\n\n');
}

function buildAnswerPrompt(query: string, context: string): string {
  return `Answer the question using ONLY the data below.

Question: "${query}"

${context}

Rules:
- Use only values that appear in the data; never invent numbers or names
- Mention which database or document each fact comes from
- Plain prose or a short list; do not include SQL`;
}

/**
 * Remove SQL code blocks the model echoed back
 */
export function stripSqlBlocks(answer: string): string {
  return answer
    .replace(/```sql[\s\S]*?```/gi, '')
    .replace(/```[\s\S]*?\b(?:SELECT|WITH)\b[\s\S]*?```/gi, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Answer built from the rows and excerpts alone
 */
export function deterministicSummary(successful: QueryExecutionResult[], documents: DocumentChunk[]): string {
  const parts: string[] = [];

  for (const result of successful) {
    parts.push(`${result.databaseName} returned ${result.rowCount} row(s):`);
    parts.push(renderTable(result.columns, result.rows, 10));
  }

  for (const chunk of documents) {
    parts.push(`From ${chunk.documentName}: ${truncate(collapseWhitespace(chunk.content), DOCUMENT_EXCERPT_CHARS)}`);
  }

  return parts.join('\n\n');
}

// =============================================================================
// MERGER
// =============================================================================

export class ResultMerger {
  constructor(private readonly generator: TextGenerator) {}

  async merge(input: MergeInput, options: MergeOptions = {}): Promise<MergedAnswer> {
    const startedAt = input.startedAt ?? Date.now();
    const logCtx = { request_id: options.requestId, stage: 'merge' };
    const results = [...input.results.values()];

    const sources: AnswerSource[] = [
      ...results.map(databaseSource),
      ...(input.dropped ?? []).map(droppedSource),
      ...input.documents.map(documentSource),
    ];

    const withData = results.filter((r) => r.success && r.rowCount > 0);
    const finish = (answer: string, noData: boolean, mergedTable?: MergedTable): MergedAnswer => ({
      answer,
      sources,
      confidenceBucket: input.confidenceBucket,
      executionTimeMs: Date.now() - startedAt,
      mergedTable,
      noData,
    });

    if (withData.length === 0 && input.documents.length === 0) {
      logInfo('No data found for query', logCtx);
      return finish(NO_DATA_ANSWER, true);
    }

    const mergedTable = joinResults(withData) ?? undefined;
    if (mergedTable) {
      logInfo('Cross-database join', { ...logCtx, rows: mergedTable.rows.length, on: mergedTable.joinColumns.join('=') });
    }

    const context = buildAnswerContext(withData, input.documents, mergedTable, input.conversationContext);
    let answer: string;
    try {
      const generated = await this.generator.generate(buildAnswerPrompt(input.query, context), {
        maxTokens: 1500,
        temperature: 0.2,
        signal: options.signal,
        requestId: options.requestId,
      });
      answer = stripSqlBlocks(generated);
      if (!answer) answer = deterministicSummary(withData, input.documents);
    } catch (error) {
      if (options.signal?.aborted) throw new PipelineCancelledError('answer synthesis');
      logWarn('Answer synthesis failed, using summary', { ...logCtx, error: errorMessage(error) });
      answer = deterministicSummary(withData, input.documents);
    }

    // Databases were tried but only documents answered
    if (withData.length === 0 && results.length > 0) {
      answer = `${answer}\n\n${DOCUMENT_ONLY_NOTE}`;
    }

    return finish(answer, false, mergedTable);
  }
}

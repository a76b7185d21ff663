/**
 * SQL Prompt Builder
 *
 * Builds the per-database SQL generation prompt from the whitelisted
 * schema slice. Everything the model may touch is listed explicitly;
 * everything else is out of bounds.
 */

import type { DatabaseQueryIntent, SchemaSnapshot } from '../common/types.js';
import {
  MAX_JOINS,
  MAX_SELECT_LEVELS,
  MAX_WHERE_PREDICATES,
  PROMPT_SAMPLE_ROWS,
} from '../common/constants.js';
import {
  contentTokens,
  extractQueryTokens,
  identifierFragments,
  tokenMatchesFragment,
  truncate,
} from '../common/utils/text.js';
import type { SqlDialectStrategy } from './dialects/index.js';

export interface SqlPromptInput {
  query: string;
  subIntent: DatabaseQueryIntent;
  /** Schema already restricted to the sub-intent's tables */
  whitelist: SchemaSnapshot;
  strategy: SqlDialectStrategy;
  rowLimit: number;
  forbiddenKeywords: string[];
  /** Other databases take part in the answer */
  crossDatabase: boolean;
}

export interface SqlPrompt {
  system: string;
  prompt: string;
}

/**
 * Every column-name fragment of the schema
 */
export function schemaVocabulary(schema: SchemaSnapshot): Set<string> {
  const vocabulary = new Set<string>();
  for (const table of schema.tables) {
    for (const column of table.columns) {
      for (const f of identifierFragments(column.name)) vocabulary.add(f);
    }
  }
  return vocabulary;
}

/**
 * User words that match no known column
 * Sample values do not count: a word that only shows up in sample rows
 * is still kept out of filter predicates.
 */
export function computeForbiddenKeywords(query: string, schema: SchemaSnapshot): string[] {
  const vocabulary = [...schemaVocabulary(schema)];
  return contentTokens(extractQueryTokens(query)).filter(
    (token) => !vocabulary.some((fragment) => tokenMatchesFragment(token, fragment))
  );
}

/**
 * Row count the question asks for ("top 5", "first 10"), capped at maxRows
 */
export function requestedRowCount(query: string, maxRows: number): number {
  const match = /\b(?:top|first|last|limit|best|worst)\s+(\d+)\b/i.exec(query);
  if (!match) return maxRows;
  const requested = parseInt(match[1], 10);
  return requested > 0 ? Math.min(requested, maxRows) : maxRows;
}

function renderSchema(schema: SchemaSnapshot): string[] {
  const lines: string[] = [];

  for (const table of schema.tables) {
    const rows = table.rowCount !== undefined ? ` (~${table.rowCount} rows)` : '';
    lines.push(`TABLE ${table.name}${rows}`);
    for (const column of table.columns) {
      const flags = [column.isPrimaryKey ? 'PK' : '', column.nullable ? 'NULL' : 'NOT NULL']
        .filter((f) => f.length > 0)
        .join(', ');
      lines.push(`  - ${column.name} ${column.dataType || 'ANY'} (${flags})`);
    }

    const samples = table.sampleRows.slice(0, PROMPT_SAMPLE_ROWS);
    if (samples.length > 0) {
      lines.push('  Sample rows:');
      for (const row of samples) {
        const cells = Object.entries(row).map(
          ([key, value]) => `${key}=${value === null ? 'NULL' : truncate(value, 40)}`
        );
        lines.push(`    ${cells.join(', ')}`);
      }
    }
    lines.push('');
  }

  return lines;
}

function renderJoinHints(schema: SchemaSnapshot): string[] {
  const names = new Set(schema.tables.map((t) => t.name.toLowerCase()));
  const hints: string[] = [];
  for (const table of schema.tables) {
    for (const fk of table.foreignKeys) {
      if (names.has(fk.referencedTable.toLowerCase())) {
        hints.push(`  ${table.name}.${fk.column} -> ${fk.referencedTable}.${fk.referencedColumn}`);
      }
    }
  }
  return hints;
}

export function buildSqlPrompt(input: SqlPromptInput): SqlPrompt {
  const { query, subIntent, whitelist, strategy, rowLimit, forbiddenKeywords, crossDatabase } = input;
  const lines: string[] = [];

  lines.push('## Question');
  lines.push(`"${query}"`);
  if (subIntent.purpose) {
    lines.push(`Purpose for this database: ${subIntent.purpose}`);
  }
  lines.push('');

  lines.push(`## Database: ${whitelist.databaseName} (${strategy.displayName})`);
  lines.push('Use ONLY these tables and columns. Anything not listed does not exist.');
  lines.push('');
  lines.push(...renderSchema(whitelist));

  const hints = renderJoinHints(whitelist);
  if (hints.length > 0) {
    lines.push('## Join hints (foreign keys)');
    lines.push(...hints);
    lines.push('');
  }

  lines.push('## Constraints');
  lines.push(`- At most ${MAX_JOINS} JOINs; never CROSS JOIN`);
  lines.push(`- At most ${MAX_WHERE_PREDICATES} predicates in WHERE`);
  lines.push('- ORDER BY at most one column');
  lines.push(`- At most ${MAX_SELECT_LEVELS} SELECT levels (one subquery)`);
  lines.push(`- Return at most ${rowLimit} rows using: ${strategy.getLimitClause(rowLimit)}`);
  lines.push('- Read-only: a single SELECT statement, no placeholders');
  lines.push('');

  if (crossDatabase) {
    lines.push('## Cross-database answer');
    lines.push('Other databases hold the rest of the answer and results are joined afterwards.');
    lines.push('- Always project the foreign key / ID columns that link to other data');
    lines.push('- Add one descriptive column (name, title) next to each ID');
    lines.push('- Do not aggregate a metric this database does not have; return the IDs instead');
    lines.push('');
  }

  if (forbiddenKeywords.length > 0) {
    lines.push('## Forbidden keywords');
    lines.push('These words from the question match nothing in this schema.');
    lines.push('Never use them in WHERE, LIKE or HAVING predicates:');
    lines.push(`  ${forbiddenKeywords.join(', ')}`);
    lines.push('');
  }

  lines.push('Return the SQL statement in a ```sql code block.');

  return {
    system: strategy.buildSystemPrompt(),
    prompt: lines.join('\n'),
  };
}

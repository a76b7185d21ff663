/**
 * Base SQL dialect strategy
 *
 * Shared read-only validation and formatting fixes for model-written SQL.
 * Each vendor subclass adds its own prompt, limit syntax and rules.
 */

import type { SqlDialect } from '../../common/types.js';
import { stripStringLiterals } from '../sql-text.js';

export interface SqlDialectStrategy {
  readonly dialect: SqlDialect;
  readonly displayName: string;

  /** System prompt for SQL generation in this dialect */
  buildSystemPrompt(): string;

  /** Errors found in the statement; empty when it passes */
  validateSyntax(sql: string): string[];

  /** Normalize the statement (trailing semicolon, typo fixes, vendor rewrites) */
  formatSql(sql: string): string;

  /** Row-limit clause for this dialect, e.g. "LIMIT 5" or "TOP 5" */
  getLimitClause(limit: number): string;

  /** Bring the outermost row limit within `maxRows`, adding one if absent */
  applyRowLimit(sql: string, maxRows: number): string;

  /** Outermost row limit of the statement, or null */
  extractRowLimit(sql: string): number | null;

  escapeIdentifier(identifier: string): string;
}

export const FORBIDDEN_STATEMENT_KEYWORDS = [
  'DROP',
  'DELETE',
  'TRUNCATE',
  'ALTER',
  'CREATE',
  'GRANT',
  'REVOKE',
  'EXEC',
  'EXECUTE',
  'INSERT',
  'UPDATE',
  'MERGE',
  'ATTACH',
  'DETACH',
] as const;

const TRAILING_LIMIT = /\bLIMIT\s+(\d+)(\s+OFFSET\s+\d+)?\s*$/i;

export abstract class BaseDialectStrategy implements SqlDialectStrategy {
  abstract readonly dialect: SqlDialect;
  abstract readonly displayName: string;

  abstract buildSystemPrompt(): string;

  // ===========================================================================
  // VALIDATION
  // ===========================================================================

  validateSyntax(sql: string): string[] {
    if (sql.trim().length === 0) {
      return ['SQL query is empty'];
    }

    const errors: string[] = [];
    const code = stripStringLiterals(sql);

    if (!/^\s*(SELECT|WITH)\b/i.test(code)) {
      errors.push('Only SELECT statements are allowed');
    }

    if (code.replace(/;\s*$/, '').includes(';')) {
      errors.push('Only a single statement is allowed');
    }

    for (const keyword of FORBIDDEN_STATEMENT_KEYWORDS) {
      // Word boundaries: "CreatedDate" is not CREATE
      if (new RegExp(`\\b${keyword}\\b`, 'i').test(code)) {
        errors.push(`SQL contains forbidden keyword: ${keyword}`);
      }
    }

    return errors;
  }

  // ===========================================================================
  // FORMATTING
  // ===========================================================================

  formatSql(sql: string): string {
    let formatted = sql.trim();
    formatted = formatted.replace(/;+\s*$/, '').trim();

    formatted = fixMissingBy(formatted);
    formatted = fixDuplicateBy(formatted);
    formatted = fixLeadingComma(formatted);
    formatted = fixTrailingComma(formatted);

    return formatted.replace(/[ \t]{2,}/g, ' ').trim();
  }

  // ===========================================================================
  // ROW LIMITS (LIMIT n; SQL Server overrides)
  // ===========================================================================

  getLimitClause(limit: number): string {
    return `LIMIT ${limit}`;
  }

  extractRowLimit(sql: string): number | null {
    const match = TRAILING_LIMIT.exec(sql.trim());
    return match ? parseInt(match[1], 10) : null;
  }

  applyRowLimit(sql: string, maxRows: number): string {
    const trimmed = sql.trim();
    const match = TRAILING_LIMIT.exec(trimmed);
    if (!match) {
      return `${trimmed} ${this.getLimitClause(maxRows)}`;
    }
    if (parseInt(match[1], 10) <= maxRows) {
      return trimmed;
    }
    return `${trimmed.substring(0, match.index)}LIMIT ${maxRows}${match[2] ?? ''}`;
  }

  escapeIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }
}

// =============================================================================
// SHARED FIXES
// =============================================================================

const LIST = '([A-Za-z0-9_.\\[\\]"`,\\s]+?)';

/** "GROUP category" -> "GROUP BY category", same for ORDER */
export function fixMissingBy(sql: string): string {
  const group = sql.replace(
    new RegExp(`(?<![\\["\`])\\bGROUP\\s+(?!\\s|BY\\b)${LIST}(?=\\s+ORDER\\b|\\s+HAVING\\b|\\s+LIMIT\\b|\\s*$)`, 'gi'),
    'GROUP BY $1'
  );
  return group.replace(
    new RegExp(`(?<![\\["\`])\\bORDER\\s+(?!\\s|BY\\b)${LIST}(?=\\s+LIMIT\\b|\\s+OFFSET\\b|\\s+FETCH\\b|\\s*$)`, 'gi'),
    'ORDER BY $1'
  );
}

/** "ORDER BY BY x" -> "ORDER BY x" */
export function fixDuplicateBy(sql: string): string {
  return sql.replace(/\b(GROUP|ORDER)\s+BY\s+BY\b/gi, '$1 BY');
}

/** "GROUP BY , x" -> "GROUP BY x" */
export function fixLeadingComma(sql: string): string {
  return sql.replace(/\b(GROUP|ORDER)\s+BY\s*,\s*/gi, '$1 BY ');
}

/** "SELECT a, b, FROM" -> "SELECT a, b FROM" */
export function fixTrailingComma(sql: string): string {
  return sql
    .replace(/,\s*(?=\b(?:FROM|WHERE|GROUP|ORDER|HAVING|LIMIT)\b|\)|$)/gi, ' ')
    .replace(/\s+\)/g, ')');
}

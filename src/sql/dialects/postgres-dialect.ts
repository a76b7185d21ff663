/**
 * PostgreSQL dialect: LIMIT n, no TOP, mixed-case names must be quoted
 */

import type { SqlDialect } from '../../common/types.js';
import { stripStringLiterals } from '../sql-text.js';
import { BaseDialectStrategy } from './base-dialect.js';

function hasUpperCase(value: string): boolean {
  return value !== value.toLowerCase();
}

function quoteIfMixedCase(part: string): string {
  return hasUpperCase(part) ? `"${part}"` : part;
}

export class PostgresDialectStrategy extends BaseDialectStrategy {
  readonly dialect: SqlDialect = 'postgresql';
  readonly displayName = 'PostgreSQL';

  buildSystemPrompt(): string {
    return `You are an expert PostgreSQL query writer.
Write one valid, read-only PostgreSQL SELECT statement for the user's request.

PostgreSQL rules:
- Row limits use LIMIT n at the end of the statement; TOP does not exist
- Unquoted identifiers fold to lowercase; wrap mixed-case names in double quotes: "Sales"."Customer"
- Use ILIKE for case-insensitive matching
- Use EXTRACT(YEAR FROM column) or date_trunc() for dates

Return only the SQL statement in a \`\`\`sql code block.`;
  }

  validateSyntax(sql: string): string[] {
    const errors = super.validateSyntax(sql);
    if (/\bSELECT\s+(?:DISTINCT\s+)?TOP\s*\(?\s*\d+/i.test(stripStringLiterals(sql))) {
      errors.push('PostgreSQL does not support TOP; use LIMIT n');
    }
    return errors;
  }

  /** Quote mixed-case schema.table names after FROM/JOIN */
  formatSql(sql: string): string {
    return super
      .formatSql(sql)
      .replace(
        /\b(FROM|JOIN)\s+([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)\b/gi,
        (_match, keyword: string, schema: string, table: string) =>
          `${keyword} ${quoteIfMixedCase(schema)}.${quoteIfMixedCase(table)}`
      );
  }
}

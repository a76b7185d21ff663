/**
 * SQL Server dialect
 *
 * Row limits are "SELECT TOP n". Models often write LIMIT or
 * FETCH FIRST anyway; both are rewritten into TOP when they trail the
 * statement. Backtick identifiers become [brackets].
 */

import type { SqlDialect } from '../../common/types.js';
import { stripStringLiterals } from '../sql-text.js';
import { BaseDialectStrategy } from './base-dialect.js';

const SELECT_HEAD = /^(\s*SELECT\s+(?:DISTINCT\s+)?)/i;
const TOP_CLAUSE = /^(\s*SELECT\s+(?:DISTINCT\s+)?)TOP\s*\(?\s*(\d+)(?:\s*\))?/i;
const TRAILING_LIMIT = /\s+LIMIT\s+(\d+)\s*$/i;
const TRAILING_FETCH = /\s+(?:OFFSET\s+0\s+ROWS?\s+)?FETCH\s+(?:FIRST|NEXT)\s+(\d+)\s+ROWS?\s+ONLY\s*$/i;

/**
 * Insert "TOP n" after the leading SELECT [DISTINCT], unless TOP is there.
 * Null when the statement does not start with SELECT (e.g. a CTE).
 */
function insertTop(sql: string, limit: string): string | null {
  if (TOP_CLAUSE.test(sql)) return sql;
  return SELECT_HEAD.test(sql) ? sql.replace(SELECT_HEAD, `$1TOP ${limit} `) : null;
}

export class SqlServerDialectStrategy extends BaseDialectStrategy {
  readonly dialect: SqlDialect = 'sqlserver';
  readonly displayName = 'SQL Server';

  buildSystemPrompt(): string {
    return `You are an expert Microsoft SQL Server (T-SQL) query writer.
Write one valid, read-only T-SQL SELECT statement for the user's request.

SQL Server rules:
- Row limits use TOP n immediately after SELECT: SELECT TOP 5 ...; LIMIT does not exist
- Never put TOP after ORDER BY
- Escape identifiers with square brackets: [Order Details]
- Use YEAR(column), MONTH(column), DATEADD() and DATEDIFF() for dates

Return only the SQL statement in a \`\`\`sql code block.`;
  }

  validateSyntax(sql: string): string[] {
    const errors = super.validateSyntax(sql);
    const code = stripStringLiterals(sql);

    if (/\bLIMIT\b/i.test(code) && !/\bFETCH\b/i.test(code)) {
      errors.push('SQL Server does not support LIMIT; use SELECT TOP n');
    }

    if (/\bORDER\s+BY\b[^;]*?\bTOP\s*\(?\s*\d+/i.test(code)) {
      errors.push('TOP must come immediately after SELECT, not after ORDER BY');
    }

    return errors;
  }

  formatSql(sql: string): string {
    let formatted = super.formatSql(sql).replace(/`([^`]+)`/g, '[$1]');

    for (const trailing of [TRAILING_LIMIT, TRAILING_FETCH]) {
      const match = trailing.exec(formatted);
      if (!match) continue;
      formatted = insertTop(formatted.substring(0, match.index), match[1]) ?? formatted;
    }

    return formatted;
  }

  getLimitClause(limit: number): string {
    return `TOP ${limit}`;
  }

  extractRowLimit(sql: string): number | null {
    const match = TOP_CLAUSE.exec(sql);
    return match ? parseInt(match[2], 10) : null;
  }

  applyRowLimit(sql: string, maxRows: number): string {
    const match = TOP_CLAUSE.exec(sql);
    if (!match) {
      return insertTop(sql, String(maxRows)) ?? sql;
    }
    if (parseInt(match[2], 10) <= maxRows) {
      return sql;
    }
    return sql.replace(TOP_CLAUSE, `$1TOP ${maxRows}`);
  }

  escapeIdentifier(identifier: string): string {
    return `[${identifier.replace(/]/g, ']]')}]`;
  }
}

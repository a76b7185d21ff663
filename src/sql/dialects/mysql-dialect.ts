/**
 * MySQL dialect: LIMIT n, backtick identifiers
 */

import type { SqlDialect } from '../../common/types.js';
import { BaseDialectStrategy } from './base-dialect.js';

export class MySqlDialectStrategy extends BaseDialectStrategy {
  readonly dialect: SqlDialect = 'mysql';
  readonly displayName = 'MySQL';

  buildSystemPrompt(): string {
    return `You are an expert MySQL query writer.
Write one valid, read-only MySQL SELECT statement for the user's request.

MySQL rules:
- Row limits use LIMIT n at the end of the statement; never TOP or FETCH FIRST
- Escape identifiers containing spaces, dashes or dots with backticks: \`Order Details\`
- Concatenate with CONCAT(a, b)
- Use YEAR(column), MONTH(column) and DATE_FORMAT() for dates

Return only the SQL statement in a \`\`\`sql code block.`;
  }

  /** Square-bracket identifiers become backticks */
  formatSql(sql: string): string {
    return super.formatSql(sql).replace(/\[([^\]]+)\]/g, '`$1`');
  }

  escapeIdentifier(identifier: string): string {
    if (/[\s.-]/.test(identifier)) {
      return `\`${identifier.replace(/`/g, '``')}\``;
    }
    return identifier;
  }
}

/**
 * SQLite dialect: LIMIT n, || for concatenation, strftime() for dates
 */

import type { SqlDialect } from '../../common/types.js';
import { BaseDialectStrategy } from './base-dialect.js';

export class SqliteDialectStrategy extends BaseDialectStrategy {
  readonly dialect: SqlDialect = 'sqlite';
  readonly displayName = 'SQLite';

  buildSystemPrompt(): string {
    return `You are an expert SQLite query writer.
Write one valid, read-only SQLite SELECT statement for the user's request.

SQLite rules:
- Row limits use LIMIT n at the end of the statement; never TOP
- Concatenate with ||, not CONCAT()
- Dates are TEXT; use strftime('%Y', column) or date(column)
- Use COLLATE NOCASE for case-insensitive text comparison
- Quote identifiers with double quotes only when they contain spaces or reserved words

Return only the SQL statement in a \`\`\`sql code block.`;
  }
}

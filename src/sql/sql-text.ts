/**
 * SQL text helpers
 *
 * A small lexer, just enough to tell identifiers, keywords, string
 * literals and punctuation apart. Validation works on tokens so that
 * a keyword inside 'a string literal' is never mistaken for code.
 */

export type SqlTokenType = 'word' | 'quoted' | 'string' | 'number' | 'punct';

export interface SqlToken {
  type: SqlTokenType;
  /** Identifier or literal content without quotes; punctuation as written */
  value: string;
  /** Uppercase value for words, empty otherwise */
  upper: string;
  /** Parenthesis depth at this token */
  depth: number;
}

const MULTI_CHAR_PUNCT = ['<=', '>=', '<>', '!=', '||', '::'];

/**
 * Split SQL into tokens; comments are dropped
 */
export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let depth = 0;
  let i = 0;

  const push = (type: SqlTokenType, value: string) => {
    tokens.push({ type, value, upper: type === 'word' ? value.toUpperCase() : '', depth });
  };

  while (i < sql.length) {
    const c = sql[i];

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    // -- line comment
    if (c === '-' && sql[i + 1] === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }

    /* block comment */
    if (c === '/' && sql[i + 1] === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
      continue;
    }

    if (c === "'") {
      let value = '';
      i++;
      while (i < sql.length) {
        if (sql[i] === "'" && sql[i + 1] === "'") {
          value += "'";
          i += 2;
          continue;
        }
        if (sql[i] === "'") break;
        value += sql[i];
        i++;
      }
      i++;
      push('string', value);
      continue;
    }

    if (c === '"' || c === '`' || c === '[') {
      const close = c === '[' ? ']' : c;
      const end = sql.indexOf(close, i + 1);
      const value = end === -1 ? sql.substring(i + 1) : sql.substring(i + 1, end);
      i = end === -1 ? sql.length : end + 1;
      push('quoted', value);
      continue;
    }

    const word = /^[\p{L}_@#][\p{L}\p{N}_$@#]*/u.exec(sql.substring(i));
    if (word) {
      push('word', word[0]);
      i += word[0].length;
      continue;
    }

    const number = /^\d+(\.\d+)?/.exec(sql.substring(i));
    if (number) {
      push('number', number[0]);
      i += number[0].length;
      continue;
    }

    const multi = MULTI_CHAR_PUNCT.find((p) => sql.startsWith(p, i));
    if (multi) {
      push('punct', multi);
      i += multi.length;
      continue;
    }

    if (c === '(') {
      push('punct', c);
      depth++;
      i++;
      continue;
    }

    if (c === ')') {
      depth = Math.max(0, depth - 1);
      push('punct', c);
      i++;
      continue;
    }

    push('punct', c);
    i++;
  }

  return tokens;
}

/**
 * SQL with every string literal replaced by ''
 */
export function stripStringLiterals(sql: string): string {
  return sql.replace(/'(?:[^']|'')*'?/g, "''");
}

/**
 * Identifier tokens: bare words or quoted names
 */
export function isIdentifierToken(token: SqlToken | undefined): token is SqlToken {
  return token !== undefined && (token.type === 'word' || token.type === 'quoted');
}

export function isWord(token: SqlToken | undefined, ...words: string[]): boolean {
  return token !== undefined && token.type === 'word' && words.includes(token.upper);
}

export function isPunct(token: SqlToken | undefined, value: string): boolean {
  return token !== undefined && token.type === 'punct' && token.value === value;
}

/** Reserved words and common functions; never user vocabulary */
export const SQL_WORDS = new Set([
  'ALL', 'AND', 'AS', 'ASC', 'AVG', 'BETWEEN', 'BY', 'CASE', 'CAST', 'COALESCE', 'COLLATE',
  'COUNT', 'CROSS', 'CURRENT_DATE', 'CURRENT_TIMESTAMP', 'DATE', 'DATEADD', 'DATEDIFF', 'DAY',
  'DESC', 'DISTINCT', 'ELSE', 'END', 'ESCAPE', 'EXCEPT', 'EXISTS', 'EXTRACT', 'FALSE', 'FETCH',
  'FIRST', 'FROM', 'FULL', 'GETDATE', 'GLOB', 'GROUP', 'HAVING', 'ILIKE', 'IN', 'INNER',
  'INTERSECT', 'INTERVAL', 'IS', 'ISNULL', 'JOIN', 'LEFT', 'LIKE', 'LIMIT', 'LOWER', 'MAX', 'MIN',
  'MONTH', 'NATURAL', 'NEXT', 'NOCASE', 'NOT', 'NOW', 'NULL', 'NULLIF', 'OFFSET', 'ON', 'ONLY',
  'OR', 'ORDER', 'OUTER', 'OVER', 'PARTITION', 'RIGHT', 'ROUND', 'ROW', 'ROWS', 'SELECT', 'SUM',
  'STRFTIME', 'SUBSTR', 'SUBSTRING', 'THEN', 'TIES', 'TOP', 'TRIM', 'TRUE', 'UNION', 'UPPER',
  'USING', 'WHEN', 'WHERE', 'WITH', 'YEAR',
  // clause modifiers, type names and date parts that appear without parentheses
  'ANY', 'BIGINT', 'BOOLEAN', 'CHAR', 'CURRENT', 'DECIMAL', 'DOUBLE', 'FILTER', 'FLOAT',
  'FOLLOWING', 'HOUR', 'INT', 'INTEGER', 'LAST', 'LATERAL', 'MINUTE', 'NULLS', 'NUMERIC',
  'PERCENT', 'PRECEDING', 'PRECISION', 'QUARTER', 'RANGE', 'REAL', 'RECURSIVE', 'ROWID',
  'SECOND', 'SOME', 'TEXT', 'TIME', 'TIMESTAMP', 'UNBOUNDED', 'VARCHAR', 'WEEK', 'WITHIN',
]);

/** Words that end a table reference's optional alias */
export const CLAUSE_WORDS = new Set([
  'WHERE', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'CROSS', 'NATURAL', 'ON', 'USING',
  'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'OFFSET', 'FETCH', 'UNION', 'EXCEPT', 'INTERSECT',
  'WINDOW', 'SELECT', 'FROM', 'WITH', 'AND', 'OR', 'AS',
]);

/**
 * SQL Validator
 *
 * Mandatory gate between synthesis and execution. A statement runs
 * only when it passes every check:
 *
 * 1. Dialect syntax (read-only, single statement, vendor limit rules)
 * 2. Whitelist: every FROM/JOIN table is allowed; every column reference,
 *    qualified or bare, names a column of an allowed table
 * 3. Structure: joins, WHERE predicates and SELECT nesting stay small;
 *    no CROSS JOIN, no placeholder text, row limit within budget
 * 4. Forbidden keywords never appear inside a filter literal
 */

import type { SchemaSnapshot, TableInfo } from '../common/types.js';
import { MAX_JOINS, MAX_SELECT_LEVELS, MAX_WHERE_PREDICATES } from '../common/constants.js';
import { singularize, wordTokens } from '../common/utils/text.js';
import type { SqlDialectStrategy } from './dialects/index.js';
import {
  CLAUSE_WORDS,
  SQL_WORDS,
  isIdentifierToken,
  isPunct,
  isWord,
  tokenizeSql,
  type SqlToken,
} from './sql-text.js';

export interface SqlValidationContext {
  /** Schema restricted to the allowed tables */
  whitelist: SchemaSnapshot;
  strategy: SqlDialectStrategy;
  /** User words that match nothing in the schema */
  forbiddenKeywords?: string[];
  /** Row budget the outermost limit must respect; unchecked when absent */
  maxRows?: number;
  maxJoins?: number;
  maxWherePredicates?: number;
  maxSelectLevels?: number;
}

export interface TableReference {
  /** Name as written, schema prefix included */
  name: string;
  alias?: string;
}

export interface SqlStructure {
  tables: TableReference[];
  /** Explicit JOINs plus comma-separated FROM entries */
  joinCount: number;
  crossJoin: boolean;
  selectCount: number;
  /** Predicate count of the busiest WHERE clause */
  maxWherePredicates: number;
  cteNames: string[];
}

// =============================================================================
// PARSING
// =============================================================================

function readQualifiedName(tokens: SqlToken[], start: number): { name: string; next: number } | null {
  if (!isIdentifierToken(tokens[start])) return null;
  const parts = [tokens[start].value];
  let i = start + 1;
  while (isPunct(tokens[i], '.') && isIdentifierToken(tokens[i + 1])) {
    parts.push(tokens[i + 1].value);
    i += 2;
  }
  return { name: parts.join('.'), next: i };
}

function readAlias(tokens: SqlToken[], start: number): { alias?: string; next: number } {
  let i = start;
  if (isWord(tokens[i], 'AS')) i++;
  const token = tokens[i];
  if (token && (token.type === 'quoted' || (token.type === 'word' && !CLAUSE_WORDS.has(token.upper)))) {
    return { alias: token.value, next: i + 1 };
  }
  return { next: start };
}

/**
 * Count predicates in the WHERE clause starting after `start`
 * BETWEEN x AND y counts once.
 */
function countPredicates(tokens: SqlToken[], start: number): number {
  const depth = tokens[start].depth;
  let count = 1;
  let pendingBetween = false;

  for (let i = start + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.depth < depth || (token.depth === depth && isPunct(token, ')'))) break;
    if (token.depth === depth && isWord(token, 'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'UNION', 'EXCEPT', 'INTERSECT', 'OFFSET', 'FETCH', 'WINDOW')) break;
    if (token.depth !== depth) continue;

    if (isWord(token, 'BETWEEN')) {
      pendingBetween = true;
    } else if (isWord(token, 'AND') && pendingBetween) {
      pendingBetween = false;
    } else if (isWord(token, 'AND', 'OR')) {
      count++;
    }
  }

  return count;
}

/**
 * Index of the "(" that opens the group containing tokens[index]
 */
function openingParen(tokens: SqlToken[], index: number): number {
  const depth = tokens[index].depth;
  for (let i = index - 1; i >= 0; i--) {
    if (isPunct(tokens[i], '(') && tokens[i].depth === depth - 1) return i;
  }
  return -1;
}

/**
 * Index of the "(" that tokens[closeIndex], a ")", closes
 */
function matchingParen(tokens: SqlToken[], closeIndex: number): number {
  const depth = tokens[closeIndex].depth;
  for (let i = closeIndex - 1; i >= 0; i--) {
    if (isPunct(tokens[i], '(') && tokens[i].depth === depth) return i;
  }
  return -1;
}

/** Functions whose argument list has its own FROM: EXTRACT(YEAR FROM d) */
const FROM_ARGUMENT_FUNCTIONS = ['EXTRACT', 'SUBSTRING', 'TRIM', 'OVERLAY', 'POSITION'];

function isFunctionArgumentFrom(tokens: SqlToken[], index: number): boolean {
  if (tokens[index].depth === 0) return false;
  const open = openingParen(tokens, index);
  return open > 0 && isWord(tokens[open - 1], ...FROM_ARGUMENT_FUNCTIONS);
}

export function analyzeSqlStructure(sql: string): SqlStructure {
  const tokens = tokenizeSql(sql);
  const tables: TableReference[] = [];
  const cteNames: string[] = [];
  let joinCount = 0;
  let crossJoin = false;
  let selectCount = 0;
  let maxWherePredicates = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (isIdentifierToken(token) && isWord(tokens[i + 1], 'AS') && isPunct(tokens[i + 2], '(')) {
      cteNames.push(token.value);
    }

    if (isWord(token, 'SELECT')) selectCount++;
    if (isWord(token, 'CROSS') && isWord(tokens[i + 1], 'JOIN')) crossJoin = true;
    if (isWord(token, 'WHERE')) {
      maxWherePredicates = Math.max(maxWherePredicates, countPredicates(tokens, i));
    }

    if (!isWord(token, 'FROM', 'JOIN')) continue;
    if (isFunctionArgumentFrom(tokens, i)) continue;
    if (isWord(token, 'JOIN')) joinCount++;

    // FROM a, b, c: each extra entry is an implicit join
    let cursor = i + 1;
    for (;;) {
      if (isPunct(tokens[cursor], '(')) break;
      const qualified = readQualifiedName(tokens, cursor);
      if (!qualified) break;
      const alias = readAlias(tokens, qualified.next);
      tables.push({ name: qualified.name, alias: alias.alias });
      cursor = alias.next;

      if (isWord(token, 'FROM') && isPunct(tokens[cursor], ',')) {
        joinCount++;
        cursor++;
        continue;
      }
      break;
    }
  }

  return { tables, joinCount, crossJoin, selectCount, maxWherePredicates, cteNames };
}

// =============================================================================
// CHECKS
// =============================================================================

function lastSegment(name: string): string {
  const parts = name.split('.');
  return parts[parts.length - 1].toLowerCase();
}

/**
 * Whitelisted table for a reference, matching "schema.table" or "table"
 */
function resolveWhitelisted(whitelist: SchemaSnapshot, reference: string): TableInfo | undefined {
  const full = reference.toLowerCase();
  const last = lastSegment(reference);
  return (
    whitelist.tables.find((t) => t.name.toLowerCase() === full) ??
    whitelist.tables.find((t) => lastSegment(t.name) === last)
  );
}

export function containsPlaceholder(sql: string): boolean {
  return (
    /\b(your_table|table_name|column_name|your_column|placeholder)\b/i.test(sql) ||
    /<[a-z_]+>/i.test(sql) ||
    /\?\?\?|\.\.\./.test(sql)
  );
}

/**
 * Check alias.column references against the aliased table
 */
function checkQualifiedColumns(tokens: SqlToken[], aliases: Map<string, TableInfo>): string[] {
  const errors: string[] = [];

  for (let i = 0; i + 2 < tokens.length; i++) {
    const qualifier = tokens[i];
    const column = tokens[i + 2];
    if (!isIdentifierToken(qualifier) || !isPunct(tokens[i + 1], '.')) continue;
    if (isWord(tokens[i - 1], 'FROM', 'JOIN') || isPunct(tokens[i - 1], '.')) continue;

    const table = aliases.get(qualifier.value.toLowerCase());
    if (!table) continue;
    if (isPunct(column, '*')) continue;
    if (!isIdentifierToken(column)) continue;
    // A third segment means qualifier was a schema name
    if (isPunct(tokens[i + 3], '.')) continue;

    const exists = table.columns.some((c) => c.name.toLowerCase() === column.value.toLowerCase());
    if (!exists) {
      errors.push(`Column '${column.value}' does not exist in table '${table.name}'`);
    }
  }

  return errors;
}

/**
 * Names the statement defines for itself: CTEs, table aliases and
 * output aliases, explicit ("AS total") or implicit ("COUNT(*) total")
 */
function definedNames(tokens: SqlToken[], structure: SqlStructure): Set<string> {
  const names = new Set<string>(structure.cteNames.map((n) => n.toLowerCase()));
  for (const reference of structure.tables) {
    names.add(lastSegment(reference.name));
    if (reference.alias) names.add(reference.alias.toLowerCase());
  }

  tokens.forEach((token, i) => {
    if (!isIdentifierToken(token) || isPunct(tokens[i + 1], '(') || isPunct(tokens[i + 1], '.')) return;
    if (token.type === 'word' && SQL_WORDS.has(token.upper)) return;

    const previous = tokens[i - 1];
    if (isWord(previous, 'AS') || isWord(previous, 'END')) {
      names.add(token.value.toLowerCase());
    } else if (isPunct(previous, ')')) {
      const open = matchingParen(tokens, i - 1);
      // TOP (5) name: the word after the group is a column, not an alias
      if (!isWord(tokens[open - 1], 'TOP')) names.add(token.value.toLowerCase());
    } else if (isIdentifierToken(previous) && !(previous.type === 'word' && SQL_WORDS.has(previous.upper))) {
      names.add(token.value.toLowerCase());
    }
  });

  return names;
}

/**
 * Check bare column references against every allowed table
 * Qualified references are left to checkQualifiedColumns.
 */
function checkBareColumns(tokens: SqlToken[], whitelist: SchemaSnapshot, defined: Set<string>): string[] {
  const known = new Set<string>();
  for (const table of whitelist.tables) {
    known.add(lastSegment(table.name));
    for (const column of table.columns) known.add(column.name.toLowerCase());
  }

  const unknown = new Set<string>();
  tokens.forEach((token, i) => {
    if (!isIdentifierToken(token)) return;
    if (token.type === 'word' && SQL_WORDS.has(token.upper)) return;
    if (isPunct(tokens[i - 1], '.') || isPunct(tokens[i + 1], '.')) return;
    if (isPunct(tokens[i + 1], '(')) return;
    if (isPunct(tokens[i - 1], '::')) return;

    const name = token.value.toLowerCase();
    if (known.has(name) || defined.has(name)) return;
    unknown.add(token.value);
  });

  return [...unknown].map((name) => `Column '${name}' does not exist in the allowed tables`);
}

/**
 * Words inside string literals of WHERE/HAVING predicates and LIKE operands
 * Identifiers are left to the column checks.
 */
export function predicateWords(tokens: SqlToken[]): Set<string> {
  const words = new Set<string>();

  const collect = (token: SqlToken) => {
    if (token.type === 'string') {
      for (const w of wordTokens(token.value)) words.add(w);
    }
  };

  for (let i = 0; i < tokens.length; i++) {
    if (isWord(tokens[i], 'LIKE', 'ILIKE', 'GLOB') && tokens[i + 1]) {
      collect(tokens[i + 1]);
    }

    if (!isWord(tokens[i], 'WHERE', 'HAVING')) continue;
    const depth = tokens[i].depth;

    for (let j = i + 1; j < tokens.length; j++) {
      const token = tokens[j];
      if (token.depth < depth || (token.depth === depth && isPunct(token, ')'))) break;
      if (token.depth === depth && isWord(token, 'GROUP', 'ORDER', 'LIMIT', 'UNION', 'EXCEPT', 'INTERSECT', 'OFFSET', 'FETCH', 'WINDOW')) break;
      if (token.depth === depth && isWord(token, 'HAVING') && isWord(tokens[i], 'WHERE')) break;
      collect(token);
    }
  }

  return words;
}

/**
 * Validate a formatted statement; empty result means it may run
 */
export function validateSql(sql: string, context: SqlValidationContext): string[] {
  const errors = [...context.strategy.validateSyntax(sql)];
  if (sql.trim().length === 0) return errors;

  const maxJoins = context.maxJoins ?? MAX_JOINS;
  const maxWhere = context.maxWherePredicates ?? MAX_WHERE_PREDICATES;
  const maxSelects = context.maxSelectLevels ?? MAX_SELECT_LEVELS;

  if (containsPlaceholder(sql)) {
    errors.push('SQL contains placeholder text');
  }

  const structure = analyzeSqlStructure(sql);

  if (structure.crossJoin) {
    errors.push('CROSS JOIN is not allowed');
  }
  if (structure.joinCount > maxJoins) {
    errors.push(`Too many joins: ${structure.joinCount} (max ${maxJoins})`);
  }
  if (structure.selectCount > maxSelects) {
    errors.push(`Too many SELECT levels: ${structure.selectCount} (max ${maxSelects})`);
  }
  if (structure.maxWherePredicates > maxWhere) {
    errors.push(`Too many WHERE predicates: ${structure.maxWherePredicates} (max ${maxWhere})`);
  }

  // Whitelist
  const ctes = new Set(structure.cteNames.map((n) => n.toLowerCase()));
  const aliases = new Map<string, TableInfo>();

  if (structure.tables.length === 0) {
    errors.push('No table referenced in FROM clause');
  }

  for (const reference of structure.tables) {
    if (ctes.has(reference.name.toLowerCase())) continue;
    const table = resolveWhitelisted(context.whitelist, reference.name);
    if (!table) {
      errors.push(`Table '${reference.name}' is not in the allowed table list`);
      continue;
    }
    aliases.set(lastSegment(reference.name), table);
    aliases.set(reference.name.toLowerCase(), table);
    if (reference.alias) aliases.set(reference.alias.toLowerCase(), table);
  }

  const tokens = tokenizeSql(sql);
  errors.push(...checkQualifiedColumns(tokens, aliases));
  errors.push(...checkBareColumns(tokens, context.whitelist, definedNames(tokens, structure)));

  if (context.maxRows !== undefined) {
    const limit = context.strategy.extractRowLimit(sql);
    if (limit === null) {
      errors.push('SQL has no row limit');
    } else if (limit > context.maxRows) {
      errors.push(`Row limit ${limit} exceeds the budget of ${context.maxRows}`);
    }
  }

  // Forbidden keywords in filters
  const forbidden = context.forbiddenKeywords ?? [];
  if (forbidden.length > 0) {
    const words = predicateWords(tokens);
    const singularWords = new Set([...words].map(singularize));
    for (const keyword of forbidden) {
      const lower = keyword.toLowerCase();
      if (words.has(lower) || singularWords.has(singularize(lower))) {
        errors.push(`Forbidden keyword '${keyword}' used in a filter predicate`);
      }
    }
  }

  return errors;
}

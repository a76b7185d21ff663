/**
 * Jest Unit Tests for the SQL dialect strategies
 */

import {
  MySqlDialectStrategy,
  PostgresDialectStrategy,
  SqlServerDialectStrategy,
  SqliteDialectStrategy,
  getDialectStrategy,
  isSupportedDialect,
} from '../dialects/index.js';
import { fixDuplicateBy, fixLeadingComma, fixMissingBy, fixTrailingComma } from '../dialects/base-dialect.js';

describe('dialect strategies', () => {
  describe('factory', () => {
    test.each(['sqlite', 'postgresql', 'mysql', 'sqlserver'])('%s is supported', (dialect) => {
      expect(isSupportedDialect(dialect)).toBe(true);
      expect(getDialectStrategy(dialect).dialect).toBe(dialect);
    });

    test('unknown dialect throws', () => {
      expect(() => getDialectStrategy('oracle')).toThrow('No SQL dialect strategy for database type: oracle');
    });
  });

  // ==========================================================================
  // SHARED FIXES
  // ==========================================================================

  describe('formatting fixes', () => {
    test('missing BY after GROUP and ORDER', () => {
      expect(fixMissingBy('SELECT city FROM customers GROUP city')).toBe('SELECT city FROM customers GROUP BY city');
      expect(fixMissingBy('SELECT name FROM customers ORDER name LIMIT 5')).toBe(
        'SELECT name FROM customers ORDER BY name LIMIT 5'
      );
    });

    test('bracketed names are left alone', () => {
      expect(fixMissingBy('SELECT [Order Date] FROM orders')).toBe('SELECT [Order Date] FROM orders');
    });

    test('duplicate BY', () => {
      expect(fixDuplicateBy('SELECT a FROM t ORDER BY BY a')).toBe('SELECT a FROM t ORDER BY a');
    });

    test('leading comma after BY', () => {
      expect(fixLeadingComma('SELECT a FROM t GROUP BY , a')).toBe('SELECT a FROM t GROUP BY a');
    });

    test('trailing comma before FROM', () => {
      expect(fixTrailingComma('SELECT a, b, FROM t')).toBe('SELECT a, b  FROM t');
    });
  });

  // ==========================================================================
  // LIMIT-STYLE DIALECTS
  // ==========================================================================

  describe('SQLite', () => {
    const strategy = new SqliteDialectStrategy();

    test('formatSql strips the semicolon and squeezes spaces', () => {
      expect(strategy.formatSql('SELECT a, b, FROM t;')).toBe('SELECT a, b FROM t');
    });

    test('adds a LIMIT when there is none', () => {
      expect(strategy.applyRowLimit('SELECT name FROM customers', 5)).toBe('SELECT name FROM customers LIMIT 5');
    });

    test('lowers a LIMIT above the budget, keeps one below', () => {
      expect(strategy.applyRowLimit('SELECT name FROM customers LIMIT 500', 100)).toBe(
        'SELECT name FROM customers LIMIT 100'
      );
      expect(strategy.applyRowLimit('SELECT name FROM customers LIMIT 3', 100)).toBe(
        'SELECT name FROM customers LIMIT 3'
      );
      expect(strategy.applyRowLimit('SELECT a FROM t LIMIT 500 OFFSET 10', 100)).toBe(
        'SELECT a FROM t LIMIT 100 OFFSET 10'
      );
    });

    test('extractRowLimit', () => {
      expect(strategy.extractRowLimit('SELECT a FROM t LIMIT 7')).toBe(7);
      expect(strategy.extractRowLimit('SELECT a FROM t')).toBeNull();
    });

    test('only single read-only statements pass', () => {
      expect(strategy.validateSyntax('DELETE FROM customers')).toEqual([
        'Only SELECT statements are allowed',
        'SQL contains forbidden keyword: DELETE',
      ]);
      expect(strategy.validateSyntax('SELECT 1; SELECT 2')).toEqual(['Only a single statement is allowed']);
      expect(strategy.validateSyntax('   ')).toEqual(['SQL query is empty']);
    });

    test('keywords inside names and literals are not flagged', () => {
      expect(strategy.validateSyntax('SELECT CreatedDate FROM t')).toEqual([]);
      expect(strategy.validateSyntax("SELECT name FROM t WHERE note = 'drop table'")).toEqual([]);
    });
  });

  describe('PostgreSQL', () => {
    const strategy = new PostgresDialectStrategy();

    test('rejects TOP', () => {
      expect(strategy.validateSyntax('SELECT TOP 5 name FROM customers')).toEqual([
        'PostgreSQL does not support TOP; use LIMIT n',
      ]);
    });

    test('quotes mixed-case schema-qualified tables', () => {
      expect(strategy.formatSql('SELECT * FROM Sales.Customer')).toBe('SELECT * FROM "Sales"."Customer"');
      expect(strategy.formatSql('SELECT * FROM sales.customer')).toBe('SELECT * FROM sales.customer');
    });
  });

  describe('MySQL', () => {
    const strategy = new MySqlDialectStrategy();

    test('brackets become backticks', () => {
      expect(strategy.formatSql('SELECT [Order Date] FROM orders')).toBe('SELECT `Order Date` FROM orders');
    });

    test('escapes only identifiers that need it', () => {
      expect(strategy.escapeIdentifier('Order Date')).toBe('`Order Date`');
      expect(strategy.escapeIdentifier('name')).toBe('name');
    });
  });

  // ==========================================================================
  // SQL SERVER
  // ==========================================================================

  describe('SQL Server', () => {
    const strategy = new SqlServerDialectStrategy();

    test('trailing LIMIT is rewritten into TOP', () => {
      expect(strategy.formatSql('SELECT name FROM customers ORDER BY name LIMIT 5')).toBe(
        'SELECT TOP 5 name FROM customers ORDER BY name'
      );
    });

    test('trailing FETCH FIRST is rewritten into TOP', () => {
      expect(strategy.formatSql('SELECT name FROM customers ORDER BY name OFFSET 0 ROWS FETCH NEXT 10 ROWS ONLY')).toBe(
        'SELECT TOP 10 name FROM customers ORDER BY name'
      );
    });

    test('LIMIT fails validation', () => {
      expect(strategy.validateSyntax('SELECT name FROM customers LIMIT 5')).toEqual([
        'SQL Server does not support LIMIT; use SELECT TOP n',
      ]);
    });

    test('row limits use TOP', () => {
      expect(strategy.getLimitClause(5)).toBe('TOP 5');
      expect(strategy.applyRowLimit('SELECT name FROM t', 50)).toBe('SELECT TOP 50 name FROM t');
      expect(strategy.applyRowLimit('SELECT TOP 500 name FROM t', 100)).toBe('SELECT TOP 100 name FROM t');
      expect(strategy.applyRowLimit('SELECT TOP 5 name FROM t', 100)).toBe('SELECT TOP 5 name FROM t');
      expect(strategy.extractRowLimit('SELECT DISTINCT TOP 5 city FROM t')).toBe(5);
    });

    test('escapeIdentifier uses brackets', () => {
      expect(strategy.escapeIdentifier('a]b')).toBe('[a]]b]');
    });
  });
});

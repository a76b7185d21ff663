/**
 * Jest Unit Tests for SqlSynthesizer
 */

import { SqlSynthesizer, extractSql } from '../sql-synthesizer.js';
import { InMemorySchemaCatalog } from '../../common/services/schema-catalog.js';
import { PipelineCancelledError } from '../../common/errors.js';
import {
  ScriptedTextGenerator,
  createIntent,
  createSubIntent,
  failingGenerator,
  hrSchema,
  salesSchema,
} from '../../__tests__/fixtures.js';

const TOP_CUSTOMERS_SQL = [
  '```sql',
  'SELECT c.name, COUNT(o.id) AS order_count',
  'FROM customers c',
  'JOIN orders o ON o.customer_id = c.id',
  'GROUP BY c.name',
  'ORDER BY order_count DESC',
  'LIMIT 5;',
  '```',
].join('\n');

function synthesizerWith(generator: ScriptedTextGenerator): SqlSynthesizer {
  return new SqlSynthesizer(generator, new InMemorySchemaCatalog([salesSchema(), hrSchema()]));
}

describe('SqlSynthesizer', () => {
  test('valid statement is formatted, limited and marked valid', async () => {
    const generator = new ScriptedTextGenerator(() => TOP_CUSTOMERS_SQL);
    const intent = createIntent();

    const result = await synthesizerWith(generator).synthesize(intent, { maxRows: 100 });

    expect(result.databaseQueries[0].validation).toEqual({ state: 'valid', errors: [] });
    expect(result.databaseQueries[0].generatedSql).toBe(
      'SELECT c.name, COUNT(o.id) AS order_count\nFROM customers c\nJOIN orders o ON o.customer_id = c.id\nGROUP BY c.name\nORDER BY order_count DESC\nLIMIT 5'
    );
    expect(generator.calls[0].options).toMatchObject({ maxTokens: 800, temperature: 0 });
    expect(generator.calls[0].options.system).toContain('SQLite');
    // The input intent is left untouched
    expect(intent.databaseQueries[0].validation.state).toBe('pending');
  });

  test('a statement without a limit gets the row budget', async () => {
    const generator = new ScriptedTextGenerator(() => 'SELECT name FROM customers');
    const intent = createIntent({ originalQuery: 'list customers' });

    const result = await synthesizerWith(generator).synthesize(intent, { maxRows: 20 });

    expect(result.databaseQueries[0].generatedSql).toBe('SELECT name FROM customers LIMIT 20');
    expect(result.databaseQueries[0].validation.state).toBe('valid');
  });

  test('a limit above the budget is lowered', async () => {
    const generator = new ScriptedTextGenerator(() => 'SELECT name FROM customers LIMIT 1000');
    const intent = createIntent({ originalQuery: 'list customers' });

    const result = await synthesizerWith(generator).synthesize(intent, { maxRows: 50 });

    expect(result.databaseQueries[0].generatedSql).toBe('SELECT name FROM customers LIMIT 50');
  });

  test('rejected SQL keeps the statement and its errors', async () => {
    const generator = new ScriptedTextGenerator(() => 'SELECT * FROM invoices');
    const intent = createIntent({ originalQuery: 'list customers' });

    const [sub] = (await synthesizerWith(generator).synthesize(intent)).databaseQueries;

    expect(sub.generatedSql).toBe('SELECT * FROM invoices LIMIT 100');
    expect(sub.validation).toEqual({
      state: 'invalid',
      errors: ["Table 'invoices' is not in the allowed table list"],
    });
  });

  test('a column no allowed table has is rejected', async () => {
    const generator = new ScriptedTextGenerator(() => 'SELECT email FROM customers');
    const intent = createIntent({ originalQuery: 'list customers' });

    const [sub] = (await synthesizerWith(generator).synthesize(intent)).databaseQueries;

    expect(sub.generatedSql).toBe('SELECT email FROM customers LIMIT 100');
    expect(sub.validation).toEqual({
      state: 'invalid',
      errors: ["Column 'email' does not exist in the allowed tables"],
    });
  });

  test('a reply without SQL is invalid', async () => {
    const generator = new ScriptedTextGenerator(() => 'Sorry, I cannot help.');
    const [sub] = (await synthesizerWith(generator).synthesize(createIntent())).databaseQueries;

    expect(sub.validation).toEqual({
      state: 'invalid',
      errors: ['No SQL statement found in the generated response'],
    });
  });

  test('a provider failure is recorded, not thrown', async () => {
    const [sub] = (await synthesizerWith(failingGenerator()).synthesize(createIntent())).databaseQueries;

    expect(sub.validation).toEqual({
      state: 'invalid',
      errors: ['SQL generation failed: provider unavailable'],
    });
  });

  test('unknown database and empty whitelist never reach the AI', async () => {
    const generator = new ScriptedTextGenerator(() => 'SELECT 1');
    const intent = createIntent({
      databaseQueries: [
        createSubIntent({ databaseId: 'crm', databaseName: 'CRM' }),
        createSubIntent({ requiredTables: ['invoices'] }),
      ],
    });

    const result = await synthesizerWith(generator).synthesize(intent);

    expect(result.databaseQueries.map((q) => q.validation.errors)).toEqual([
      ["No schema for database 'crm'"],
      ['No required tables to query'],
    ]);
    expect(generator.callCount).toBe(0);
  });

  test('several databases are synthesized together with cross-database hints', async () => {
    const generator = new ScriptedTextGenerator((prompt) =>
      prompt.includes('## Database: HR') ? 'SELECT full_name, customer_id FROM employees' : 'SELECT id, name FROM customers'
    );
    const intent = createIntent({
      originalQuery: 'customers and the employees assigned to them',
      databaseQueries: [
        createSubIntent({ requiredTables: ['customers'] }),
        createSubIntent({ databaseId: 'hr', databaseName: 'HR', requiredTables: ['employees'], priority: 2 }),
      ],
    });

    const result = await synthesizerWith(generator).synthesize(intent, { maxRows: 10 });

    expect(generator.callCount).toBe(2);
    expect(generator.calls.every((c) => c.prompt.includes('## Cross-database answer'))).toBe(true);
    expect(result.databaseQueries.map((q) => q.generatedSql)).toEqual([
      'SELECT id, name FROM customers LIMIT 10',
      'SELECT full_name, customer_id FROM employees LIMIT 10',
    ]);
    expect(result.databaseQueries.every((q) => q.validation.state === 'valid')).toBe(true);
  });

  test('an aborted request is not synthesized', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = new ScriptedTextGenerator(() => 'SELECT 1');

    await expect(
      synthesizerWith(generator).synthesize(createIntent(), { signal: controller.signal })
    ).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(generator.callCount).toBe(0);
  });
});

describe('extractSql', () => {
  test('prefers a sql fence', () => {
    expect(extractSql('Here you go:\n```sql\nSELECT 1\n```\n```\nSELECT 2\n```')).toBe('SELECT 1');
  });

  test('falls back to any fence', () => {
    expect(extractSql('```\nSELECT name FROM t\n```')).toBe('SELECT name FROM t');
  });

  test('raw text stops at the first blank line', () => {
    expect(extractSql('Query:\nSELECT a\nFROM t\n\nThis returns every a.')).toBe('SELECT a\nFROM t');
  });

  test('null when there is no statement', () => {
    expect(extractSql('I cannot answer that.')).toBeNull();
  });
});

/**
 * Jest Unit Tests for QueryIntentAnalyzer
 */

import {
  QueryIntentAnalyzer,
  buildAnalysisPrompt,
  clampConfidence,
  expandForeignKeys,
  scoreVocabulary,
  vocabularyFallback,
} from '../query-intent-analyzer.js';
import { InMemorySchemaCatalog } from '../../common/services/schema-catalog.js';
import { PipelineCancelledError } from '../../common/errors.js';
import { ScriptedTextGenerator, failingGenerator, hrSchema, salesSchema } from '../../__tests__/fixtures.js';

function analysisReply(databases: object[], extra: object = {}): string {
  return JSON.stringify({
    understanding: 'Orders per customer',
    confidence: 0.92,
    requiresCrossDatabaseJoin: false,
    reasoning: 'orders hold the counts',
    databases,
    ...extra,
  });
}

function analyzerWith(reply: string): { analyzer: QueryIntentAnalyzer; generator: ScriptedTextGenerator } {
  const generator = new ScriptedTextGenerator(() => reply);
  const catalog = new InMemorySchemaCatalog([salesSchema(), hrSchema()]);
  return { analyzer: new QueryIntentAnalyzer(generator, catalog), generator };
}

describe('QueryIntentAnalyzer', () => {
  // ==========================================================================
  // AI ANALYSIS
  // ==========================================================================

  describe('AI analysis', () => {
    test('selected tables are expanded along foreign keys', async () => {
      const { analyzer, generator } = analyzerWith(
        analysisReply([
          { databaseId: 'sales', databaseName: 'Sales', requiredTables: ['orders'], purpose: 'counts', priority: 1 },
        ])
      );

      const intent = await analyzer.analyze('Show top 5 customers by order count', []);

      expect(intent.source).toBe('ai');
      expect(intent.confidence).toBe(0.92);
      expect(intent.requiresCrossDatabaseJoin).toBe(false);
      expect(intent.databaseQueries).toHaveLength(1);
      expect(intent.databaseQueries[0]).toMatchObject({
        databaseId: 'sales',
        databaseName: 'Sales',
        requiredTables: ['orders', 'customers'],
        purpose: 'counts',
        priority: 1,
        validation: { state: 'pending', errors: [] },
      });
      expect(generator.calls[0].options).toMatchObject({ maxTokens: 1200, temperature: 0 });
    });

    test('table names are matched case-insensitively', async () => {
      const { analyzer } = analyzerWith(
        analysisReply([{ databaseId: 'sales', requiredTables: ['CUSTOMERS'], priority: 1 }])
      );

      const intent = await analyzer.analyze('list customers', []);

      expect(intent.databaseQueries[0].requiredTables).toEqual(['customers']);
      expect(intent.dropped).toEqual([]);
    });

    test('unknown tables and databases are reported as dropped', async () => {
      const { analyzer } = analyzerWith(
        analysisReply([
          { databaseId: 'sales', databaseName: 'Sales', requiredTables: ['customers', 'invoices'], priority: 1 },
          { databaseId: 'crm', databaseName: 'CRM', requiredTables: ['leads'], priority: 2 },
        ])
      );

      const intent = await analyzer.analyze('customers and their invoices', []);

      expect(intent.databaseQueries.map((q) => [q.databaseId, q.requiredTables])).toEqual([['sales', ['customers']]]);
      expect(intent.dropped).toEqual([
        { databaseId: 'sales', databaseName: 'Sales', error: "Table 'invoices' does not exist in Sales" },
        { databaseId: 'crm', databaseName: 'CRM', error: "Database 'CRM' is not connected" },
      ]);
    });

    test('a table listed under the wrong database moves to its owner', async () => {
      const { analyzer } = analyzerWith(
        analysisReply([{ databaseId: 'sales', requiredTables: ['orders', 'employees'], priority: 1 }])
      );

      const intent = await analyzer.analyze('orders handled by employees', []);

      expect(intent.databaseQueries.map((q) => [q.databaseId, q.requiredTables, q.priority])).toEqual([
        ['sales', ['orders', 'customers'], 1],
        ['hr', ['employees', 'departments'], 2],
      ]);
    });

    test('databases are resolved by name when the id is wrong', async () => {
      const { analyzer } = analyzerWith(
        analysisReply([{ databaseId: 'X', databaseName: 'hr', requiredTables: ['departments'], priority: 1 }])
      );

      const intent = await analyzer.analyze('list departments', []);

      expect(intent.databaseQueries[0].databaseId).toBe('hr');
    });

    test('confidence is clamped to [0, 1]', async () => {
      const { analyzer } = analyzerWith(
        analysisReply([{ databaseId: 'sales', requiredTables: ['customers'], priority: 1 }], { confidence: 1.7 })
      );

      const intent = await analyzer.analyze('list customers', []);

      expect(intent.confidence).toBe(1);
    });

    test('the prompt lists every database with its tables', async () => {
      const { analyzer, generator } = analyzerWith(
        analysisReply([{ databaseId: 'sales', requiredTables: ['customers'], priority: 1 }])
      );

      await analyzer.analyze('list customers', []);

      const prompt = generator.calls[0].prompt;
      expect(prompt).toContain('DATABASE: Sales (ID: sales)');
      expect(prompt).toContain('  Dialect: sqlite, Total rows: 8');
      expect(prompt).toContain('    - orders: id(INTEGER), customer_id(INTEGER), total(REAL), order_date(TEXT) [FK: customers]');
      expect(prompt).toContain('DATABASE: HR (ID: hr)');
    });
  });

  // ==========================================================================
  // FALLBACK
  // ==========================================================================

  describe('vocabulary fallback', () => {
    test('used when the provider fails', async () => {
      const catalog = new InMemorySchemaCatalog([salesSchema(), hrSchema()]);
      const analyzer = new QueryIntentAnalyzer(failingGenerator(), catalog);

      const intent = await analyzer.analyze('Show customers in Lisbon', []);

      expect(intent.source).toBe('vocabulary_fallback');
      expect(intent.confidence).toBe(0.3);
      expect(intent.databaseQueries.map((q) => [q.databaseId, q.requiredTables, q.priority])).toEqual([
        ['sales', ['customers', 'orders'], 1],
        ['hr', ['employees', 'departments'], 2],
      ]);
      expect(intent.requiresCrossDatabaseJoin).toBe(true);
    });

    test('used when every selected table is unknown', async () => {
      const { analyzer } = analyzerWith(
        analysisReply([{ databaseId: 'sales', requiredTables: ['invoices'], priority: 1 }])
      );

      const intent = await analyzer.analyze('list departments', []);

      expect(intent.source).toBe('vocabulary_fallback');
      expect(intent.databaseQueries.map((q) => q.databaseId)).toEqual(['hr']);
      expect(intent.dropped).toEqual([
        { databaseId: 'sales', databaseName: 'Sales', error: "Table 'invoices' does not exist in Sales" },
      ]);
    });

    test('used when the reply is not JSON', async () => {
      const { analyzer } = analyzerWith('I think you want the sales database.');

      const intent = await analyzer.analyze('list departments', []);

      expect(intent.source).toBe('vocabulary_fallback');
    });

    test('no matching vocabulary gives zero confidence', () => {
      const intent = vocabularyFallback('weather tomorrow', [], [salesSchema()]);

      expect(intent.confidence).toBe(0);
      expect(intent.databaseQueries).toEqual([]);
    });
  });

  // ==========================================================================
  // EDGES
  // ==========================================================================

  test('no schemas: no AI call, no sub-intents', async () => {
    const generator = new ScriptedTextGenerator(() => '{}');
    const analyzer = new QueryIntentAnalyzer(generator, new InMemorySchemaCatalog());

    const intent = await analyzer.analyze('list customers', []);

    expect(intent).toMatchObject({ confidence: 0, databaseQueries: [], source: 'none' });
    expect(generator.callCount).toBe(0);
  });

  test('cancellation during the AI call escapes', async () => {
    const controller = new AbortController();
    const generator = new ScriptedTextGenerator(() => {
      controller.abort();
      throw new Error('aborted');
    });
    const analyzer = new QueryIntentAnalyzer(generator, new InMemorySchemaCatalog([salesSchema()]));

    await expect(analyzer.analyze('list customers', [], { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
  });
});

describe('analyzer helpers', () => {
  test('expandForeignKeys follows references transitively', () => {
    expect(expandForeignKeys(['orders'], salesSchema())).toEqual(['orders', 'customers']);
    expect(expandForeignKeys(['customers'], salesSchema())).toEqual(['customers']);
  });

  test('scoreVocabulary weights table names over columns', () => {
    const [sales] = scoreVocabulary(['customers', 'lisbon'], [salesSchema()]);

    expect(sales.score).toBe(3);
    expect(sales.tables.map((t) => [t.table.name, t.score])).toEqual([
      ['customers', 2],
      ['orders', 1],
    ]);
  });

  test.each([
    [Number.NaN, 0],
    [-0.2, 0],
    [0.45, 0.45],
    [3, 1],
  ])('clampConfidence(%s) = %s', (value, expected) => {
    expect(clampConfidence(value)).toBe(expected);
  });

  test('buildAnalysisPrompt quotes the query', () => {
    expect(buildAnalysisPrompt('how many orders', [salesSchema()])).toContain('User query: "how many orders"');
  });
});

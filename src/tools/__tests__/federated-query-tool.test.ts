/**
 * Jest Integration Tests for the MCP tools
 *
 * Client and server talk over the SDK's in-memory transport.
 */

import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { formatResponse, formatSchemas, registerFederatedQueryTools } from '../federated-query-tool.js';
import { createFederation, type Federation } from '../../bootstrap.js';
import type { FederatedResponse } from '../../common/types.js';
import { StaticQueryRunner, salesSchema, stagedGenerator } from '../../__tests__/fixtures.js';

const TextResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
});

function textOf(result: unknown): string {
  return TextResultSchema.parse(result).content[0].text;
}

describe('formatting', () => {
  test('a response lists its sources and a footer', () => {
    const response: FederatedResponse = {
      kind: 'information',
      answer: 'Ada has the most orders.',
      sources: [
        { type: 'database', identifier: 'Sales', excerpt: 'Database: Sales | Rows: 2', rowCountOrRelevance: 2 },
        { type: 'database', identifier: 'HR', excerpt: 'Database: HR | Error', rowCountOrRelevance: 0, error: 'down' },
      ],
      confidenceBucket: 'high',
      executionTimeMs: 12,
      path: 'database',
      requestId: 'req-1',
    };

    expect(formatResponse(response)).toBe(
      [
        'Ada has the most orders.',
        '',
        '## Sources',
        '1. **Sales** (database, rows: 2)\n   Database: Sales | Rows: 2',
        '2. **HR** (database, rows: 0) ❌\n   Database: HR | Error',
        '',
        '---',
        '*information | path: database | confidence: high | 12ms | req-1*',
      ].join('\n')
    );
  });

  test('warnings follow the sources', () => {
    const response: FederatedResponse = {
      kind: 'conversation',
      answer: 'Hello!',
      sources: [],
      confidenceBucket: 'high',
      executionTimeMs: 3,
      path: 'none',
      requestId: 'req-2',
      warnings: ['AI classification failed: provider unavailable'],
    };

    expect(formatResponse(response)).toBe(
      [
        'Hello!',
        '',
        '## Warnings',
        '- AI classification failed: provider unavailable',
        '',
        '---',
        '*conversation | path: none | confidence: high | 3ms | req-2*',
      ].join('\n')
    );
  });

  test('no schemas gives a short notice', () => {
    expect(formatSchemas([])).toBe('No databases are connected.');
  });
});

describe('registerFederatedQueryTools', () => {
  let federation: Federation;
  let client: Client;
  let server: McpServer;

  beforeEach(async () => {
    federation = await createFederation({
      configPath: join(tmpdir(), 'fedquery-absent', 'federation.config.json'),
      generator: stagedGenerator({
        classify: '{"type":"INFORMATION","tokens":["customers","orders"]}',
        analyze: JSON.stringify({
          confidence: 0.9,
          databases: [{ databaseId: 'sales', requiredTables: ['orders'], priority: 1 }],
        }),
        sql: 'SELECT c.name, COUNT(o.id) AS order_count FROM customers c JOIN orders o ON o.customer_id = c.id GROUP BY c.name LIMIT 5',
        answer: 'Ada has the most orders.',
      }),
      loaders: [{ databaseId: 'sales', load: async () => salesSchema() }],
      connections: [
        {
          databaseId: 'sales',
          runner: new StaticQueryRunner(['name', 'order_count'], [{ name: 'Ada', order_count: 3 }, { name: 'Grace', order_count: 2 }]),
          maxRows: 100,
          timeoutMs: 1000,
        },
      ],
    });

    server = new McpServer({ name: 'test-server', version: '0.0.0' });
    registerFederatedQueryTools(server, federation);
    client = new Client({ name: 'test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await federation.close();
  });

  test('three tools are registered', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual(['federated_query', 'classify_query', 'list_schemas']);
  });

  test('federated_query answers with sources', async () => {
    const text = textOf(
      await client.callTool({ name: 'federated_query', arguments: { query: 'Show top 5 customers by order count' } })
    );

    expect(text.startsWith('Ada has the most orders.\n\n## Sources\n1. **Sales** (database, rows: 2)')).toBe(true);
    expect(text).toContain('*information | path: database | confidence: high | ');
  });

  test('federated_query answers greetings directly', async () => {
    const text = textOf(await client.callTool({ name: 'federated_query', arguments: { query: 'hi' } }));

    expect(text.split('\n')[0]).toBe(
      'Hello! Ask me a question and I will look for the answer in the connected databases and documents.'
    );
  });

  test('classify_query shows the heuristic and the verdict', async () => {
    const text = textOf(await client.callTool({ name: 'classify_query', arguments: { query: 'hi' } }));

    expect(text).toBe(
      [
        '**Verdict:** conversation (source: heuristic)',
        'Heuristic: conversation (score 0, 1 tokens, signals: none)',
        'answer: (none)',
      ].join('\n')
    );
  });

  test('list_schemas renders tables and foreign keys', async () => {
    const text = textOf(await client.callTool({ name: 'list_schemas', arguments: { database_id: 'sales' } }));

    expect(text.split('\n')).toEqual([
      '# Sales (`sales`, sqlite)',
      '*Refreshed 2026-01-01T00:00:00.000Z*',
      '',
      '- **customers** ~3 rows: id, name, city',
      '- **orders** ~5 rows: id, customer_id, total, order_date',
      '  - customer_id → customers.id',
    ]);
  });

  test('list_schemas with an unknown database lists nothing', async () => {
    const text = textOf(await client.callTool({ name: 'list_schemas', arguments: { database_id: 'nope' } }));

    expect(text).toBe('No databases are connected.');
  });
});

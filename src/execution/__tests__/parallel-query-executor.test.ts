/**
 * Jest Unit Tests for ParallelQueryExecutor
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { ParallelQueryExecutor, classifyExecutionError } from '../parallel-query-executor.js';
import type { DatabaseConnection, ReadOnlyQueryRunner } from '../../common/types.js';
import { PipelineCancelledError, QueryExecutionError, QueryTimeoutError } from '../../common/errors.js';
import { SqliteReadOnlyRunner } from '../../common/services/sqlite-connector.js';
import {
  FailingQueryRunner,
  HangingQueryRunner,
  StaticQueryRunner,
  createIntent,
  createSubIntent,
} from '../../__tests__/fixtures.js';

function connection(
  databaseId: string,
  runner: ReadOnlyQueryRunner,
  limits: Partial<Pick<DatabaseConnection, 'maxRows' | 'timeoutMs'>> = {}
): DatabaseConnection {
  return { databaseId, runner, maxRows: limits.maxRows ?? 100, timeoutMs: limits.timeoutMs ?? 1000 };
}

const VALID = { state: 'valid' as const, errors: [] };

describe('ParallelQueryExecutor', () => {
  test('runs each valid sub-intent against its own connection', async () => {
    const sales = new StaticQueryRunner(['id', 'name'], [{ id: 1, name: 'Ada' }]);
    const hr = new StaticQueryRunner(['full_name'], [{ full_name: 'Linus' }, { full_name: 'Margaret' }]);
    const executor = new ParallelQueryExecutor([connection('sales', sales), connection('hr', hr)]);

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({ generatedSql: 'SELECT id, name FROM customers LIMIT 5', validation: VALID }),
          createSubIntent({
            databaseId: 'hr',
            databaseName: 'HR',
            generatedSql: 'SELECT full_name FROM employees LIMIT 5',
            validation: VALID,
          }),
        ],
      })
    );

    expect([...results.keys()]).toEqual(['sales', 'hr']);
    expect(results.get('sales')).toMatchObject({
      databaseName: 'Sales',
      executedSql: 'SELECT id, name FROM customers LIMIT 5',
      success: true,
      rowCount: 1,
      columns: ['id', 'name'],
      rows: [{ id: 1, name: 'Ada' }],
      truncated: false,
    });
    expect(results.get('hr')?.rowCount).toBe(2);
    expect(sales.executed).toEqual(['SELECT id, name FROM customers LIMIT 5']);
  });

  test('one failing database does not affect the other', async () => {
    const executor = new ParallelQueryExecutor([
      connection('sales', new StaticQueryRunner(['id'], [{ id: 1 }])),
      connection('hr', new FailingQueryRunner(new QueryExecutionError('hr', 'no such table: staff'))),
    ]);

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({ generatedSql: 'SELECT id FROM customers', validation: VALID }),
          createSubIntent({ databaseId: 'hr', databaseName: 'HR', generatedSql: 'SELECT id FROM staff', validation: VALID }),
        ],
      })
    );

    expect(results.get('sales')?.success).toBe(true);
    expect(results.get('hr')).toMatchObject({
      success: false,
      errorKind: 'execution',
      errorMessage: 'no such table: staff',
      rowCount: 0,
      rows: [],
    });
  });

  test('invalid sub-intents are never executed', async () => {
    const runner = new StaticQueryRunner(['id'], [{ id: 1 }]);
    const executor = new ParallelQueryExecutor([connection('sales', runner)]);

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({
            generatedSql: 'SELECT * FROM invoices',
            validation: { state: 'invalid', errors: ["Table 'invoices' is not in the allowed table list"] },
          }),
        ],
      })
    );

    expect(results.get('sales')).toMatchObject({
      success: false,
      errorKind: 'validation',
      errorMessage: "SQL validation failed: Table 'invoices' is not in the allowed table list",
      executedSql: 'SELECT * FROM invoices',
    });
    expect(runner.executed).toEqual([]);
  });

  test('pending sub-intents are treated as unvalidated', async () => {
    const executor = new ParallelQueryExecutor([connection('sales', new StaticQueryRunner([], []))]);

    const results = await executor.execute(createIntent());

    expect(results.get('sales')).toMatchObject({ errorKind: 'validation', errorMessage: 'SQL was not validated' });
  });

  test('missing connection is a connection failure', async () => {
    const executor = new ParallelQueryExecutor();

    const results = await executor.execute(
      createIntent({ databaseQueries: [createSubIntent({ generatedSql: 'SELECT 1 FROM customers', validation: VALID })] })
    );

    expect(results.get('sales')).toMatchObject({
      errorKind: 'connection',
      errorMessage: "No connection configured for database 'sales'",
    });
  });

  test('rows are capped by the smaller of request and connection budgets', async () => {
    const rows = Array.from({ length: 8 }, (_, i) => ({ id: i + 1 }));
    const runner = new StaticQueryRunner(['id'], rows);
    const executor = new ParallelQueryExecutor([connection('sales', runner, { maxRows: 5 })]);
    const intent = createIntent({
      databaseQueries: [createSubIntent({ generatedSql: 'SELECT id FROM orders', validation: VALID })],
    });

    const capped = await executor.execute(intent, { maxRows: 50 });
    expect(capped.get('sales')).toMatchObject({ rowCount: 5, truncated: true });
    expect(runner.seenOptions[0].maxRows).toBe(5);

    const smaller = await executor.execute(intent, { maxRows: 3 });
    expect(smaller.get('sales')?.rows).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
  });

  test('a slow query times out without holding back the others', async () => {
    const executor = new ParallelQueryExecutor([
      connection('sales', new HangingQueryRunner(), { timeoutMs: 20 }),
      connection('hr', new StaticQueryRunner(['id'], [{ id: 7 }])),
    ]);

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({ generatedSql: 'SELECT id FROM orders', validation: VALID }),
          createSubIntent({ databaseId: 'hr', databaseName: 'HR', generatedSql: 'SELECT id FROM employees', validation: VALID }),
        ],
      })
    );

    expect(results.get('sales')).toMatchObject({
      success: false,
      errorKind: 'timeout',
      errorMessage: 'Query on sales timed out after 20ms',
    });
    expect(results.get('hr')?.success).toBe(true);
  });

  test('cancellation marks running queries as cancelled', async () => {
    const controller = new AbortController();
    const executor = new ParallelQueryExecutor([connection('sales', new HangingQueryRunner(), { timeoutMs: 5000 })]);

    const pending = executor.execute(
      createIntent({ databaseQueries: [createSubIntent({ generatedSql: 'SELECT id FROM orders', validation: VALID })] }),
      { signal: controller.signal }
    );
    controller.abort();
    const results = await pending;

    expect(results.get('sales')).toMatchObject({ success: false, errorKind: 'cancelled' });
  });

  test('an already cancelled request runs nothing', async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = new StaticQueryRunner(['id'], [{ id: 1 }]);
    const executor = new ParallelQueryExecutor([connection('sales', runner)]);

    const results = await executor.execute(
      createIntent({ databaseQueries: [createSubIntent({ generatedSql: 'SELECT id FROM orders', validation: VALID })] }),
      { signal: controller.signal }
    );

    expect(results.get('sales')).toMatchObject({ errorKind: 'cancelled', errorMessage: 'Request was cancelled' });
    expect(runner.executed).toEqual([]);
  });

  test('the first result per database wins', async () => {
    const executor = new ParallelQueryExecutor([connection('sales', new StaticQueryRunner(['id'], [{ id: 1 }]))]);

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({ generatedSql: 'SELECT id FROM customers', validation: VALID }),
          createSubIntent({ generatedSql: 'SELECT id FROM orders', validation: VALID }),
        ],
      })
    );

    expect(results.size).toBe(1);
    expect(results.get('sales')?.executedSql).toBe('SELECT id FROM customers');
  });

  test('connections can be added later', () => {
    const executor = new ParallelQueryExecutor();
    executor.addConnection(connection('sales', new StaticQueryRunner([], [])));
    expect(executor.hasConnection('sales')).toBe(true);
    expect(executor.hasConnection('hr')).toBe(false);
  });
});

describe('ParallelQueryExecutor with SQLite runners', () => {
  // About a second of work in a single step
  const SLOW_SQL =
    'WITH RECURSIVE counter(n) AS (SELECT 1 UNION ALL SELECT n + 1 FROM counter WHERE n < 3000000) ' +
    'SELECT COUNT(*) AS total FROM counter';

  let dir: string;
  let runners: SqliteReadOnlyRunner[];

  function sqliteConnection(databaseId: string, timeoutMs: number): DatabaseConnection {
    const filename = join(dir, `${databaseId}.db`);
    const db = new Database(filename);
    db.exec("CREATE TABLE employees (id INTEGER PRIMARY KEY, full_name TEXT); INSERT INTO employees VALUES (1, 'Ada');");
    db.close();

    const runner = new SqliteReadOnlyRunner(databaseId, filename);
    runners.push(runner);
    return connection(databaseId, runner, { timeoutMs });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fedquery-executor-'));
    runners = [];
  });

  afterEach(async () => {
    await Promise.all(runners.map((runner) => runner.close()));
    rmSync(dir, { recursive: true, force: true });
  }, 15_000);

  test('slow statements on two databases time out side by side', async () => {
    const executor = new ParallelQueryExecutor([sqliteConnection('sales', 50), sqliteConnection('hr', 50)]);
    const startTime = Date.now();

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({ generatedSql: SLOW_SQL, validation: VALID }),
          createSubIntent({ databaseId: 'hr', databaseName: 'HR', generatedSql: SLOW_SQL, validation: VALID }),
        ],
      })
    );

    expect(results.get('sales')).toMatchObject({ success: false, errorKind: 'timeout' });
    expect(results.get('hr')).toMatchObject({ success: false, errorKind: 'timeout' });
    expect(Date.now() - startTime).toBeLessThan(1000);
  });

  test('a fast database answers while a slow one is stopped', async () => {
    const executor = new ParallelQueryExecutor([sqliteConnection('sales', 50), sqliteConnection('hr', 2000)]);

    const results = await executor.execute(
      createIntent({
        databaseQueries: [
          createSubIntent({ generatedSql: SLOW_SQL, validation: VALID }),
          createSubIntent({
            databaseId: 'hr',
            databaseName: 'HR',
            generatedSql: 'SELECT full_name FROM employees',
            validation: VALID,
          }),
        ],
      })
    );

    expect(results.get('sales')).toMatchObject({ success: false, errorKind: 'timeout' });
    expect(results.get('hr')).toMatchObject({ success: true, rows: [{ full_name: 'Ada' }] });
  });
});

test('classifyExecutionError', () => {
  expect(classifyExecutionError(new PipelineCancelledError('execution'))).toBe('cancelled');
  expect(classifyExecutionError(new QueryTimeoutError('sales', 10))).toBe('timeout');
  expect(classifyExecutionError(new Error('boom'))).toBe('execution');
});

/**
 * Shared test doubles and sample schemas
 */

import type {
  DatabaseQueryIntent,
  QueryExecutionResult,
  QueryIntent,
  QueryRunOptions,
  QueryRunOutput,
  ReadOnlyQueryRunner,
  ResultRow,
  SchemaSnapshot,
} from '../common/types.js';
import type { GenerateOptions, TextGenerator } from '../common/services/text-generator.js';

// =============================================================================
// TEXT GENERATION
// =============================================================================

export type PromptStage = 'classify' | 'analyze' | 'sql' | 'answer' | 'unknown';

export function promptStage(prompt: string): PromptStage {
  if (prompt.startsWith('Classify the user input')) return 'classify';
  if (prompt.startsWith('# DATABASE QUERY ANALYZER')) return 'analyze';
  if (prompt.startsWith('## Question')) return 'sql';
  if (prompt.startsWith('Answer the question using ONLY')) return 'answer';
  return 'unknown';
}

export interface RecordedCall {
  prompt: string;
  options: GenerateOptions;
  stage: PromptStage;
}

export type GenerateHandler = (prompt: string, options: GenerateOptions) => string | Promise<string>;

/**
 * TextGenerator that answers from a handler and records every call
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: GenerateHandler) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ prompt, options, stage: promptStage(prompt) });
    return this.handler(prompt, options);
  }

  get callCount(): number {
    return this.calls.length;
  }

  callsFor(stage: PromptStage): RecordedCall[] {
    return this.calls.filter((c) => c.stage === stage);
  }
}

/**
 * Generator answering each pipeline stage from a table of replies
 * A stage without a reply throws, like an unreachable provider.
 */
export function stagedGenerator(
  replies: Partial<Record<PromptStage, string | GenerateHandler>>
): ScriptedTextGenerator {
  return new ScriptedTextGenerator((prompt, options) => {
    const reply = replies[promptStage(prompt)];
    if (reply === undefined) {
      throw new Error(`No scripted reply for ${promptStage(prompt)} prompt`);
    }
    return typeof reply === 'string' ? reply : reply(prompt, options);
  });
}

export function failingGenerator(message = 'provider unavailable'): ScriptedTextGenerator {
  return new ScriptedTextGenerator(() => {
    throw new Error(message);
  });
}

// =============================================================================
// QUERY RUNNERS
// =============================================================================

/**
 * Runner returning fixed rows, recording the SQL it was given
 */
export class StaticQueryRunner implements ReadOnlyQueryRunner {
  readonly executed: string[] = [];
  readonly seenOptions: QueryRunOptions[] = [];
  closed = false;

  constructor(
    private readonly columns: string[],
    private readonly rows: ResultRow[]
  ) {}

  async execute(sql: string, options: QueryRunOptions): Promise<QueryRunOutput> {
    this.executed.push(sql);
    this.seenOptions.push(options);
    return { columns: this.columns, rows: this.rows, truncated: false };
  }

  close(): void {
    this.closed = true;
  }
}

export class FailingQueryRunner implements ReadOnlyQueryRunner {
  readonly executed: string[] = [];

  constructor(private readonly error: Error) {}

  async execute(sql: string): Promise<QueryRunOutput> {
    this.executed.push(sql);
    throw this.error;
  }
}

/**
 * Runner that only settles when its signal aborts
 */
export class HangingQueryRunner implements ReadOnlyQueryRunner {
  execute(_sql: string, options: QueryRunOptions): Promise<QueryRunOutput> {
    return new Promise((_, reject) => {
      options.signal?.addEventListener('abort', () => reject(new Error('aborted by caller')), { once: true });
    });
  }
}

// =============================================================================
// SCHEMAS
// =============================================================================

export function salesSchema(): SchemaSnapshot {
  return {
    databaseId: 'sales',
    databaseName: 'Sales',
    dialect: 'sqlite',
    lastRefreshedAt: new Date('2026-01-01T00:00:00Z'),
    tables: [
      {
        name: 'customers',
        columns: [
          { name: 'id', dataType: 'INTEGER', nullable: false, isPrimaryKey: true },
          { name: 'name', dataType: 'TEXT', nullable: false, isPrimaryKey: false },
          { name: 'city', dataType: 'TEXT', nullable: true, isPrimaryKey: false },
        ],
        foreignKeys: [],
        sampleRows: [
          { id: '1', name: 'Ada', city: 'Lisbon' },
          { id: '2', name: 'Grace', city: 'Porto' },
        ],
        rowCount: 3,
      },
      {
        name: 'orders',
        columns: [
          { name: 'id', dataType: 'INTEGER', nullable: false, isPrimaryKey: true },
          { name: 'customer_id', dataType: 'INTEGER', nullable: false, isPrimaryKey: false },
          { name: 'total', dataType: 'REAL', nullable: false, isPrimaryKey: false },
          { name: 'order_date', dataType: 'TEXT', nullable: true, isPrimaryKey: false },
        ],
        foreignKeys: [{ column: 'customer_id', referencedTable: 'customers', referencedColumn: 'id' }],
        sampleRows: [{ id: '10', customer_id: '1', total: '99.5', order_date: '2025-03-01' }],
        rowCount: 5,
      },
    ],
  };
}

export function hrSchema(): SchemaSnapshot {
  return {
    databaseId: 'hr',
    databaseName: 'HR',
    dialect: 'postgresql',
    lastRefreshedAt: new Date('2026-01-01T00:00:00Z'),
    tables: [
      {
        name: 'employees',
        columns: [
          { name: 'id', dataType: 'integer', nullable: false, isPrimaryKey: true },
          { name: 'full_name', dataType: 'text', nullable: false, isPrimaryKey: false },
          { name: 'department_id', dataType: 'integer', nullable: true, isPrimaryKey: false },
          { name: 'customer_id', dataType: 'integer', nullable: true, isPrimaryKey: false },
        ],
        foreignKeys: [{ column: 'department_id', referencedTable: 'departments', referencedColumn: 'id' }],
        sampleRows: [],
        rowCount: 4,
      },
      {
        name: 'departments',
        columns: [
          { name: 'id', dataType: 'integer', nullable: false, isPrimaryKey: true },
          { name: 'title', dataType: 'text', nullable: false, isPrimaryKey: false },
        ],
        foreignKeys: [],
        sampleRows: [],
        rowCount: 2,
      },
    ],
  };
}

// =============================================================================
// BUILDERS
// =============================================================================

export function createSubIntent(overrides: Partial<DatabaseQueryIntent> = {}): DatabaseQueryIntent {
  return {
    databaseId: 'sales',
    databaseName: 'Sales',
    requiredTables: ['customers', 'orders'],
    purpose: 'Customer order counts',
    priority: 1,
    validation: { state: 'pending', errors: [] },
    ...overrides,
  };
}

export function createIntent(overrides: Partial<QueryIntent> = {}): QueryIntent {
  return {
    originalQuery: 'Show top 5 customers by order count',
    confidence: 0.9,
    databaseQueries: [createSubIntent()],
    requiresCrossDatabaseJoin: false,
    understanding: 'Customers ranked by number of orders',
    source: 'ai',
    dropped: [],
    ...overrides,
  };
}

export function createResult(overrides: Partial<QueryExecutionResult> = {}): QueryExecutionResult {
  const rows = overrides.rows ?? [];
  return {
    databaseId: 'sales',
    databaseName: 'Sales',
    executedSql: 'SELECT id, name FROM customers LIMIT 5',
    rowCount: rows.length,
    columns: [],
    rows,
    truncated: false,
    success: true,
    elapsedMs: 3,
    ...overrides,
  };
}

/**
 * Parallel Query Executor
 *
 * Runs every valid sub-intent against its own connection at the same
 * time. Each task is bounded by its connection's timeout and row cap
 * and resolves to a QueryExecutionResult; a task never rejects, so one
 * slow or broken database cannot block or cancel its siblings.
 *
 * Results land in a Map keyed by database id, written once per key
 * after all tasks settle.
 */

import type {
  DatabaseConnection,
  DatabaseQueryIntent,
  ExecutionErrorKind,
  QueryExecutionResult,
  QueryIntent,
} from '../common/types.js';
import {
  PipelineCancelledError,
  QueryTimeoutError,
  errorMessage,
} from '../common/errors.js';
import { logInfo, logWarn } from '../common/services/logger.js';

export interface ExecuteOptions {
  /** Row budget of the request; the connection cap still applies */
  maxRows?: number;
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Map a thrown error to its result kind
 */
export function classifyExecutionError(error: unknown): ExecutionErrorKind {
  if (error instanceof PipelineCancelledError) return 'cancelled';
  if (error instanceof QueryTimeoutError) return 'timeout';
  return 'execution';
}

/**
 * Abort controller that follows a parent signal
 */
function childController(parent: AbortSignal | undefined): { controller: AbortController; release: () => void } {
  const controller = new AbortController();
  if (!parent) return { controller, release: () => {} };

  if (parent.aborted) {
    controller.abort();
    return { controller, release: () => {} };
  }

  const forward = () => controller.abort();
  parent.addEventListener('abort', forward, { once: true });
  return { controller, release: () => parent.removeEventListener('abort', forward) };
}

export class ParallelQueryExecutor {
  private readonly connections = new Map<string, DatabaseConnection>();

  constructor(connections: DatabaseConnection[] = []) {
    for (const connection of connections) {
      this.connections.set(connection.databaseId, connection);
    }
  }

  addConnection(connection: DatabaseConnection): void {
    this.connections.set(connection.databaseId, connection);
  }

  hasConnection(databaseId: string): boolean {
    return this.connections.has(databaseId);
  }

  async execute(intent: QueryIntent, options: ExecuteOptions = {}): Promise<Map<string, QueryExecutionResult>> {
    const startTime = Date.now();

    const results = await Promise.all(intent.databaseQueries.map((subIntent) => this.runTask(subIntent, options)));

    const byDatabase = new Map<string, QueryExecutionResult>();
    for (const result of results) {
      if (!byDatabase.has(result.databaseId)) {
        byDatabase.set(result.databaseId, result);
      }
    }

    logInfo('Sub-queries executed', {
      request_id: options.requestId,
      stage: 'execute',
      succeeded: results.filter((r) => r.success).length,
      failed: results.filter((r) => !r.success).length,
      duration_ms: Date.now() - startTime,
    });

    return byDatabase;
  }

  /**
   * One sub-intent; always resolves
   */
  private async runTask(subIntent: DatabaseQueryIntent, options: ExecuteOptions): Promise<QueryExecutionResult> {
    const startTime = Date.now();
    const base = {
      databaseId: subIntent.databaseId,
      databaseName: subIntent.databaseName,
      executedSql: subIntent.generatedSql ?? '',
    };

    const failure = (kind: ExecutionErrorKind, message: string): QueryExecutionResult => {
      logWarn('Sub-query failed', {
        request_id: options.requestId,
        stage: 'execute',
        database_id: subIntent.databaseId,
        kind,
        error: message,
      });
      return {
        ...base,
        rowCount: 0,
        columns: [],
        rows: [],
        truncated: false,
        success: false,
        errorMessage: message,
        errorKind: kind,
        elapsedMs: Date.now() - startTime,
      };
    };

    if (subIntent.validation.state !== 'valid' || !subIntent.generatedSql) {
      const reasons = subIntent.validation.errors.join('; ');
      return failure('validation', reasons ? `SQL validation failed: ${reasons}` : 'SQL was not validated');
    }

    const connection = this.connections.get(subIntent.databaseId);
    if (!connection) {
      return failure('connection', `No connection configured for database '${subIntent.databaseId}'`);
    }

    if (options.signal?.aborted) {
      return failure('cancelled', 'Request was cancelled');
    }

    const maxRows = Math.min(connection.maxRows, options.maxRows ?? connection.maxRows);
    const timeoutMs = connection.timeoutMs;
    const { controller, release } = childController(options.signal);
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the race settles as a timeout
        reject(new QueryTimeoutError(subIntent.databaseId, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const output = await Promise.race([
        connection.runner.execute(subIntent.generatedSql, { maxRows, timeoutMs, signal: controller.signal }),
        timeout,
      ]);
      const rows = output.rows.slice(0, maxRows);

      return {
        ...base,
        rowCount: rows.length,
        columns: output.columns,
        rows,
        truncated: output.truncated || output.rows.length > maxRows,
        success: true,
        elapsedMs: Date.now() - startTime,
      };
    } catch (error) {
      const kind = options.signal?.aborted ? 'cancelled' : classifyExecutionError(error);
      return failure(kind, errorMessage(error));
    } finally {
      clearTimeout(timer);
      release();
    }
  }
}

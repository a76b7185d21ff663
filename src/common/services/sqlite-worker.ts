/**
 * SQLite worker thread
 *
 * better-sqlite3 runs a statement synchronously on the calling thread, so
 * each SQLite connection gets a worker of its own. The runner posts
 * { id, sql, maxRows } and the worker replies with raw rows; a statement
 * that overruns is stopped with worker.terminate().
 *
 * The script is evaluated as plain CommonJS so the same source works from
 * dist/ and under ts-jest. The driver is resolved on the main thread and
 * handed over in workerData.
 */

import { z } from 'zod';

export const SQLITE_WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const Database = require(workerData.driverPath);

const db = new Database(workerData.filename, { readonly: true, fileMustExist: true });

parentPort.on('message', (request) => {
  try {
    const stmt = db.prepare(request.sql);
    if (!stmt.reader || !stmt.readonly) {
      parentPort.postMessage({
        id: request.id,
        ok: false,
        message: 'Only read-only statements that return rows are allowed',
      });
      return;
    }

    const columns = stmt.columns().map((c) => c.name);
    const rows = [];
    let truncated = false;
    for (const raw of stmt.raw(true).iterate()) {
      if (rows.length >= request.maxRows) {
        truncated = true;
        break;
      }
      rows.push(raw);
    }
    parentPort.postMessage({ id: request.id, ok: true, columns, rows, truncated });
  } catch (error) {
    parentPort.postMessage({
      id: request.id,
      ok: false,
      message: error instanceof Error ? error.message : String(error),
    });
  }
});
`;

export interface SqliteWorkerData {
  driverPath: string;
  filename: string;
}

export interface SqliteWorkerRequest {
  id: number;
  sql: string;
  maxRows: number;
}

export const SqliteWorkerReply = z.discriminatedUnion('ok', [
  z.object({
    id: z.number(),
    ok: z.literal(true),
    columns: z.array(z.string()),
    rows: z.array(z.array(z.unknown())),
    truncated: z.boolean(),
  }),
  z.object({
    id: z.number(),
    ok: z.literal(false),
    message: z.string(),
  }),
]);

export type SqliteWorkerReply = z.infer<typeof SqliteWorkerReply>;

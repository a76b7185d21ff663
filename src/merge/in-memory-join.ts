/**
 * In-memory cross-database join
 *
 * Two results from different databases are joined on ID-like columns
 * (names ending in "id"). The join column is picked in two passes:
 *
 * 1. Name match: the same ID column appears in two or more results
 * 2. Value match: the pair of ID columns with the most shared values
 *
 * Rows join inner-style; a base row without a partner is dropped.
 */

import type { CellValue, MergedTable, QueryExecutionResult, ResultRow } from '../common/types.js';

export interface JoinSide {
  result: QueryExecutionResult;
  column: string;
}

export interface JoinPlan {
  sides: JoinSide[];
  /** How the column was found */
  strategy: 'name' | 'value';
  sharedValues: number;
}

export function isIdLikeColumn(column: string): boolean {
  return /id$/i.test(column);
}

/**
 * Join key for a cell; null for empty cells
 * Numeric text compares as a number so "7" and "7.0" meet.
 */
export function joinKey(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  if (text.length === 0 || text.toUpperCase() === 'NULL') return null;
  const numeric = Number(text);
  return Number.isFinite(numeric) ? String(numeric) : text.toLowerCase();
}

function columnValues(result: QueryExecutionResult, column: string): Set<string> {
  const values = new Set<string>();
  for (const row of result.rows) {
    const key = joinKey(row[column]);
    if (key !== null) values.add(key);
  }
  return values;
}

function countShared(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const value of a) {
    if (b.has(value)) shared++;
  }
  return shared;
}

/**
 * Best join between the successful results, or null when none overlap
 */
export function findJoinPlan(results: QueryExecutionResult[]): JoinPlan | null {
  const candidates = results.filter((r) => r.success && r.rows.length > 0);
  if (candidates.length < 2) return null;

  // Pass 1: shared column name
  const byName = new Map<string, QueryExecutionResult[]>();
  for (const result of candidates) {
    for (const column of result.columns.filter(isIdLikeColumn)) {
      const key = column.toLowerCase();
      byName.set(key, [...(byName.get(key) ?? []), result]);
    }
  }

  let namePlan: JoinPlan | null = null;
  for (const [key, owners] of byName) {
    if (owners.length < 2) continue;
    const sides = owners.slice(0, 2).map((result) => ({
      result,
      column: result.columns.find((c) => c.toLowerCase() === key) ?? key,
    }));
    const shared = countShared(
      columnValues(sides[0].result, sides[0].column),
      columnValues(sides[1].result, sides[1].column)
    );
    if (shared > 0 && (!namePlan || shared > namePlan.sharedValues)) {
      namePlan = { sides, strategy: 'name', sharedValues: shared };
    }
  }
  if (namePlan) return namePlan;

  // Pass 2: most shared values across any pair of ID columns
  let best: JoinPlan | null = null;
  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      for (const left of candidates[i].columns.filter(isIdLikeColumn)) {
        const leftValues = columnValues(candidates[i], left);
        for (const right of candidates[j].columns.filter(isIdLikeColumn)) {
          const shared = countShared(leftValues, columnValues(candidates[j], right));
          if (shared > 0 && (!best || shared > best.sharedValues)) {
            best = {
              sides: [
                { result: candidates[i], column: left },
                { result: candidates[j], column: right },
              ],
              strategy: 'value',
              sharedValues: shared,
            };
          }
        }
      }
    }
  }

  return best;
}

/**
 * Join the plan's two sides; null when no row matched
 */
export function performJoin(plan: JoinPlan): MergedTable | null {
  const [base, other] = plan.sides;

  const index = new Map<string, ResultRow>();
  for (const row of other.result.rows) {
    const key = joinKey(row[other.column]);
    if (key !== null && !index.has(key)) index.set(key, row);
  }

  const columns = [...base.result.columns];
  const taken = new Set(columns.map((c) => c.toLowerCase()));
  for (const column of other.result.columns) {
    if (!taken.has(column.toLowerCase())) {
      columns.push(column);
      taken.add(column.toLowerCase());
    }
  }

  const rows: ResultRow[] = [];
  for (const baseRow of base.result.rows) {
    const key = joinKey(baseRow[base.column]);
    if (key === null) continue;
    const match = index.get(key);
    if (!match) continue;

    const merged: ResultRow = { ...baseRow };
    for (const [column, value] of Object.entries(match)) {
      if (!Object.keys(merged).some((c) => c.toLowerCase() === column.toLowerCase())) {
        merged[column] = value;
      }
    }
    rows.push(merged);
  }

  if (rows.length === 0) return null;

  return {
    label: `Merged (${base.result.databaseName} + ${other.result.databaseName})`,
    joinColumns: [base.column, other.column],
    columns,
    rows,
  };
}

export function joinResults(results: QueryExecutionResult[]): MergedTable | null {
  const plan = findJoinPlan(results);
  return plan ? performJoin(plan) : null;
}

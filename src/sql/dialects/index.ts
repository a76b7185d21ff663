/**
 * Dialect strategy factory
 */

import type { SqlDialect } from '../../common/types.js';
import type { SqlDialectStrategy } from './base-dialect.js';
import { MySqlDialectStrategy } from './mysql-dialect.js';
import { PostgresDialectStrategy } from './postgres-dialect.js';
import { SqliteDialectStrategy } from './sqlite-dialect.js';
import { SqlServerDialectStrategy } from './sqlserver-dialect.js';

export type { SqlDialectStrategy } from './base-dialect.js';
export { BaseDialectStrategy } from './base-dialect.js';
export { MySqlDialectStrategy, PostgresDialectStrategy, SqliteDialectStrategy, SqlServerDialectStrategy };

const STRATEGIES: Record<SqlDialect, SqlDialectStrategy> = {
  sqlite: new SqliteDialectStrategy(),
  postgresql: new PostgresDialectStrategy(),
  mysql: new MySqlDialectStrategy(),
  sqlserver: new SqlServerDialectStrategy(),
};

/**
 * Strategy for a dialect name
 *
 * @throws Error when no strategy exists for the dialect
 */
export function getDialectStrategy(dialect: string): SqlDialectStrategy {
  if (!isSupportedDialect(dialect)) {
    throw new Error(`No SQL dialect strategy for database type: ${dialect}`);
  }
  return STRATEGIES[dialect];
}

export function isSupportedDialect(dialect: string): dialect is SqlDialect {
  return Object.prototype.hasOwnProperty.call(STRATEGIES, dialect);
}

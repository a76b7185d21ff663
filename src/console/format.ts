/**
 * Terminal rendering for the CLI
 */

import chalk from 'chalk';
import type { AnswerSource, ConfidenceBucket, FederatedResponse, SchemaSnapshot } from '../common/types.js';

const BUCKET_COLOR: Record<ConfidenceBucket, (text: string) => string> = {
  high: chalk.green,
  medium: chalk.yellow,
  low: chalk.red,
};

export function banner(title: string): string {
  const rule = '='.repeat(60);
  return [chalk.bold(rule), chalk.bold.cyan(title), chalk.bold(rule)].join('\n');
}

function renderSource(source: AnswerSource, index: number): string {
  const marker = source.error ? chalk.red('✗') : chalk.green('✓');
  const kind = source.type === 'database' ? chalk.blue('db') : chalk.magenta('doc');
  const metric = source.type === 'database' ? `${source.rowCountOrRelevance} rows` : `relevance ${source.rowCountOrRelevance}`;
  const head = `${marker} ${index + 1}. ${kind} ${chalk.bold(source.identifier)} ${chalk.gray(`(${metric})`)}`;
  const body = source.error ? chalk.red(`     ${source.error}`) : chalk.gray(`     ${source.excerpt}`);
  return `${head}\n${body}`;
}

export function renderResponse(response: FederatedResponse): string {
  const lines: string[] = [];
  lines.push(response.answer);
  lines.push('');

  if (response.sources.length > 0) {
    lines.push(chalk.bold('Sources'));
    response.sources.forEach((source, i) => lines.push(renderSource(source, i)));
    lines.push('');
  }

  for (const warning of response.warnings ?? []) {
    lines.push(chalk.yellow(`! ${warning}`));
  }

  const bucket = BUCKET_COLOR[response.confidenceBucket](response.confidenceBucket);
  lines.push(
    chalk.gray(`${response.kind} · path ${response.path} · confidence `) +
      bucket +
      chalk.gray(` · ${response.executionTimeMs}ms · ${response.requestId}`)
  );
  return lines.join('\n');
}

export function renderSchemas(schemas: SchemaSnapshot[]): string {
  if (schemas.length === 0) {
    return chalk.yellow('No databases are connected.');
  }

  const lines: string[] = [];
  for (const schema of schemas) {
    lines.push(`${chalk.bold.cyan(schema.databaseName)} ${chalk.gray(`${schema.databaseId} · ${schema.dialect}`)}`);
    for (const table of schema.tables) {
      const rows = table.rowCount !== undefined ? chalk.gray(` (${table.rowCount} rows)`) : '';
      lines.push(`  ${chalk.white(table.name)}${rows}`);
      lines.push(chalk.gray(`    ${table.columns.map((c) => (c.isPrimaryKey ? `${c.name}*` : c.name)).join(', ')}`));
      for (const fk of table.foreignKeys) {
        lines.push(chalk.gray(`    ${fk.column} → ${fk.referencedTable}.${fk.referencedColumn}`));
      }
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

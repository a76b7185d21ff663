#!/usr/bin/env node
/**
 * fedquery CLI
 *
 * Usage:
 *   fedquery ask "Show top 5 customers by order count"
 *   fedquery ask "and their cities?" --history "previous answer text"
 *   fedquery classify "hi"
 *   fedquery schemas --database sales
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createFederation, type Federation } from '../bootstrap.js';
import { errorMessage } from '../common/errors.js';
import { banner, renderResponse, renderSchemas } from './format.js';

interface CommonOptions {
  config?: string;
}

interface AskOptions extends CommonOptions {
  history?: string;
  maxRows?: string;
}

interface SchemasOptions extends CommonOptions {
  database?: string;
}

async function withFederation(options: CommonOptions, action: (federation: Federation) => Promise<void>): Promise<void> {
  const spinner = ora('Connecting databases...').start();
  let federation: Federation;
  try {
    federation = await createFederation({ configPath: options.config });
    spinner.succeed(`${federation.catalog.getAllSchemas().length} database(s) ready`);
  } catch (error) {
    spinner.fail(`Failed to initialize: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  try {
    await action(federation);
  } finally {
    await federation.close();
  }
}

function parseRowBudget(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--max-rows must be a positive integer (got "${raw}")`);
  }
  return value;
}

async function askCommand(words: string[], options: AskOptions): Promise<void> {
  const question = words.join(' ');
  console.log(banner('FEDERATED QUERY'));
  console.log(chalk.white('Question:'), chalk.yellow(question));
  console.log();

  await withFederation(options, async (federation) => {
    const spinner = ora('Answering...').start();
    try {
      const response = await federation.pipeline.run(question, {
        conversationHistory: options.history,
        maxRows: parseRowBudget(options.maxRows),
      });
      spinner.stop();
      console.log(renderResponse(response));
    } catch (error) {
      spinner.fail(errorMessage(error));
      process.exitCode = 1;
    }
  });
}

async function classifyCommand(words: string[], options: CommonOptions): Promise<void> {
  const query = words.join(' ');

  await withFederation(options, async (federation) => {
    const heuristic = federation.classifier.score(query);
    console.log(chalk.white('Heuristic:'), chalk.cyan(heuristic.decision), chalk.gray(`score ${heuristic.score}`));
    console.log(chalk.gray(`  signals: ${heuristic.signals.join(', ') || 'none'}`));

    try {
      const verdict = await federation.classifier.classify(query);
      console.log(chalk.white('Verdict:  '), chalk.bold(verdict.kind), chalk.gray(`(${verdict.source})`));
      if (verdict.kind === 'information') {
        console.log(chalk.gray(`  tokens: ${verdict.tokens.join(', ')}`));
      } else if (verdict.kind === 'conversation' && verdict.answer) {
        console.log(chalk.gray(`  answer: ${verdict.answer}`));
      }
    } catch (error) {
      console.log(chalk.red(errorMessage(error)));
      process.exitCode = 1;
    }
  });
}

async function schemasCommand(options: SchemasOptions): Promise<void> {
  await withFederation(options, async (federation) => {
    const schemas = federation.catalog
      .getAllSchemas()
      .filter((s) => !options.database || s.databaseId === options.database);
    console.log(renderSchemas(schemas));
  });
}

const program = new Command();

program
  .name('fedquery')
  .description('Ask questions across several databases and documents')
  .version('0.1.0');

program
  .command('ask <question...>')
  .description('Answer a question from the connected databases and documents')
  .option('-c, --config <path>', 'Path of federation.config.json')
  .option('--history <text>', 'Conversation context for follow-up questions')
  .option('--max-rows <n>', 'Row budget per database')
  .action(askCommand);

program
  .command('classify <query...>')
  .description('Classify a query as conversation or information')
  .option('-c, --config <path>', 'Path of federation.config.json')
  .action(classifyCommand);

program
  .command('schemas')
  .description('List connected databases and their tables')
  .option('-c, --config <path>', 'Path of federation.config.json')
  .option('-d, --database <id>', 'Only this database')
  .action(schemasCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
});

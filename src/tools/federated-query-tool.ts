/**
 * Federated query MCP tools
 *
 * - federated_query: answer a question from the databases and documents
 * - classify_query:  show how a query would be classified, no database work
 * - list_schemas:    show the tables the engine can query
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AnswerSource, FederatedResponse, HeuristicResult, SchemaSnapshot } from '../common/types.js';
import {
  ClassifyQueryToolSchema,
  FederatedQueryToolSchema,
  ListSchemasToolSchema,
} from '../common/schemas/index.js';
import { errorMessage } from '../common/errors.js';
import { logError } from '../common/services/logger.js';
import type { Federation } from '../bootstrap.js';

// =============================================================================
// FORMATTING
// =============================================================================

function formatSource(source: AnswerSource, index: number): string {
  const label = source.type === 'database' ? 'rows' : 'relevance';
  const status = source.error ? ' ❌' : '';
  return `${index + 1}. **${source.identifier}** (${source.type}, ${label}: ${source.rowCountOrRelevance})${status}\n   ${source.excerpt}`;
}

export function formatResponse(response: FederatedResponse): string {
  const lines: string[] = [];
  lines.push(response.answer);
  lines.push('');

  if (response.sources.length > 0) {
    lines.push('## Sources');
    response.sources.forEach((source, i) => lines.push(formatSource(source, i)));
    lines.push('');
  }

  if (response.warnings && response.warnings.length > 0) {
    lines.push('## Warnings');
    response.warnings.forEach((warning) => lines.push(`- ${warning}`));
    lines.push('');
  }

  lines.push('---');
  lines.push(
    `*${response.kind} | path: ${response.path} | confidence: ${response.confidenceBucket} | ${response.executionTimeMs}ms | ${response.requestId}*`
  );
  return lines.join('\n');
}

export function formatSchemas(schemas: SchemaSnapshot[]): string {
  if (schemas.length === 0) {
    return 'No databases are connected.';
  }

  const lines: string[] = [];
  for (const schema of schemas) {
    lines.push(`# ${schema.databaseName} (\`${schema.databaseId}\`, ${schema.dialect})`);
    lines.push(`*Refreshed ${schema.lastRefreshedAt.toISOString()}*`);
    lines.push('');
    for (const table of schema.tables) {
      const rows = table.rowCount !== undefined ? ` ~${table.rowCount} rows` : '';
      lines.push(`- **${table.name}**${rows}: ${table.columns.map((c) => c.name).join(', ')}`);
      for (const fk of table.foreignKeys) {
        lines.push(`  - ${fk.column} → ${fk.referencedTable}.${fk.referencedColumn}`);
      }
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

function formatHeuristic(result: HeuristicResult): string {
  const signals = result.signals.length > 0 ? result.signals.join(', ') : 'none';
  return `Heuristic: ${result.decision} (score ${result.score}, ${result.tokenCount} tokens, signals: ${signals})`;
}

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

// =============================================================================
// REGISTRATION
// =============================================================================

export function registerFederatedQueryTools(server: McpServer, federation: Federation): void {
  server.tool(
    'federated_query',
    `Answer a natural-language question from every connected database and document.

**What it does:**
- Decides whether the message needs data at all (greetings are answered directly)
- Picks the databases and tables that hold the answer
- Writes and validates one read-only SQL query per database, runs them in parallel
- Merges rows and document excerpts into one answer with sources

**Slash commands:** \`/new\` starts a new conversation, \`/chat\` forces a conversational reply.

**Example:**
\`{ "query": "Show top 5 customers by order count" }\``,
    FederatedQueryToolSchema.shape,
    async ({ query, conversation_history, max_results }) => {
      try {
        const response = await federation.pipeline.run(query, {
          conversationHistory: conversation_history,
          maxRows: max_results,
        });
        return textResult(formatResponse(response));
      } catch (error) {
        logError('federated_query failed', { error: errorMessage(error) });
        return textResult(`# Query Failed\n\n**Error:** ${errorMessage(error)}`);
      }
    }
  );

  server.tool(
    'classify_query',
    `Classify a query as conversation or information request without touching any database.

Shows the heuristic score and signals, then the final verdict.`,
    ClassifyQueryToolSchema.shape,
    async ({ query }) => {
      try {
        const heuristic = federation.classifier.score(query);
        const verdict = await federation.classifier.classify(query);
        const detail =
          verdict.kind === 'information'
            ? `tokens: ${verdict.tokens.join(', ')}`
            : verdict.kind === 'command'
              ? `command: ${verdict.command.command}`
              : `answer: ${verdict.answer ?? '(none)'}`;

        return textResult(
          [
            `**Verdict:** ${verdict.kind} (source: ${verdict.source})`,
            formatHeuristic(heuristic),
            detail,
          ].join('\n')
        );
      } catch (error) {
        return textResult(`# Classification Failed\n\n**Error:** ${errorMessage(error)}`);
      }
    }
  );

  server.tool(
    'list_schemas',
    'List the connected databases with their tables, columns and foreign keys.',
    ListSchemasToolSchema.shape,
    async ({ database_id }) => {
      const schemas = federation.catalog
        .getAllSchemas()
        .filter((s) => !database_id || s.databaseId === database_id);
      return textResult(formatSchemas(schemas));
    }
  );
}

/**
 * Federated Query Pipeline
 *
 * One question in, one attributed answer out:
 *
 *   classify ──► analyze ──► route ──┬─► synthesize ──► execute ──┐
 *                                    └─► document search ─────────┴─► merge
 *
 * Stages run in order; the database and document branches run side by
 * side when the route asks for both. One AbortSignal reaches every AI
 * and database call. Only QueryInputError and PipelineCancelledError
 * leave run(); every other failure is recorded against its source.
 */

import type {
  ClassificationResult,
  DocumentChunk,
  DocumentSearcher,
  ExecutionPath,
  FederatedResponse,
  QueryCommand,
  QueryExecutionResult,
  QueryIntent,
  RoutePlan,
} from '../common/types.js';
import type { QueryIntentClassifier } from '../intent/query-intent-classifier.js';
import { defaultConversationReply } from '../intent/query-intent-classifier.js';
import type { QueryIntentAnalyzer } from '../intent/query-intent-analyzer.js';
import { executionPath, planRoute, type RoutingThresholds } from '../intent/routing.js';
import type { SqlSynthesizer } from '../sql/sql-synthesizer.js';
import type { ParallelQueryExecutor } from '../execution/parallel-query-executor.js';
import type { ResultMerger } from '../merge/result-merger.js';
import type { QueryIntentCache } from '../common/services/intent-cache.js';
import type { RefreshListener } from '../common/services/schema-catalog.js';
import { PipelineCancelledError, errorMessage, throwIfAborted } from '../common/errors.js';
import { generateRequestId, logInfo, logWarn, sanitizeForLog } from '../common/services/logger.js';
import { DEFAULT_FEDERATION_CONFIG, type FederationConfig } from './config.js';

export interface PipelineStages {
  classifier: QueryIntentClassifier;
  analyzer: QueryIntentAnalyzer;
  synthesizer: SqlSynthesizer;
  executor: ParallelQueryExecutor;
  merger: ResultMerger;
  documentSearcher?: DocumentSearcher;
  intentCache?: QueryIntentCache;
  /** Catalog whose refreshes invalidate the intent cache */
  catalog?: { onRefresh(listener: RefreshListener): () => void };
}

export interface RunOptions {
  conversationHistory?: string;
  /** Row budget per database for this request */
  maxRows?: number;
  signal?: AbortSignal;
  requestId?: string;
}

export const NEW_CONVERSATION_ANSWER = 'Started a new conversation.';

export class FederatedQueryPipeline {
  private readonly config: FederationConfig;
  private readonly thresholds: RoutingThresholds;
  private readonly unsubscribe?: () => void;

  constructor(
    private readonly stages: PipelineStages,
    config: Partial<FederationConfig> = {}
  ) {
    this.config = { ...DEFAULT_FEDERATION_CONFIG, ...config };
    this.thresholds = {
      high: this.config.highConfidenceThreshold,
      low: this.config.lowConfidenceThreshold,
    };

    const cache = this.config.intentCacheEnabled ? stages.intentCache : undefined;
    if (cache && stages.catalog) {
      this.unsubscribe = stages.catalog.onRefresh(() => cache.clear());
    }
  }

  /** Stop listening to catalog refreshes */
  dispose(): void {
    this.unsubscribe?.();
  }

  async run(query: unknown, options: RunOptions = {}): Promise<FederatedResponse> {
    const requestId = options.requestId ?? generateRequestId();
    const startedAt = Date.now();
    const runOptions = { ...options, requestId };

    const classification = await this.stages.classifier.classify(query, {
      conversationHistory: options.conversationHistory,
      signal: options.signal,
      requestId,
    });
    throwIfAborted(options.signal, 'classification');

    // classify() has already validated the input
    const text = typeof query === 'string' ? query.trim() : '';

    logInfo('Query classified', {
      request_id: requestId,
      stage: 'classify',
      decision: classification.kind,
      source: classification.source,
      query: sanitizeForLog(text),
    });

    switch (classification.kind) {
      case 'command':
        return this.runCommand(classification.command, runOptions, startedAt);
      case 'conversation':
        return this.conversationResponse(text, classification, requestId, startedAt);
      case 'information':
        return this.runInformation(text, classification.tokens, runOptions, startedAt);
    }
  }

  // ===========================================================================
  // COMMANDS & CONVERSATION
  // ===========================================================================

  private async runCommand(
    command: QueryCommand,
    options: RunOptions & { requestId: string },
    startedAt: number
  ): Promise<FederatedResponse> {
    if (command.command === 'new_conversation' && command.payload) {
      // Fresh history, then answer the rest of the line
      const response = await this.run(command.payload, { ...options, conversationHistory: undefined });
      return { ...response, command };
    }

    const answer =
      command.command === 'new_conversation' ? NEW_CONVERSATION_ANSWER : defaultConversationReply(command.payload);

    return {
      kind: 'command',
      answer,
      sources: [],
      confidenceBucket: 'high',
      executionTimeMs: Date.now() - startedAt,
      path: 'none',
      requestId: options.requestId,
      command,
    };
  }

  private conversationResponse(
    query: string,
    classification: Extract<ClassificationResult, { kind: 'conversation' }>,
    requestId: string,
    startedAt: number
  ): FederatedResponse {
    const response: FederatedResponse = {
      kind: 'conversation',
      answer: classification.answer ?? defaultConversationReply(query),
      sources: [],
      confidenceBucket: 'high',
      executionTimeMs: Date.now() - startedAt,
      path: 'none',
      requestId,
    };
    return classification.error ? { ...response, warnings: [classification.error] } : response;
  }

  // ===========================================================================
  // INFORMATION
  // ===========================================================================

  private async runInformation(
    query: string,
    tokens: string[],
    options: RunOptions & { requestId: string },
    startedAt: number
  ): Promise<FederatedResponse> {
    const { signal, requestId } = options;

    const intent = await this.resolveIntent(query, tokens, options);
    throwIfAborted(signal, 'intent analysis');

    const plan = planRoute(intent, this.thresholds);
    const path: ExecutionPath = executionPath(plan);
    logInfo('Query routed', {
      request_id: requestId,
      stage: 'route',
      confidence: intent.confidence,
      bucket: plan.bucket,
      path,
      databases: intent.databaseQueries.length,
    });

    const [results, documents] = await Promise.all([
      this.runDatabaseBranch(intent, plan, options),
      this.runDocumentBranch(query, plan, options),
    ]);
    throwIfAborted(signal, 'execution');

    const merged = await this.stages.merger.merge(
      {
        query,
        results,
        documents,
        dropped: intent.dropped,
        confidenceBucket: plan.bucket,
        conversationContext: options.conversationHistory,
        startedAt,
      },
      { signal, requestId }
    );
    throwIfAborted(signal, 'answer synthesis');

    logInfo('Query answered', {
      request_id: requestId,
      path,
      sources: merged.sources.length,
      no_data: merged.noData,
      duration_ms: Date.now() - startedAt,
    });

    return {
      kind: 'information',
      answer: merged.answer,
      sources: merged.sources,
      confidenceBucket: merged.confidenceBucket,
      executionTimeMs: Date.now() - startedAt,
      path,
      requestId,
    };
  }

  private async resolveIntent(query: string, tokens: string[], options: RunOptions): Promise<QueryIntent> {
    const cache = this.config.intentCacheEnabled ? this.stages.intentCache : undefined;

    const cached = cache?.get(query);
    if (cached) return cached;

    const intent = await this.stages.analyzer.analyze(query, tokens, {
      signal: options.signal,
      requestId: options.requestId,
    });

    // Degraded intents are not worth replaying
    if (cache && intent.source === 'ai') {
      cache.set(query, intent);
    }
    return intent;
  }

  private async runDatabaseBranch(
    intent: QueryIntent,
    plan: RoutePlan,
    options: RunOptions
  ): Promise<Map<string, QueryExecutionResult>> {
    if (!plan.runDatabase) return new Map();
    const maxRows = Math.min(options.maxRows ?? this.config.maxRows, this.config.maxRows);

    const synthesized = await this.stages.synthesizer.synthesize(intent, {
      maxRows,
      signal: options.signal,
      requestId: options.requestId,
    });
    throwIfAborted(options.signal, 'SQL synthesis');

    return this.stages.executor.execute(synthesized, {
      maxRows,
      signal: options.signal,
      requestId: options.requestId,
    });
  }

  private async runDocumentBranch(query: string, plan: RoutePlan, options: RunOptions): Promise<DocumentChunk[]> {
    const searcher = this.stages.documentSearcher;
    if (!plan.runDocuments || !searcher) return [];

    try {
      return await searcher.search(query, this.config.maxDocumentResults, options.signal);
    } catch (error) {
      if (error instanceof PipelineCancelledError || options.signal?.aborted) {
        throw new PipelineCancelledError('document search');
      }
      logWarn('Document search failed', { request_id: options.requestId, error: errorMessage(error) });
      return [];
    }
  }
}

/**
 * Query Intent Classifier
 *
 * Decides whether a query is small talk or a request for information.
 *
 * Order of checks:
 * 1. Slash-commands (/new, /chat, ...) bypass everything
 * 2. Heuristic pass (pure, no I/O) settles clear-cut queries
 * 3. AI pass for the ambiguous middle, parsed leniently
 * 4. Post-check: a long question the AI called "conversation" is
 *    re-classified as information
 *
 * A provider failure never escapes: the classifier degrades to
 * conversation. Only untokenizable input raises QueryInputError.
 */

import type { ClassificationResult, HeuristicResult } from '../common/types.js';
import type { TextGenerator } from '../common/services/text-generator.js';
import { ClassificationResponseSchema } from '../common/schemas/index.js';
import { parseStructured } from '../common/utils/json-parser.js';
import { extractQueryTokens, normalizeTokens, splitWhitespace } from '../common/utils/text.js';
import { MAX_HISTORY_CHARS, OVERRIDE_MIN_CHARS, OVERRIDE_MIN_TOKENS } from '../common/constants.js';
import { ClassificationError, PipelineCancelledError, QueryInputError, errorMessage } from '../common/errors.js';
import { logDebug, logWarn, sanitizeForLog } from '../common/services/logger.js';
import { DEFAULT_FEDERATION_CONFIG, type FederationConfig } from '../pipeline/config.js';
import { hasQuestionPunctuation, scoreQuery } from './heuristic-classifier.js';
import { parseQueryCommand } from './query-command-parser.js';

export interface ClassifyOptions {
  conversationHistory?: string;
  signal?: AbortSignal;
  requestId?: string;
}

type ClassifierConfig = Pick<
  FederationConfig,
  'heuristicInformationScore' | 'heuristicLongQueryInformationScore' | 'minAiTokens' | 'maxAiTokens'
>;

/**
 * Throw QueryInputError unless the query is a non-empty string
 */
export function assertQueryText(query: unknown): string {
  if (typeof query !== 'string') {
    throw new QueryInputError(`Query must be a string (got ${query === null ? 'null' : typeof query})`);
  }
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new QueryInputError('Query is empty');
  }
  return trimmed;
}

/**
 * Last MAX_HISTORY_CHARS characters of the conversation
 */
export function historySnippet(history: string | undefined): string {
  if (!history) return '';
  const normalized = history.trim();
  return normalized.length > MAX_HISTORY_CHARS
    ? normalized.substring(normalized.length - MAX_HISTORY_CHARS)
    : normalized;
}

/**
 * Whether an AI "conversation" verdict should be overridden
 */
export function shouldOverrideConversation(query: string): boolean {
  return (
    hasQuestionPunctuation(query) &&
    query.length > OVERRIDE_MIN_CHARS &&
    splitWhitespace(query).length >= OVERRIDE_MIN_TOKENS
  );
}

export function buildClassificationPrompt(
  query: string,
  history: string,
  minTokens: number,
  maxTokens: number
): string {
  return `Classify the user input as CONVERSATION or INFORMATION.

CONVERSATION when the input is:
- A greeting in any language
- About the assistant itself (who are you, what can you do)
- Small talk, thanks, farewells or other niceties

INFORMATION when the input:
- Asks for data (show, list, find, count, total, sum, compare)
- Asks a question with informational intent (what, which, how many, when)
- Carries numbers, dates, ranges, thresholds or "top N"
- References specific entities or record identifiers

User: "${query}"
${history ? `Context: "${history}"\n` : ''}
Respond with JSON only:
{"type": "CONVERSATION" | "INFORMATION", "tokens": [...], "answer": "..." | null}

Rules for "tokens" (INFORMATION only):
- Use words from the user's own input, in the user's own language; never translate
- Include every question word that appears in the input
- Include grammatical variants of the key terms (singular/plural, verb forms)
- Produce between ${minTokens} and ${maxTokens} tokens

Rules for "answer" (CONVERSATION only):
- A short, friendly reply in the user's language; null for INFORMATION

If unsure, answer CONVERSATION.`;
}

/**
 * Deterministic reply for heuristic small talk, which never calls the AI
 */
export function defaultConversationReply(query: string): string {
  const lower = query.toLowerCase();
  if (/\b(thanks|thank you|thx|cheers)\b/.test(lower)) {
    return "You're welcome! Ask me anything about your data.";
  }
  if (/\b(bye|goodbye|see you)\b/.test(lower)) {
    return 'Goodbye!';
  }
  return 'Hello! Ask me a question and I will look for the answer in the connected databases and documents.';
}

export class QueryIntentClassifier {
  private readonly config: ClassifierConfig;

  constructor(
    private readonly generator: TextGenerator,
    config: Partial<ClassifierConfig> = {}
  ) {
    this.config = { ...DEFAULT_FEDERATION_CONFIG, ...config };
  }

  /**
   * Heuristic pass only; exposed for diagnostics
   */
  score(query: string): HeuristicResult {
    return scoreQuery(query, {
      informationScore: this.config.heuristicInformationScore,
      longQueryInformationScore: this.config.heuristicLongQueryInformationScore,
    });
  }

  async classify(query: unknown, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const trimmed = assertQueryText(query);
    const logCtx = { request_id: options.requestId, stage: 'classify' };

    const command = parseQueryCommand(trimmed);
    if (command) {
      logDebug('Slash-command recognised', { ...logCtx, decision: command.command });
      return { kind: 'command', command, source: 'command' };
    }

    const heuristic = this.score(trimmed);

    if (heuristic.decision === 'conversation') {
      logDebug('Classified by heuristics', { ...logCtx, decision: 'conversation', score: heuristic.score });
      return { kind: 'conversation', source: 'heuristic' };
    }

    if (heuristic.decision === 'information') {
      logDebug('Classified by heuristics', {
        ...logCtx,
        decision: 'information',
        score: heuristic.score,
        signals: heuristic.signals.join(','),
      });
      return { kind: 'information', tokens: extractQueryTokens(trimmed), source: 'heuristic' };
    }

    let verdict: ClassificationResult;
    try {
      verdict = await this.classifyWithAi(trimmed, options);
    } catch (error) {
      if (!(error instanceof ClassificationError)) throw error;
      logWarn('AI classification degraded to conversation', { ...logCtx, error: error.message });
      return { kind: 'conversation', source: 'fallback', error: error.message };
    }

    if (verdict.kind === 'conversation' && shouldOverrideConversation(trimmed)) {
      logDebug('Conversation verdict overridden', { ...logCtx, query: sanitizeForLog(trimmed) });
      return { kind: 'information', tokens: extractQueryTokens(trimmed), source: 'override' };
    }

    return verdict;
  }

  private async classifyWithAi(query: string, options: ClassifyOptions): Promise<ClassificationResult> {
    const logCtx = { request_id: options.requestId, stage: 'classify' };
    const prompt = buildClassificationPrompt(
      query,
      historySnippet(options.conversationHistory),
      this.config.minAiTokens,
      this.config.maxAiTokens
    );

    let raw: string;
    try {
      raw = await this.generator.generate(prompt, {
        maxTokens: 300,
        temperature: 0,
        signal: options.signal,
        requestId: options.requestId,
      });
    } catch (error) {
      if (options.signal?.aborted) throw new PipelineCancelledError('classification');
      throw new ClassificationError(`AI classification failed: ${errorMessage(error)}`);
    }

    const outcome = parseStructured(raw, ClassificationResponseSchema);

    switch (outcome.kind) {
      case 'structured': {
        const { type, tokens, answer } = outcome.value;
        logDebug('AI classified query', { ...logCtx, decision: type });
        if (type === 'INFORMATION') {
          return {
            kind: 'information',
            tokens: normalizeTokens([...tokens, ...extractQueryTokens(query)]),
            source: 'ai',
          };
        }
        return answer ? { kind: 'conversation', answer, source: 'ai' } : { kind: 'conversation', source: 'ai' };
      }

      case 'plain_text': {
        const upper = outcome.text.toUpperCase();
        if (upper.includes('CONVERSATION')) {
          return { kind: 'conversation', source: 'ai_text_scan' };
        }
        if (upper.includes('INFORMATION')) {
          return { kind: 'information', tokens: extractQueryTokens(query), source: 'ai_text_scan' };
        }
        throw new ClassificationError(`AI classification was unclear: ${outcome.reason}`);
      }

      case 'failed':
        throw new ClassificationError(`AI returned no classification: ${outcome.reason}`);
    }
  }
}

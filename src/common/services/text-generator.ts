/**
 * Text Generation Capability
 *
 * The pipeline consumes one thing from the AI side:
 *   generate(prompt, options) -> string
 *
 * Retry, backoff and provider fallback live here, behind that
 * interface. Pipeline stages never retry on their own; a rejected
 * generate() means the capability already gave up.
 */

import Anthropic from '@anthropic-ai/sdk';
import { CircuitBreaker, DEFAULT_CIRCUIT_CONFIG, type CircuitBreakerConfig } from './circuit-breaker.js';
import { CircuitBreakerOpenError, TextGenerationError, errorMessage } from '../errors.js';
import { logDebug, logWarn } from './logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface GenerateOptions {
  /** System prompt */
  system?: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature (0-1) */
  temperature?: number;
  /** Aborts the call (and any pending retry) */
  signal?: AbortSignal;
  /** Correlation id for logs */
  requestId?: string;
}

export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

// =============================================================================
// ANTHROPIC PROVIDER
// =============================================================================

export interface AnthropicGeneratorConfig {
  apiKey?: string;
  model: string;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
}

export class AnthropicTextGenerator implements TextGenerator {
  private client: Anthropic | null = null;
  private apiKey: string | undefined;
  private model: string;
  private defaultMaxTokens: number;
  private defaultTemperature: number;

  constructor(config: AnthropicGeneratorConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.defaultMaxTokens = config.defaultMaxTokens ?? 1500;
    this.defaultTemperature = config.defaultTemperature ?? 0.2;
  }

  /**
   * Created on first use; the SDK throws when no API key is configured
   */
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.apiKey ?? process.env.ANTHROPIC_API_KEY,
      });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    logDebug('Calling Claude', {
      request_id: options.requestId,
      model: this.model,
      prompt_chars: prompt.length,
    });

    const response = await this.getClient().messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens ?? this.defaultMaxTokens,
        temperature: options.temperature ?? this.defaultTemperature,
        system: options.system,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
      },
      { signal: options.signal }
    );

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');
  }
}

/**
 * Check if the Claude API is configured
 */
export function isClaudeAvailable(): boolean {
  return !!process.env.ANTHROPIC_API_KEY;
}

/**
 * Stands in for the provider chain when no API key is configured, so every
 * AI stage takes its fallback without waiting on retries
 */
export class UnconfiguredTextGenerator implements TextGenerator {
  async generate(): Promise<string> {
    throw new TextGenerationError('ANTHROPIC_API_KEY is not set');
  }
}

// =============================================================================
// RESILIENT GENERATOR (retry + backoff + fallback chain)
// =============================================================================

export interface ProviderEntry {
  name: string;
  generator: TextGenerator;
}

export interface RetryPolicy {
  /** Retries per provider after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export interface ResilientGeneratorOptions {
  retry?: Partial<RetryPolicy>;
  circuit?: CircuitBreakerConfig;
  /** Injected for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Exponential backoff with 0-20% jitter: min(base * 2^attempt, max) + jitter
 */
export function calculateBackoffWithJitter(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponentialDelay = Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
  const jitter = exponentialDelay * 0.2 * random();
  return Math.floor(exponentialDelay + jitter);
}

/**
 * Errors worth retrying against the same provider
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (status === undefined) return true;
    return status === 408 || status === 409 || status === 429 || status >= 500;
  }

  const message = errorMessage(error).toLowerCase();
  const transientPatterns = [
    'econnreset',
    'etimedout',
    'econnrefused',
    'enotfound',
    'socket hang up',
    'network',
    'timeout',
    'timed out',
    'overloaded',
    'rate limit',
  ];
  return transientPatterns.some((pattern) => message.includes(pattern));
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class ResilientTextGenerator implements TextGenerator {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly policy: RetryPolicy;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly providers: ProviderEntry[],
    options: ResilientGeneratorOptions = {}
  ) {
    if (providers.length === 0) {
      throw new TextGenerationError('At least one text generation provider is required');
    }
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;

    for (const provider of providers) {
      this.breakers.set(
        provider.name,
        new CircuitBreaker(`llm:${provider.name}`, options.circuit ?? DEFAULT_CIRCUIT_CONFIG)
      );
    }
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const providerErrors: string[] = [];

    for (const provider of this.providers) {
      const breaker = this.breakers.get(provider.name);
      if (!breaker) continue;

      try {
        return await this.generateWithRetry(provider, breaker, prompt, options);
      } catch (error) {
        if (options.signal?.aborted) throw error;
        providerErrors.push(`${provider.name}: ${errorMessage(error)}`);
        logWarn('Text generation provider exhausted, trying next', {
          request_id: options.requestId,
          provider: provider.name,
          error: errorMessage(error),
        });
      }
    }

    throw new TextGenerationError(
      `All text generation providers failed (${providerErrors.length})`,
      providerErrors
    );
  }

  private async generateWithRetry(
    provider: ProviderEntry,
    breaker: CircuitBreaker,
    prompt: string,
    options: GenerateOptions
  ): Promise<string> {
    let attempt = 0;

    for (;;) {
      try {
        return await breaker.execute(
          () => provider.generator.generate(prompt, options),
          { request_id: options.requestId }
        );
      } catch (error) {
        const retryable =
          !(error instanceof CircuitBreakerOpenError) &&
          !options.signal?.aborted &&
          attempt < this.policy.maxRetries &&
          isTransientError(error);

        if (!retryable) throw error;

        const delay = calculateBackoffWithJitter(attempt, this.policy, this.random);
        logDebug('Retrying text generation', {
          request_id: options.requestId,
          provider: provider.name,
          attempt: attempt + 1,
          delay_ms: delay,
          error: errorMessage(error),
        });
        await this.sleep(delay, options.signal);
        attempt++;
      }
    }
  }

  getProviderStates(): Record<string, ReturnType<CircuitBreaker['getStats']>> {
    const states: Record<string, ReturnType<CircuitBreaker['getStats']>> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.getStats();
    }
    return states;
  }
}

/**
 * Federation Configuration
 *
 * Calibration constants and execution limits for the pipeline.
 * Merge order: defaults < environment < overrides.
 */

import {
  AI_MAX_TOKENS,
  AI_MIN_TOKENS,
  DEFAULT_MAX_DOCUMENT_RESULTS,
  DEFAULT_MAX_ROWS,
  DEFAULT_QUERY_TIMEOUT_MS,
  HEURISTIC_INFORMATION_SCORE,
  HEURISTIC_LONG_QUERY_INFORMATION_SCORE,
  HIGH_CONFIDENCE_THRESHOLD,
  LOW_CONFIDENCE_THRESHOLD,
} from '../common/constants.js';
import { FederationEnvSchema } from '../common/schemas/index.js';
import { ConfigurationError } from '../common/errors.js';

export interface FederationConfig {
  /** Confidence strictly above this is "high" */
  highConfidenceThreshold: number;
  /** Confidence strictly below this is "low" */
  lowConfidenceThreshold: number;

  /** Heuristic score that decides Information */
  heuristicInformationScore: number;
  /** Raised score for long, punctuation-bearing queries */
  heuristicLongQueryInformationScore: number;

  /** Token count requested from the AI classifier */
  minAiTokens: number;
  maxAiTokens: number;

  /** Row budget per database when the connection sets none */
  maxRows: number;
  /** Per-query timeout when the connection sets none */
  queryTimeoutMs: number;
  maxDocumentResults: number;

  /** Replay analyzed intents for identical queries */
  intentCacheEnabled: boolean;

  claudeModel: string;
  /** Second provider in the fallback chain, if any */
  claudeFallbackModel?: string;
}

export const DEFAULT_FEDERATION_CONFIG: FederationConfig = {
  highConfidenceThreshold: HIGH_CONFIDENCE_THRESHOLD,
  lowConfidenceThreshold: LOW_CONFIDENCE_THRESHOLD,
  heuristicInformationScore: HEURISTIC_INFORMATION_SCORE,
  heuristicLongQueryInformationScore: HEURISTIC_LONG_QUERY_INFORMATION_SCORE,
  minAiTokens: AI_MIN_TOKENS,
  maxAiTokens: AI_MAX_TOKENS,
  maxRows: DEFAULT_MAX_ROWS,
  queryTimeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
  maxDocumentResults: DEFAULT_MAX_DOCUMENT_RESULTS,
  intentCacheEnabled: true,
  claudeModel: 'claude-sonnet-4-20250514',
};

function parseNumber(name: string, raw: string | undefined, problems: string[]): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    problems.push(`${name} must be a number (got "${raw}")`);
    return undefined;
  }
  return value;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigurationError when an environment value is malformed
 */
export function loadFederationConfig(
  overrides?: Partial<FederationConfig>,
  env: NodeJS.ProcessEnv = process.env
): FederationConfig {
  const parsed = FederationEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid federation environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const problems: string[] = [];
  const envConfig: Partial<FederationConfig> = {};

  const numeric: Array<[keyof typeof vars, keyof FederationConfig]> = [
    ['FEDERATION_HIGH_CONFIDENCE', 'highConfidenceThreshold'],
    ['FEDERATION_LOW_CONFIDENCE', 'lowConfidenceThreshold'],
    ['FEDERATION_HEURISTIC_INFO_SCORE', 'heuristicInformationScore'],
    ['FEDERATION_HEURISTIC_LONG_INFO_SCORE', 'heuristicLongQueryInformationScore'],
    ['FEDERATION_MIN_AI_TOKENS', 'minAiTokens'],
    ['FEDERATION_MAX_AI_TOKENS', 'maxAiTokens'],
    ['FEDERATION_MAX_ROWS', 'maxRows'],
    ['FEDERATION_QUERY_TIMEOUT_MS', 'queryTimeoutMs'],
    ['FEDERATION_MAX_DOCUMENT_RESULTS', 'maxDocumentResults'],
  ];

  for (const [envName, key] of numeric) {
    const value = parseNumber(envName, vars[envName], problems);
    if (value !== undefined) {
      Object.assign(envConfig, { [key]: value });
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid federation environment', problems);
  }

  if (vars.FEDERATION_INTENT_CACHE) {
    envConfig.intentCacheEnabled = vars.FEDERATION_INTENT_CACHE === 'true';
  }

  if (vars.CLAUDE_MODEL) {
    envConfig.claudeModel = vars.CLAUDE_MODEL;
  }

  if (vars.CLAUDE_FALLBACK_MODEL) {
    envConfig.claudeFallbackModel = vars.CLAUDE_FALLBACK_MODEL;
  }

  // Merge: defaults < env < overrides
  return {
    ...DEFAULT_FEDERATION_CONFIG,
    ...envConfig,
    ...overrides,
  };
}

/**
 * Validate configuration values
 */
export function validateFederationConfig(config: FederationConfig): string[] {
  const errors: string[] = [];

  if (config.lowConfidenceThreshold < 0 || config.lowConfidenceThreshold > 1) {
    errors.push('lowConfidenceThreshold must be between 0 and 1');
  }

  if (config.highConfidenceThreshold < 0 || config.highConfidenceThreshold > 1) {
    errors.push('highConfidenceThreshold must be between 0 and 1');
  }

  if (config.lowConfidenceThreshold > config.highConfidenceThreshold) {
    errors.push('lowConfidenceThreshold must not exceed highConfidenceThreshold');
  }

  if (config.heuristicInformationScore < 1 || config.heuristicInformationScore > 8) {
    errors.push('heuristicInformationScore must be between 1 and 8');
  }

  if (config.heuristicLongQueryInformationScore < config.heuristicInformationScore) {
    errors.push('heuristicLongQueryInformationScore must be at least heuristicInformationScore');
  }

  if (config.minAiTokens < 1 || config.minAiTokens > config.maxAiTokens) {
    errors.push('minAiTokens must be at least 1 and not exceed maxAiTokens');
  }

  if (!Number.isInteger(config.maxRows) || config.maxRows < 1 || config.maxRows > 10000) {
    errors.push('maxRows must be an integer between 1 and 10,000');
  }

  if (config.queryTimeoutMs < 100 || config.queryTimeoutMs > 600000) {
    errors.push('queryTimeoutMs must be between 100 and 600,000');
  }

  if (config.maxDocumentResults < 0 || config.maxDocumentResults > 100) {
    errors.push('maxDocumentResults must be between 0 and 100');
  }

  if (config.claudeModel.trim().length === 0) {
    errors.push('claudeModel must not be empty');
  }

  return errors;
}

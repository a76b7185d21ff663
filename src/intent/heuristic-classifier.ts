/**
 * Heuristic Query Classifier
 *
 * Pure, script-agnostic signals that decide most queries without an
 * AI call. Each signal adds one point to the information score:
 *
 * | Signal                  | Example                         |
 * |-------------------------|---------------------------------|
 * | question_punctuation    | "?" "¿" "؟" "？", U+037E        |
 * | unicode_digits          | "2024", "٣"                     |
 * | multiple_numeric_groups | "between 10 and 20"             |
 * | long_query              | five or more tokens             |
 * | operators_or_symbols    | ">", "=", "%", "$", "€"         |
 * | date_or_time            | "2024-03-01", "14:30"           |
 * | numeric_range_or_list   | "10-20", "1, 2, 3"              |
 * | id_like_token           | "INV2024", "#1042"              |
 */

import type { HeuristicDecision, HeuristicResult, HeuristicSignal } from '../common/types.js';
import {
  CONVERSATION_MAX_CHARS,
  CONVERSATION_MAX_TOKENS,
  HEURISTIC_INFORMATION_SCORE,
  HEURISTIC_LONG_QUERY_INFORMATION_SCORE,
  HEURISTIC_LONG_QUERY_TOKENS,
  HEURISTIC_MIN_TOKENS_SIGNAL,
} from '../common/constants.js';
import { splitWhitespace } from '../common/utils/text.js';

export interface HeuristicThresholds {
  informationScore: number;
  longQueryInformationScore: number;
}

export const DEFAULT_HEURISTIC_THRESHOLDS: HeuristicThresholds = {
  informationScore: HEURISTIC_INFORMATION_SCORE,
  longQueryInformationScore: HEURISTIC_LONG_QUERY_INFORMATION_SCORE,
};

// =============================================================================
// SIGNAL DETECTORS
// =============================================================================

// U+037E is the Greek question mark
const QUESTION_MARKS = ['?', '¿', '؟', '？', '\u037E'];

export function hasQuestionPunctuation(input: string): boolean {
  return QUESTION_MARKS.some((mark) => input.includes(mark));
}

export function hasUnicodeDigits(input: string): boolean {
  return /\p{Nd}/u.test(input);
}

export function hasMultipleNumericGroups(input: string): boolean {
  const groups = input.match(/\p{Nd}+/gu) ?? [];
  return new Set(groups).size >= 2;
}

const SYMBOLS = ['>', '<', '=', '+', '-', '*', '/', '%', '€', '$', '£', '¥', '₺', '₹'];

export function hasOperatorsOrSymbols(input: string): boolean {
  return SYMBOLS.some((symbol) => input.includes(symbol));
}

export function hasDateOrTimePattern(input: string): boolean {
  return (
    /\b\d{4}[-/.]\d{1,2}[-/.]\d{1,2}\b/.test(input) ||
    /\b\d{1,2}[-/.]\d{1,2}[-/.]\d{4}\b/.test(input) ||
    /\b\d{1,2}:\d{2}(:\d{2})?\b/.test(input)
  );
}

export function hasNumericRangeOrList(input: string): boolean {
  return /\b\d+\s*[-–—]\s*\d+\b/.test(input) || /\b\d+\s*,\s*\d+(\s*,\s*\d+)+\b/.test(input);
}

/**
 * Tokens mixing letters and digits ("INV2024", "A-17") or "#" + digits
 */
export function hasIdLikeToken(tokens: string[]): boolean {
  return tokens.some((raw) => {
    const token = raw.replace(/^[^\p{L}\p{Nd}#]+|[^\p{L}\p{Nd}]+$/gu, '');
    if (/^#\p{Nd}+$/u.test(token)) return true;
    return /^[\p{L}\p{Nd}_-]+$/u.test(token) && /\p{L}/u.test(token) && /\p{Nd}/u.test(token);
  });
}

// =============================================================================
// SCORING
// =============================================================================

/** Signals that keep a short query out of the conversation shortcut */
const NUMERIC_OR_ID_SIGNALS = new Set<HeuristicSignal>([
  'unicode_digits',
  'multiple_numeric_groups',
  'operators_or_symbols',
  'date_or_time',
  'numeric_range_or_list',
  'id_like_token',
]);

/**
 * Score a trimmed query; no I/O, same input gives the same result
 */
export function scoreQuery(
  query: string,
  thresholds: HeuristicThresholds = DEFAULT_HEURISTIC_THRESHOLDS
): HeuristicResult {
  const trimmed = query.trim();
  const tokens = splitWhitespace(trimmed);
  const signals: HeuristicSignal[] = [];

  const questionPunctuation = hasQuestionPunctuation(trimmed);
  if (questionPunctuation) signals.push('question_punctuation');
  if (hasUnicodeDigits(trimmed)) signals.push('unicode_digits');
  if (hasMultipleNumericGroups(trimmed)) signals.push('multiple_numeric_groups');
  if (tokens.length >= HEURISTIC_MIN_TOKENS_SIGNAL) signals.push('long_query');
  if (hasOperatorsOrSymbols(trimmed)) signals.push('operators_or_symbols');
  if (hasDateOrTimePattern(trimmed)) signals.push('date_or_time');
  if (hasNumericRangeOrList(trimmed)) signals.push('numeric_range_or_list');
  if (hasIdLikeToken(tokens)) signals.push('id_like_token');

  const score = signals.length;

  const bar =
    tokens.length >= HEURISTIC_LONG_QUERY_TOKENS && questionPunctuation
      ? thresholds.longQueryInformationScore
      : thresholds.informationScore;

  let decision: HeuristicDecision = 'unknown';

  if (score >= bar) {
    decision = 'information';
  } else if (
    tokens.length <= CONVERSATION_MAX_TOKENS &&
    trimmed.length <= CONVERSATION_MAX_CHARS &&
    !signals.some((s) => NUMERIC_OR_ID_SIGNALS.has(s))
  ) {
    decision = 'conversation';
  }

  return { decision, score, signals, tokenCount: tokens.length };
}

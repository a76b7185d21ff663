/**
 * Lenient JSON parser for generative output
 *
 * Model replies are untrusted: they may wrap JSON in markdown fences,
 * prefix it with prose, leave trailing commas, or not be JSON at all.
 * parseStructured never trusts shape without a zod schema and never
 * throws; the caller switches on the tagged outcome.
 *
 * Candidates, tried in order until one parses and fits the schema:
 *   1. the reply as is
 *   2. the first {...} after code fences are removed
 *   3. that object with raw line breaks in strings escaped
 *   4. that object without trailing commas or control characters
 */

import type { z } from 'zod';

export type ParseOutcome<T> =
  | { kind: 'structured'; value: T; raw: string }
  | { kind: 'plain_text'; text: string; reason: string; raw: string }
  | { kind: 'failed'; reason: string; raw: string };

export interface ObjectSpan {
  /** Index of the opening brace */
  start: number;
  /** Index of the closing brace */
  end: number;
  /** The object text with raw line breaks and tabs inside strings escaped */
  repaired: string;
}

const STRING_ESCAPES = new Map([
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
]);

/**
 * Walk the first top-level {...} in the text
 *
 * Braces inside string literals do not count. Returns null when no
 * object opens or the first one never closes.
 */
export function scanObject(text: string): ObjectSpan | null {
  const start = text.indexOf('{');
  if (start < 0) return null;

  const out: string[] = [];
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (ch === '\\') {
        out.push(ch, text[i + 1] ?? '');
        i++;
        continue;
      }
      if (ch === '"') inString = false;
      out.push(STRING_ESCAPES.get(ch) ?? ch);
      continue;
    }

    out.push(ch);
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return { start, end: i, repaired: out.join('') };
    }
  }

  return null;
}

/**
 * Remove ```json / ``` fences, keeping their content
 */
export function stripCodeFences(text: string): string {
  return text
    .replace(/```[a-zA-Z]*\s*/g, '')
    .replace(/```/g, '')
    .trim();
}

function jsonCandidates(text: string): string[] {
  const candidates = [text.trim()];

  const unfenced = stripCodeFences(text);
  const span = scanObject(unfenced);
  if (span) {
    candidates.push(
      unfenced.substring(span.start, span.end + 1),
      span.repaired,
      span.repaired.replace(/,\s*([}\]])/g, '$1').replace(/[\x00-\x1F]/g, ' ')
    );
  }

  return [...new Set(candidates)];
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse loosely formatted JSON into an untyped value, or undefined
 */
export function parseLooseJson(text: string): unknown {
  for (const candidate of jsonCandidates(text)) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }
  return undefined;
}

/**
 * Parse generative output against a schema
 *
 * - structured: JSON found and it satisfies the schema
 * - plain_text: non-empty text that is not (valid) JSON; callers may scan it
 * - failed: nothing to work with
 */
export function parseStructured<S extends z.ZodTypeAny>(
  text: string | null | undefined,
  schema: S
): ParseOutcome<z.infer<S>> {
  const raw = text ?? '';

  if (raw.trim().length === 0) {
    return { kind: 'failed', reason: 'Empty response', raw };
  }

  let mismatch: string | undefined;
  for (const candidate of jsonCandidates(raw)) {
    const parsed = tryParse(candidate);
    if (!parsed.ok) continue;

    const validated = schema.safeParse(parsed.value);
    if (validated.success) {
      return { kind: 'structured', value: validated.data, raw };
    }
    if (mismatch === undefined) {
      mismatch = validated.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
    }
  }

  const reason = mismatch !== undefined ? `Schema mismatch: ${mismatch}` : 'No JSON object found';
  return { kind: 'plain_text', text: raw.trim(), reason, raw };
}

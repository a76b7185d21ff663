/**
 * Text helpers shared by the classifier, analyzer and prompt builder
 */

/** Whitespace tokenization, the same split the heuristics count on */
export function splitWhitespace(input: string): string[] {
  return input.split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Words made of letters and digits in any script, lowercased
 */
export function wordTokens(input: string): string[] {
  const matches = input.toLowerCase().match(/[\p{L}\p{N}_]+/gu);
  return matches ?? [];
}

/**
 * Ordered, unique, lowercase tokens
 * Single characters are dropped unless they are digits.
 */
export function normalizeTokens(tokens: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const token of tokens) {
    for (const word of wordTokens(token)) {
      if (word.length < 2 && !/^\p{Nd}$/u.test(word)) continue;
      if (seen.has(word)) continue;
      seen.add(word);
      result.push(word);
    }
  }

  return result;
}

/** Search tokens straight from the query text */
export function extractQueryTokens(query: string): string[] {
  return normalizeTokens([query]);
}

// Function words and request verbs that never name a schema element
const FILLER_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does',
  'find', 'for', 'from', 'get', 'give', 'how', 'in', 'is', 'list', 'many',
  'me', 'much', 'of', 'on', 'or', 'show', 'tell', 'the', 'to', 'top',
  'what', 'when', 'where', 'which', 'who', 'with',
]);

export function isFillerWord(token: string): boolean {
  return FILLER_WORDS.has(token.toLowerCase());
}

/** Tokens worth matching against schema vocabulary */
export function contentTokens(tokens: string[]): string[] {
  return tokens.filter((t) => !isFillerWord(t) && !/^\p{N}+$/u.test(t));
}

/**
 * Break an identifier into lowercase fragments
 *   "OrderDetails" -> ["order", "details"]
 *   "customer_id"  -> ["customer", "id"]
 */
export function identifierFragments(identifier: string): string[] {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9\p{L}]+/u)
    .filter((f) => f.length > 0);
}

/**
 * Crude singular form for English plural tokens ("customers" -> "customer")
 */
export function singularize(word: string): string {
  if (word.length > 4 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith('ses')) return word.slice(0, -2);
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

/**
 * Whether a user token refers to an identifier fragment
 */
export function tokenMatchesFragment(token: string, fragment: string): boolean {
  if (token === fragment) return true;
  const singular = singularize(token);
  return singular === fragment || singular === singularize(fragment);
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Jest Unit Tests for text helpers
 */

import {
  collapseWhitespace,
  contentTokens,
  identifierFragments,
  normalizeTokens,
  singularize,
  splitWhitespace,
  tokenMatchesFragment,
  truncate,
  wordTokens,
} from '../text.js';

describe('tokenizing', () => {
  test('whitespace split drops empty pieces', () => {
    expect(splitWhitespace('  a  b\tc ')).toEqual(['a', 'b', 'c']);
  });

  test('word tokens keep letters of any script', () => {
    expect(wordTokens('Ürün-Satış 2024!')).toEqual(['ürün', 'satış', '2024']);
  });

  test('normalized tokens are unique and skip single letters', () => {
    expect(normalizeTokens(['Customers, orders', 'customers a 5'])).toEqual(['customers', 'orders', '5']);
  });

  test('content tokens drop filler words and bare numbers', () => {
    expect(contentTokens(['show', 'top', '5', 'customers', 'by', 'order'])).toEqual(['customers', 'order']);
  });
});

describe('identifiers', () => {
  test.each([
    ['OrderDetails', ['order', 'details']],
    ['customer_id', ['customer', 'id']],
    ['HTTPStatusCode', ['http', 'status', 'code']],
    ['orders', ['orders']],
  ])('%s splits into fragments', (identifier, fragments) => {
    expect(identifierFragments(identifier)).toEqual(fragments);
  });

  test.each([
    ['categories', 'category'],
    ['addresses', 'address'],
    ['orders', 'order'],
    ['class', 'class'],
    ['bus', 'bus'],
  ])('%s singularizes to %s', (word, singular) => {
    expect(singularize(word)).toBe(singular);
  });

  test.each([
    ['customers', 'customer', true],
    ['order', 'orders', true],
    ['city', 'cities', true],
    ['name', 'id', false],
  ])('%s against fragment %s: %s', (token, fragment, expected) => {
    expect(tokenMatchesFragment(token, fragment)).toBe(expected);
  });
});

describe('formatting', () => {
  test('truncate appends an ellipsis only when cutting', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });

  test('whitespace runs collapse to one space', () => {
    expect(collapseWhitespace(' a \n\t b ')).toBe('a b');
  });
});

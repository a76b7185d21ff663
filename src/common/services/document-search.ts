/**
 * Keyword Document Search
 *
 * Lexical stand-in for a vector-backed document search: chunks are
 * scored by the share of query content tokens they contain. Anything
 * implementing DocumentSearcher (embeddings, a vector index) can take
 * its place in the pipeline.
 */

import { readFileSync } from 'fs';
import type { DocumentChunk, DocumentSearcher } from '../types.js';
import { DocumentChunkFileSchema } from '../schemas/index.js';
import { PipelineCancelledError } from '../errors.js';
import { contentTokens, extractQueryTokens, singularize, wordTokens } from '../utils/text.js';

export type StoredChunk = Omit<DocumentChunk, 'relevance'>;

interface IndexedChunk {
  chunk: StoredChunk;
  terms: Set<string>;
}

export class KeywordDocumentSearcher implements DocumentSearcher {
  private readonly index: IndexedChunk[];

  constructor(chunks: StoredChunk[]) {
    this.index = chunks.map((chunk) => ({
      chunk,
      terms: new Set(wordTokens(`${chunk.documentName} ${chunk.content}`).map(singularize)),
    }));
  }

  /**
   * Load chunks from a JSON file: [{documentId, documentName, content, chunkIndex?}]
   */
  static fromFile(path: string): KeywordDocumentSearcher {
    const parsed = DocumentChunkFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
    return new KeywordDocumentSearcher(parsed);
  }

  get size(): number {
    return this.index.length;
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<DocumentChunk[]> {
    if (signal?.aborted) {
      throw new PipelineCancelledError('document search');
    }

    const terms = [...new Set(contentTokens(extractQueryTokens(query)).map(singularize))];
    if (terms.length === 0 || maxResults <= 0) return [];

    const scored: DocumentChunk[] = [];
    for (const { chunk, terms: chunkTerms } of this.index) {
      const matched = terms.filter((t) => chunkTerms.has(t)).length;
      if (matched === 0) continue;
      scored.push({
        ...chunk,
        relevance: Math.round((matched / terms.length) * 1000) / 1000,
      });
    }

    return scored
      .sort(
        (a, b) =>
          b.relevance - a.relevance ||
          a.documentName.localeCompare(b.documentName) ||
          (a.chunkIndex ?? 0) - (b.chunkIndex ?? 0)
      )
      .slice(0, maxResults);
  }
}

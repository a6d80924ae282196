/**
 * Lexical Index Service
 * In-memory Okapi BM25 index over chunk texts. A rebuild prepares a complete
 * snapshot and swaps it in with one assignment, so a search running during
 * a rebuild sees either the old or the new index, never a mix.
 */

import { Injectable, Logger } from '@nestjs/common';
import { IndexNotReadyError, InvalidArgumentError } from '../errors';
import { assertResultCount } from '../utils/validation';
import type { LexicalDocument, LexicalHit } from '../types';

export const BM25_K1 = 1.5;
export const BM25_B = 0.75;

interface IndexedDocument {
  readonly source: LexicalDocument;
  readonly termFrequency: ReadonlyMap<string, number>;
  readonly length: number;
}

interface IndexSnapshot {
  readonly documents: readonly IndexedDocument[];
  readonly documentFrequency: ReadonlyMap<string, number>;
  readonly averageLength: number;
  readonly builtAt: Date;
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Lowercased whitespace tokens with leading and trailing punctuation
 * stripped, so clause numbers like "6.4.2" stay whole. Single characters
 * are dropped.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.replace(EDGE_PUNCTUATION, ''))
    .filter((token) => token.length > 1);
}

/** BM25 inverse document frequency, always positive */
export function bm25Idf(documentCount: number, documentFrequency: number): number {
  return Math.log(
    (documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5) + 1,
  );
}

@Injectable()
export class LexicalIndexService {
  private readonly logger = new Logger(LexicalIndexService.name);
  private snapshot: IndexSnapshot | null = null;

  get isIndexed(): boolean {
    return this.snapshot !== null;
  }

  get documentCount(): number {
    return this.snapshot?.documents.length ?? 0;
  }

  get builtAt(): Date | null {
    return this.snapshot?.builtAt ?? null;
  }

  /**
   * Replace the index with one built from `documents`
   * @throws InvalidArgumentError for an empty list or a document without id
   */
  buildIndex(documents: readonly LexicalDocument[]): void {
    if (documents.length === 0) {
      throw new InvalidArgumentError('Cannot build a lexical index from no documents');
    }

    const startTime = Date.now();
    const documentFrequency = new Map<string, number>();
    const indexed = documents.map((document, position): IndexedDocument => {
      if (!document.id) {
        throw new InvalidArgumentError(`Document at position ${position} has no id`);
      }
      const tokens = tokenize(document.content);
      const termFrequency = new Map<string, number>();
      for (const token of tokens) {
        termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1);
      }
      for (const term of termFrequency.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
      return { source: document, termFrequency, length: tokens.length };
    });

    const totalLength = indexed.reduce((sum, doc) => sum + doc.length, 0);

    this.snapshot = {
      documents: indexed,
      documentFrequency,
      averageLength: totalLength / indexed.length,
      builtAt: new Date(),
    };

    this.logger.log(
      `[LexicalIndex] status=built documents=${indexed.length} terms=${documentFrequency.size} durationMs=${Date.now() - startTime}`,
    );
  }

  /**
   * Top documents by BM25 score, best first. Documents that share no term
   * with the query are not returned.
   */
  search(query: string, nResults: number = 10): LexicalHit[] {
    const snapshot = this.snapshot;
    if (!snapshot) {
      throw new IndexNotReadyError();
    }
    assertResultCount(nResults);

    const queryTerms = Array.from(new Set(tokenize(query)));
    if (queryTerms.length === 0 || nResults === 0) {
      return [];
    }

    const documentCount = snapshot.documents.length;
    const idf = new Map(
      queryTerms.map((term) => [
        term,
        bm25Idf(documentCount, snapshot.documentFrequency.get(term) ?? 0),
      ]),
    );

    const hits: LexicalHit[] = [];
    for (const document of snapshot.documents) {
      const lengthRatio =
        snapshot.averageLength > 0
          ? document.length / snapshot.averageLength
          : 1;
      let score = 0;
      for (const term of queryTerms) {
        const tf = document.termFrequency.get(term) ?? 0;
        if (tf === 0) {
          continue;
        }
        score +=
          ((idf.get(term) ?? 0) * tf * (BM25_K1 + 1)) /
          (tf + BM25_K1 * (1 - BM25_B + BM25_B * lengthRatio));
      }
      if (score > 0) {
        hits.push({
          id: document.source.id,
          content: document.source.content,
          score,
          metadata: { ...document.source.metadata },
        });
      }
    }

    return hits.sort((a, b) => b.score - a.score).slice(0, nResults);
  }
}

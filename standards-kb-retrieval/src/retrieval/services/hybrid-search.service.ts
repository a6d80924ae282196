/**
 * Hybrid Search Service
 * Semantic and BM25 retrieval fused with Reciprocal Rank Fusion. Until the
 * lexical index is built, results are the semantic results unchanged.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { LexicalIndexService } from './lexical-index.service';
import { lexicalHitToSearchResult } from './search-result.mapper';
import { reciprocalRankFusion, RRF_K } from '../fusion/reciprocal-rank-fusion';
import { CollaboratorFailureError, RetrievalError } from '../errors';
import { assertResultCount } from '../utils/validation';
import {
  SEMANTIC_SEARCHER,
  type SearchFilters,
  type SearchResult,
  type SemanticSearcher,
} from '../types';

/** Each side retrieves this many candidates per requested result */
export const CANDIDATE_MULTIPLIER = 2;

@Injectable()
export class HybridSearchService {
  private readonly logger = new Logger(HybridSearchService.name);

  constructor(
    @Inject(SEMANTIC_SEARCHER)
    private readonly semanticSearcher: SemanticSearcher,
    private readonly lexicalIndex: LexicalIndexService,
  ) {}

  /**
   * @param filters - exact-match payload filters, applied to the semantic side only
   * @throws InvalidArgumentError when nResults is negative or not an integer
   * @throws CollaboratorFailureError when semantic retrieval fails
   */
  async search(
    query: string,
    nResults: number = 10,
    filters?: SearchFilters,
  ): Promise<SearchResult[]> {
    assertResultCount(nResults);
    if (!query.trim() || nResults === 0) {
      return [];
    }

    const startTime = Date.now();

    if (!this.lexicalIndex.isIndexed) {
      this.logger.warn(
        '[Hybrid] stage=lexical status=not_indexed fallback=semantic_only',
      );
      const semanticResults = await this.semanticSearch(query, nResults, filters);
      return semanticResults.slice(0, nResults);
    }

    const candidates = nResults * CANDIDATE_MULTIPLIER;
    const [semanticResults, lexicalResults] = await Promise.all([
      this.semanticSearch(query, candidates, filters),
      this.lexicalSearch(query, candidates),
    ]);

    const fused = reciprocalRankFusion([semanticResults, lexicalResults], RRF_K)
      .slice(0, nResults)
      .map(({ rrfScore, ...result }) => ({ ...result, score: rrfScore }));

    this.logger.log(
      `[Hybrid] stage=fusion status=completed semantic=${semanticResults.length} lexical=${lexicalResults.length} ` +
        `fused=${fused.length} durationMs=${Date.now() - startTime}`,
    );

    return fused;
  }

  private async semanticSearch(
    query: string,
    nResults: number,
    filters?: SearchFilters,
  ): Promise<SearchResult[]> {
    try {
      return await this.semanticSearcher.search(query, nResults, filters);
    } catch (error) {
      if (error instanceof RetrievalError) {
        throw error;
      }
      this.logger.error(
        `[Hybrid] stage=semantic status=failed error=${error instanceof Error ? error.message : String(error)}`,
      );
      throw new CollaboratorFailureError(
        'semantic search',
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  private async lexicalSearch(
    query: string,
    nResults: number,
  ): Promise<SearchResult[]> {
    return this.lexicalIndex
      .search(query, nResults)
      .map((hit) => lexicalHitToSearchResult(hit));
  }
}

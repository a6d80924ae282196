/**
 * Qdrant Semantic Search Service
 * Dense-vector retrieval over the enriched chunks stored in Qdrant
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { payloadToSearchResult } from './search-result.mapper';
import type { SearchFilters, SearchResult, SemanticSearcher } from '../types';

export interface QdrantMatchFilter {
  must: Array<{ key: string; match: { value: string | number | boolean } }>;
}

/**
 * Exact-match filters as a Qdrant `must` clause; no filters, no clause
 */
export function buildQdrantFilter(
  filters?: SearchFilters,
): QdrantMatchFilter | undefined {
  const entries = Object.entries(filters ?? {});
  if (entries.length === 0) {
    return undefined;
  }
  return {
    must: entries.map(([key, value]) => ({ key, match: { value } })),
  };
}

@Injectable()
export class QdrantSemanticSearchService implements SemanticSearcher {
  private readonly logger = new Logger(QdrantSemanticSearchService.name);
  private readonly client: QdrantClient;
  private readonly collectionName: string;
  private readonly embeddings: Embeddings;

  constructor(
    configService: ConfigService,
    embeddingProviderFactory: EmbeddingProviderFactory,
  ) {
    const url = configService.get<string>('QDRANT_URL', 'http://localhost:6333');
    const apiKey = configService.get<string>('QDRANT_API_KEY');

    this.client = new QdrantClient({ url, ...(apiKey ? { apiKey } : {}) });
    this.collectionName = configService.get<string>(
      'QDRANT_COLLECTION',
      'standards_chunks',
    );
    this.embeddings = embeddingProviderFactory.createEmbeddingModel();

    this.logger.log(
      `QdrantClient initialized: ${url} collection=${this.collectionName}`,
    );
  }

  async search(
    query: string,
    nResults: number,
    filters?: SearchFilters,
  ): Promise<SearchResult[]> {
    if (nResults === 0 || !query.trim()) {
      return [];
    }

    const vector = await this.embeddings.embedQuery(query);
    const filter = buildQdrantFilter(filters);

    const points = await this.client.search(this.collectionName, {
      vector,
      limit: nResults,
      with_payload: true,
      ...(filter && { filter }),
    });

    this.logger.debug(
      `[Semantic] collection=${this.collectionName} results=${points.length} hasFilter=${!!filter}`,
    );

    return points.map((point) =>
      payloadToSearchResult(String(point.id), point.score, point.payload ?? {}),
    );
  }

  /**
   * Health check for Qdrant service
   * @returns true if service is available, false otherwise
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(
        `Qdrant health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}

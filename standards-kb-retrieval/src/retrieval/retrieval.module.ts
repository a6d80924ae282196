/**
 * Retrieval Module
 * Hybrid search, lexical index and coverage assessment
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { QdrantSemanticSearchService } from './services/qdrant-semantic-search.service';
import { LexicalIndexService } from './services/lexical-index.service';
import { HybridSearchService } from './services/hybrid-search.service';
import { CoverageAssessorService } from './services/coverage-assessor.service';
import { RetrievalTcpController } from './retrieval-tcp.controller';
import { SEMANTIC_SEARCHER } from './types';

@Module({
  imports: [ConfigModule],
  providers: [
    EmbeddingProviderFactory,
    QdrantSemanticSearchService,
    {
      provide: SEMANTIC_SEARCHER,
      useExisting: QdrantSemanticSearchService,
    },
    LexicalIndexService,
    HybridSearchService,
    CoverageAssessorService,
  ],
  controllers: [RetrievalTcpController],
  exports: [HybridSearchService, LexicalIndexService, CoverageAssessorService],
})
export class RetrievalModule {}

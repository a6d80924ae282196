/**
 * Enrich Stage - Main Orchestrator
 * Adds identity, normative classification and keywords to chunks
 */

import { Injectable, Logger } from '@nestjs/common';
import { EnrichInputDto, EnrichOutputDto } from './dto';
import type { EnrichedChunk, EnrichmentStatistics } from './types';
import {
  MetadataEnricherService,
  KeywordExtractorService,
  NormativeClassifierService,
  toNormativeFlag,
} from './services';

@Injectable()
export class EnrichStage {
  private readonly logger = new Logger(EnrichStage.name);

  constructor(
    private readonly metadataEnricher: MetadataEnricherService,
    private readonly keywordExtractor: KeywordExtractorService,
    private readonly normativeClassifier: NormativeClassifierService,
  ) {}

  execute(input: EnrichInputDto): EnrichOutputDto {
    const startTime = Date.now();
    const { document, chunks } = input;

    // TF-IDF needs the whole document as its corpus
    const keywords = this.keywordExtractor.extractKeywords(
      chunks.map((chunk) => chunk.content),
    );

    const enrichedChunks = chunks.map((chunk, chunkIndex) => {
      const identity = this.metadataEnricher.buildIdentity(chunk, document);
      const indicator = this.normativeClassifier.classify(
        chunk.content,
        identity.sectionPath,
      );

      const enriched: EnrichedChunk = {
        ...chunk,
        ...identity,
        normative: toNormativeFlag(indicator),
        keywords: keywords[chunkIndex] ?? [],
        chunkIndex,
      };
      return enriched;
    });

    const statistics = this.calculateStatistics(enrichedChunks);
    const durationMs = Date.now() - startTime;

    this.logger.log(
      `[Enrich] document=${document.documentId} chunks=${enrichedChunks.length} ` +
        `normative=${statistics.normativeChunks} informative=${statistics.informativeChunks} ` +
        `unknown=${statistics.unknownChunks} durationMs=${durationMs}`,
    );

    return {
      enrichedChunks,
      enrichmentMetadata: {
        totalChunks: enrichedChunks.length,
        durationMs,
        statistics,
      },
    };
  }

  private calculateStatistics(
    chunks: readonly EnrichedChunk[],
  ): EnrichmentStatistics {
    const totalKeywords = chunks.reduce(
      (sum, chunk) => sum + chunk.keywords.length,
      0,
    );
    return {
      totalChunks: chunks.length,
      normativeChunks: chunks.filter((chunk) => chunk.normative === true).length,
      informativeChunks: chunks.filter((chunk) => chunk.normative === false)
        .length,
      unknownChunks: chunks.filter((chunk) => chunk.normative === null).length,
      averageKeywordsPerChunk:
        chunks.length > 0
          ? Math.round((totalKeywords / chunks.length) * 10) / 10
          : 0,
    };
  }
}

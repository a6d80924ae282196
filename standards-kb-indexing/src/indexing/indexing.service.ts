import { Injectable, Logger } from '@nestjs/common';
import { ChunkStage } from './stages/chunk/chunk.stage';
import { EnrichStage } from './stages/enrich/enrich.stage';
import type { DocumentMetadata, RawParsedElement } from './stages/chunk/types';
import type { ChunkDocumentResult } from './types';

/**
 * Runs a parsed document through the chunk and enrich stages
 */
@Injectable()
export class IndexingService {
  private readonly logger = new Logger(IndexingService.name);

  constructor(
    private readonly chunkStage: ChunkStage,
    private readonly enrichStage: EnrichStage,
  ) {}

  async chunkDocument(
    document: DocumentMetadata,
    elements: readonly RawParsedElement[],
  ): Promise<ChunkDocumentResult> {
    const chunkOutput = await this.chunkStage.execute({ document, elements });
    const enrichOutput = this.enrichStage.execute({
      document,
      chunks: chunkOutput.chunks,
    });

    this.logger.log(
      `[Indexing] document=${document.documentId} status=chunked chunks=${enrichOutput.enrichedChunks.length}`,
    );

    return {
      chunks: enrichOutput.enrichedChunks,
      skippedElements: chunkOutput.chunkMetadata.skippedElements,
      chunkStatistics: chunkOutput.chunkMetadata.statistics,
      enrichmentStatistics: enrichOutput.enrichmentMetadata.statistics,
      errors: chunkOutput.errors,
    };
  }
}

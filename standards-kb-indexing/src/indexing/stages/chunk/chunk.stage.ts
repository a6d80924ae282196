import { Injectable, Logger } from '@nestjs/common';
import { ChunkInputDto, ChunkOutputDto } from './dto';
import { HierarchicalChunkerService } from './services';

/**
 * Chunk Stage - Main Orchestrator
 * Splits a parsed document into structural chunks
 */
@Injectable()
export class ChunkStage {
  private readonly logger = new Logger(ChunkStage.name);

  constructor(private readonly chunker: HierarchicalChunkerService) {}

  async execute(input: ChunkInputDto): Promise<ChunkOutputDto> {
    const startTime = Date.now();
    this.logger.log(
      `Starting chunk stage for document ${input.document.documentId} with ${input.elements.length} elements`,
    );

    const report = await this.chunker.chunkWithReport(
      input.elements,
      input.document,
    );

    if (report.skippedElements.length > 0) {
      this.logger.warn(
        `${report.skippedElements.length} elements skipped for document ${input.document.documentId}`,
      );
    }

    if (report.statistics.undersizedChunks > 0) {
      this.logger.debug(
        `${report.statistics.undersizedChunks} text chunks below minimum size (section tails)`,
      );
    }

    const processingTime = Date.now() - startTime;
    this.logger.log(
      `Chunk stage completed in ${processingTime}ms: ${report.chunks.length} chunks`,
    );

    return {
      chunks: report.chunks,
      chunkMetadata: {
        processingTime,
        skippedElements: report.skippedElements,
        statistics: report.statistics,
      },
      errors: report.skippedElements.map((skipped) => skipped.reason),
    };
  }
}

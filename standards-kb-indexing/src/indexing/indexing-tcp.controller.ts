import { Controller, Logger, UsePipes } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { IndexingService } from './indexing.service';
import { ChunkDocumentRequestDto } from './dto';
import type { ChunkDocumentResult } from './types';
import { createRpcValidationPipe } from '../shared/validation/rpc-validation.pipe';

type ChunkDocumentResponse =
  | ({ success: true } & ChunkDocumentResult)
  | { success: false; error: string };

@Controller()
@UsePipes(createRpcValidationPipe())
export class IndexingTcpController {
  private readonly logger = new Logger(IndexingTcpController.name);

  constructor(private readonly indexingService: IndexingService) {}

  /**
   * TCP endpoint: chunk_document
   *
   * Input: { document: { documentId, documentTitle, documentType }, elements }
   * Output: { success, chunks, skippedElements, chunkStatistics, enrichmentStatistics, errors } | { success: false, error }
   */
  @MessagePattern({ cmd: 'chunk_document' })
  async chunkDocument(
    @Payload() payload: ChunkDocumentRequestDto,
  ): Promise<ChunkDocumentResponse> {
    try {
      this.logger.log(
        `TCP chunk_document request for document ${payload.document.documentId} (${payload.elements.length} elements)`,
      );

      const result = await this.indexingService.chunkDocument(
        payload.document,
        payload.elements,
      );

      return { success: true, ...result };
    } catch (error: unknown) {
      this.logger.error(
        `TCP chunk_document failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );

      return {
        success: false,
        error:
          error instanceof Error ? error.message : 'Unknown error occurred',
      };
    }
  }
}

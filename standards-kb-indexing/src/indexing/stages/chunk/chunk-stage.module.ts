import { Module } from '@nestjs/common';
import { ChunkStage } from './chunk.stage';
import {
  TOKENIZER,
  TokenCounterService,
  HierarchicalChunkerService,
} from './services';

/**
 * Chunk Stage Module
 * Provides chunking services for the indexing pipeline
 */
@Module({
  providers: [
    ChunkStage,
    TokenCounterService,
    { provide: TOKENIZER, useExisting: TokenCounterService },
    HierarchicalChunkerService,
  ],
  exports: [ChunkStage, TokenCounterService],
})
export class ChunkStageModule {}

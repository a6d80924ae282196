import { Module } from '@nestjs/common';
import { EnrichStage } from './enrich.stage';
import {
  MetadataEnricherService,
  KeywordExtractorService,
  NormativeClassifierService,
} from './services';

/**
 * Enrich Stage Module
 */
@Module({
  providers: [
    EnrichStage,
    MetadataEnricherService,
    KeywordExtractorService,
    NormativeClassifierService,
  ],
  exports: [EnrichStage, NormativeClassifierService],
})
export class EnrichStageModule {}

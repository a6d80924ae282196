import type { ChunkStatistics, SkippedElement } from './stages/chunk/types';
import type {
  EnrichedChunk,
  EnrichmentStatistics,
} from './stages/enrich/types';

export interface ChunkDocumentResult {
  chunks: EnrichedChunk[];
  skippedElements: SkippedElement[];
  chunkStatistics: ChunkStatistics;
  enrichmentStatistics: EnrichmentStatistics;
  errors: string[];
}

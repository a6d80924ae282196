/**
 * Enrich Stage Output DTO
 */

import type { EnrichedChunk, EnrichmentStatistics } from '../types';

export interface EnrichOutputDto {
  enrichedChunks: EnrichedChunk[];
  enrichmentMetadata: {
    totalChunks: number;
    durationMs: number;
    statistics: EnrichmentStatistics;
  };
}

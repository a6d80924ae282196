import type { ChunkResult, ChunkStatistics, SkippedElement } from '../types';

/**
 * Output DTO for Chunk Stage
 */
export interface ChunkOutputDto {
  chunks: ChunkResult[];
  chunkMetadata: ChunkOutputMetadata;
  /** Non-fatal problems, one line per skipped element */
  errors: string[];
}

export interface ChunkOutputMetadata {
  processingTime: number;
  skippedElements: SkippedElement[];
  statistics: ChunkStatistics;
}

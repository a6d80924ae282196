/**
 * Enrich Stage Input DTO
 * Receives data from Chunk Stage
 */

import type { ChunkResult, DocumentMetadata } from '../../chunk/types';

export interface EnrichInputDto {
  document: DocumentMetadata;
  chunks: readonly ChunkResult[];
}

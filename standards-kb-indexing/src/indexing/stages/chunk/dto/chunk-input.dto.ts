import type { DocumentMetadata, RawParsedElement } from '../types';

/**
 * Input DTO for Chunk Stage
 * Parsed elements of one document, in reading order
 */
export interface ChunkInputDto {
  document: DocumentMetadata;
  elements: readonly RawParsedElement[];
}

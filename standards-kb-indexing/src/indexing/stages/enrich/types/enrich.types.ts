/**
 * Enrich Stage Types
 */

import type { ChunkResult, ChunkStatistics } from '../../chunk/types';

/**
 * Whether a passage states a requirement or is explanatory material
 */
export type NormativeIndicator = 'normative' | 'informative' | 'unknown';

/**
 * Chunk ready for embedding and storage. Enrichment adds sibling fields and
 * leaves the chunker's fields untouched.
 */
export interface EnrichedChunk extends ChunkResult {
  readonly id: string;
  /** SHA-256 of the normalized content, for deduplication across re-ingests */
  readonly contentHash: string;
  readonly documentId: string;
  readonly documentTitle: string;
  readonly documentType: string;
  readonly sectionTitle: string;
  /** " > "-joined section hierarchy */
  readonly sectionPath: string;
  /** true = normative, false = informative, null = undetermined */
  readonly normative: boolean | null;
  readonly keywords: readonly string[];
  readonly chunkIndex: number;
}

export interface EnrichmentStatistics {
  totalChunks: number;
  normativeChunks: number;
  informativeChunks: number;
  unknownChunks: number;
  averageKeywordsPerChunk: number;
}

export interface ChunkedDocument {
  chunks: ChunkResult[];
  statistics: ChunkStatistics;
}

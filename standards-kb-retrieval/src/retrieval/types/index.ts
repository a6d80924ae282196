/**
 * Retrieval Service Types
 */

/**
 * Citation fields of an indexed chunk, mirrored from its stored payload
 */
export interface ChunkCitation {
  documentId: string;
  documentTitle: string;
  documentType: string;
  sectionTitle: string;
  sectionHierarchy: string[];
  clauseNumber: string | null;
  pageNumbers: number[];
  /** true = normative, false = informative, null = undetermined */
  normative: boolean | null;
  chunkType: string;
}

/**
 * One ranked hit. `score` is the score of the stage that produced the list
 * (similarity, BM25 or RRF) and is replaced, not accumulated, between stages.
 */
export interface SearchResult extends ChunkCitation {
  id: string;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

/** Exact-match conditions on stored payload fields */
export type SearchFilters = Record<string, string | number | boolean>;

/**
 * Semantic (dense vector) retrieval collaborator
 */
export interface SemanticSearcher {
  search(
    query: string,
    nResults: number,
    filters?: SearchFilters,
  ): Promise<SearchResult[]>;
  healthCheck?(): Promise<boolean>;
}

export const SEMANTIC_SEARCHER = Symbol('SEMANTIC_SEARCHER');

/**
 * Document accepted by the lexical index
 */
export interface LexicalDocument {
  id: string;
  content: string;
  /** Citation fields and extra metadata returned with hits */
  metadata?: Record<string, unknown>;
}

export interface LexicalHit {
  id: string;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export type GapPriority = 'high' | 'medium' | 'low';

export type OverallPriority = GapPriority | 'sufficient';

export interface CoverageGap {
  area: string;
  priority: GapPriority;
  /** How sure we are that this is a real gap, in [0, 1] */
  confidence: number;
  reason: string;
  maxSimilarity: number;
  resultCount: number;
  suggestedQuery: string | null;
}

export interface CoveredArea {
  area: string;
  chunkCount: number;
  avgSimilarity: number;
  bestMatchTitle: string | null;
}

export interface CoverageReport {
  gaps: CoverageGap[];
  covered: CoveredArea[];
  totalAreas: number;
  coverageRatio: number;
  overallPriority: OverallPriority;
}

export interface CoverageOptions {
  /** A best hit below this similarity marks a gap */
  similarityThreshold: number;
  /** A best hit below this similarity makes the gap high priority */
  highConfidenceThreshold: number;
  nResults: number;
  /** Weight of rank-distribution entropy in gap confidence, in [0, 0.5] */
  entropyWeight: number;
  maxConcurrency: number;
}

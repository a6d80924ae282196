/**
 * Chunk Stage Types
 * Parsed document elements in, token-bounded structural chunks out
 */

export const ELEMENT_TYPES = [
  'heading',
  'paragraph',
  'table',
  'list',
  'code',
  'figure',
] as const;

export type ElementType = (typeof ELEMENT_TYPES)[number];

/**
 * Optional parser extras carried on an element
 */
export interface ElementMetadata {
  tableData?: string[][];
  caption?: string;
  [key: string]: unknown;
}

/**
 * One structural element produced by the document parser
 */
export interface ParsedElement {
  readonly elementType: ElementType;
  readonly content: string;
  /** Ancestor headings, outermost first, excluding the element itself */
  readonly sectionHierarchy: readonly string[];
  /** Text of the element itself when it is a heading */
  readonly heading?: string | null;
  readonly pageNumbers: readonly number[];
  readonly metadata?: ElementMetadata;
}

/**
 * Element as received from a parser or over the wire; its type tag has not
 * been checked yet
 */
export type RawParsedElement = Omit<ParsedElement, 'elementType'> & {
  readonly elementType: string;
};

export interface DocumentMetadata {
  documentId: string;
  documentTitle: string;
  documentType: string;
}

export type ChunkType = 'text' | 'table' | 'heading';

export interface ChunkResult {
  readonly content: string;
  readonly tokenCount: number;
  readonly sectionHierarchy: readonly string[];
  readonly clauseNumber: string | null;
  readonly pageNumbers: readonly number[];
  readonly chunkType: ChunkType;
  /** Chunk opens with text carried over from the previous chunk */
  readonly hasOverlap: boolean;
}

export interface ChunkingOptions {
  chunkSizeMin: number;
  chunkSizeMax: number;
  chunkOverlap: number;
}

export interface SkippedElement {
  index: number;
  elementType: string;
  reason: string;
}

export interface ChunkStatistics {
  totalElements: number;
  processedElements: number;
  skippedElements: number;
  totalChunks: number;
  textChunks: number;
  tableChunks: number;
  headingChunks: number;
  averageTokens: number;
  maxTokens: number;
  /** Text chunks below chunkSizeMin (only the trailing chunk of a section may be) */
  undersizedChunks: number;
}

export interface ChunkingReport {
  chunks: ChunkResult[];
  skippedElements: SkippedElement[];
  statistics: ChunkStatistics;
}

/**
 * Token measurement used by the chunker
 */
export interface Tokenizer {
  countTokens(text: string): number;
  /** Last `maxTokens` tokens of `text`, decoded */
  tailTokens(text: string, maxTokens: number): string;
}

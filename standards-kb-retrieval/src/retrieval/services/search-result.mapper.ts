/**
 * Maps stored chunk payloads (vector store points, lexical index documents)
 * to SearchResult. Payload keys come from the indexing service's enriched
 * chunk; unknown keys stay in `metadata`.
 */

import type { ChunkCitation, LexicalHit, SearchResult } from '../types';

const CITATION_KEYS = [
  'documentId',
  'documentTitle',
  'documentType',
  'sectionTitle',
  'sectionHierarchy',
  'clauseNumber',
  'pageNumbers',
  'normative',
  'chunkType',
] as const;

function readString(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function readStringArray(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];
}

function readNumberArray(value: unknown): number[] {
  return Array.isArray(value)
    ? value.filter((item): item is number => typeof item === 'number')
    : [];
}

function readNullableBoolean(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

export function readCitation(payload: Record<string, unknown>): ChunkCitation {
  const hierarchy = readStringArray(payload.sectionHierarchy);
  return {
    documentId: readString(payload.documentId),
    documentTitle: readString(payload.documentTitle),
    documentType: readString(payload.documentType),
    sectionTitle: readString(
      payload.sectionTitle,
      hierarchy.length > 0 ? hierarchy[hierarchy.length - 1] : '',
    ),
    sectionHierarchy: hierarchy,
    clauseNumber:
      typeof payload.clauseNumber === 'string' ? payload.clauseNumber : null,
    pageNumbers: readNumberArray(payload.pageNumbers),
    normative: readNullableBoolean(payload.normative),
    chunkType: readString(payload.chunkType, 'text'),
  };
}

function extraMetadata(payload: Record<string, unknown>): Record<string, unknown> {
  const keys: readonly string[] = CITATION_KEYS;
  return Object.fromEntries(
    Object.entries(payload).filter(
      ([key]) => !keys.includes(key) && key !== 'content',
    ),
  );
}

export function payloadToSearchResult(
  id: string,
  score: number,
  payload: Record<string, unknown>,
): SearchResult {
  return {
    id,
    content: readString(payload.content),
    score,
    metadata: extraMetadata(payload),
    ...readCitation(payload),
  };
}

export function lexicalHitToSearchResult(hit: LexicalHit): SearchResult {
  return {
    id: hit.id,
    content: hit.content,
    score: hit.score,
    metadata: extraMetadata(hit.metadata),
    ...readCitation(hit.metadata),
  };
}

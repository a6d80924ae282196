/**
 * Metadata Enricher Service
 * Identity and provenance fields for a chunk; never touches its content
 */

import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { ChunkResult, DocumentMetadata } from '../../chunk/types';

export interface ChunkIdentity {
  id: string;
  contentHash: string;
  documentId: string;
  documentTitle: string;
  documentType: string;
  sectionTitle: string;
  sectionPath: string;
}

export const SECTION_PATH_SEPARATOR = ' > ';

/**
 * SHA-256 of the content with surrounding whitespace removed and line
 * endings normalized to \n
 */
export function computeContentHash(content: string): string {
  const normalized = content.trim().replace(/\r\n/g, '\n');
  return createHash('sha256').update(normalized, 'utf8').digest('hex');
}

@Injectable()
export class MetadataEnricherService {
  buildIdentity(chunk: ChunkResult, document: DocumentMetadata): ChunkIdentity {
    const hierarchy = chunk.sectionHierarchy;
    return {
      id: uuidv4(),
      contentHash: computeContentHash(chunk.content),
      documentId: document.documentId,
      documentTitle: document.documentTitle,
      documentType: document.documentType,
      sectionTitle: hierarchy.length > 0 ? hierarchy[hierarchy.length - 1] : '',
      sectionPath: hierarchy.join(SECTION_PATH_SEPARATOR),
    };
  }
}

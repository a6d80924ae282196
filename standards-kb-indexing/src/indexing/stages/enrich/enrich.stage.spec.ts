import { EnrichStage } from './enrich.stage';
import {
  KeywordExtractorService,
  MetadataEnricherService,
  NormativeClassifierService,
  computeContentHash,
} from './services';
import type { ChunkResult, DocumentMetadata } from '../chunk/types';

const DOCUMENT: DocumentMetadata = {
  documentId: 'doc-7',
  documentTitle: 'Fastener Standard',
  documentType: 'standard',
};

const UUID_V4 =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function chunk(
  content: string,
  sectionHierarchy: string[],
  clauseNumber: string | null,
): ChunkResult {
  return {
    content,
    tokenCount: content.split(' ').length,
    sectionHierarchy,
    clauseNumber,
    pageNumbers: [3],
    chunkType: 'text',
    hasOverlap: false,
  };
}

describe('EnrichStage', () => {
  const stage = new EnrichStage(
    new MetadataEnricherService(),
    new KeywordExtractorService(),
    new NormativeClassifierService(),
  );

  const chunks = [
    chunk(
      'The torque wrench shall apply torque within torque limits.',
      ['6 Assembly', '6.4 Torque'],
      '6.4',
    ),
    chunk(
      'NOTE Voltage readings depend on the voltage meter.',
      ['7 Electrical'],
      '7',
    ),
    chunk('Overview of this document.', [], null),
  ];

  it('adds identity, classification and keywords beside the chunk fields', () => {
    const output = stage.execute({ document: DOCUMENT, chunks });
    const [first, second, third] = output.enrichedChunks;

    expect(first).toMatchObject({
      ...chunks[0],
      documentId: 'doc-7',
      documentTitle: 'Fastener Standard',
      documentType: 'standard',
      sectionTitle: '6.4 Torque',
      sectionPath: '6 Assembly > 6.4 Torque',
      normative: true,
      chunkIndex: 0,
      contentHash: computeContentHash(chunks[0].content),
    });
    expect(first.id).toMatch(UUID_V4);
    expect(first.keywords[0]).toBe('torque');

    expect(second.normative).toBe(false);
    expect(second.keywords).toContain('voltage');
    expect(third.normative).toBeNull();
    expect(third.sectionTitle).toBe('');
    expect(third.sectionPath).toBe('');

    expect(new Set(output.enrichedChunks.map((c) => c.id)).size).toBe(3);
  });

  it('reports classification statistics', () => {
    const output = stage.execute({ document: DOCUMENT, chunks });

    expect(output.enrichmentMetadata.totalChunks).toBe(3);
    expect(output.enrichmentMetadata.statistics).toMatchObject({
      totalChunks: 3,
      normativeChunks: 1,
      informativeChunks: 1,
      unknownChunks: 1,
    });
  });

  it('handles a document without chunks', () => {
    const output = stage.execute({ document: DOCUMENT, chunks: [] });
    expect(output.enrichedChunks).toEqual([]);
    expect(output.enrichmentMetadata.statistics.averageKeywordsPerChunk).toBe(0);
  });
});

describe('computeContentHash', () => {
  it('hashes trimmed content with normalized line endings', () => {
    expect(computeContentHash('  abc \r\n')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
    expect(computeContentHash('a\r\nb')).toBe(computeContentHash('a\nb'));
  });
});

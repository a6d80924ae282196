import { ConfigService } from '@nestjs/config';
import { HierarchicalChunkerService } from './hierarchical-chunker.service';
import { ChunkConfigError } from '../errors';
import type { DocumentMetadata, RawParsedElement } from '../types';
import { WhitespaceTokenizer, words } from '../testing/whitespace-tokenizer';

const DOCUMENT: DocumentMetadata = {
  documentId: 'doc-1',
  documentTitle: 'Test Standard',
  documentType: 'standard',
};

function createChunker(
  config: Record<string, number> = {},
): HierarchicalChunkerService {
  return new HierarchicalChunkerService(
    new WhitespaceTokenizer(),
    new ConfigService({
      CHUNK_SIZE_MIN: 100,
      CHUNK_SIZE_MAX: 800,
      CHUNK_OVERLAP: 100,
      ...config,
    }),
  );
}

function heading(
  text: string,
  ancestors: string[] = [],
  pageNumbers: number[] = [1],
): RawParsedElement {
  return {
    elementType: 'heading',
    content: text,
    heading: text,
    sectionHierarchy: ancestors,
    pageNumbers,
  };
}

function paragraph(
  text: string,
  pageNumbers: number[] = [1],
  ancestors: string[] = [],
): RawParsedElement {
  return {
    elementType: 'paragraph',
    content: text,
    sectionHierarchy: ancestors,
    pageNumbers,
  };
}

describe('HierarchicalChunkerService', () => {
  describe('configuration', () => {
    it('rejects an overlap that is not smaller than the maximum size', () => {
      expect(() =>
        createChunker({ CHUNK_SIZE_MAX: 100, CHUNK_OVERLAP: 100 }),
      ).toThrow(ChunkConfigError);
    });

    it('rejects non-positive sizes', () => {
      expect(() => createChunker({ CHUNK_SIZE_MAX: 0 })).toThrow(
        ChunkConfigError,
      );
      expect(() =>
        createChunker({ CHUNK_SIZE_MIN: -1, CHUNK_SIZE_MAX: 50, CHUNK_OVERLAP: 5 }),
      ).toThrow(ChunkConfigError);
    });

    it('rejects a minimum above the maximum', () => {
      expect(() =>
        createChunker({ CHUNK_SIZE_MIN: 60, CHUNK_SIZE_MAX: 50, CHUNK_OVERLAP: 5 }),
      ).toThrow(ChunkConfigError);
    });
  });

  it('returns no chunks for no elements', async () => {
    await expect(createChunker().chunk([], DOCUMENT)).resolves.toEqual([]);
  });

  it('merges a heading with its paragraph and keeps the table separate', async () => {
    const body = words(300, 'w');
    const tableData = [
      ['Parameter', 'Limit'],
      ['Torque', '5 Nm'],
      ['Speed', '10 rpm'],
      ['Voltage', '24 V'],
      ['Current', '2 A'],
    ];

    const chunks = await createChunker().chunk(
      [
        heading('4.2 Verification', [], [12]),
        paragraph(body, [12], ['4.2 Verification']),
        {
          elementType: 'table',
          content: '',
          sectionHierarchy: ['4.2 Verification'],
          pageNumbers: [13],
          metadata: { tableData, caption: 'Table 3 Limits' },
        },
      ],
      DOCUMENT,
    );

    expect(chunks).toHaveLength(2);

    expect(chunks[0]).toEqual({
      content: `4.2 Verification\n\n${body}`,
      tokenCount: 302,
      sectionHierarchy: ['4.2 Verification'],
      clauseNumber: '4.2',
      pageNumbers: [12],
      chunkType: 'text',
      hasOverlap: false,
    });

    expect(chunks[1].chunkType).toBe('table');
    expect(chunks[1].clauseNumber).toBe('4.2');
    expect(chunks[1].pageNumbers).toEqual([13]);
    expect(chunks[1].content).toBe(
      [
        'Table 3 Limits',
        '',
        '| Parameter | Limit |',
        '| --- | --- |',
        '| Torque | 5 Nm |',
        '| Speed | 10 rpm |',
        '| Voltage | 24 V |',
        '| Current | 2 A |',
      ].join('\n'),
    );
  });

  it('emits an oversized table whole as one chunk', async () => {
    const tableData = Array.from({ length: 300 }, (_, row) => [
      `r${row}a`,
      `r${row}b`,
      `r${row}c`,
    ]);

    const chunks = await createChunker().chunk(
      [
        {
          elementType: 'table',
          content: '',
          sectionHierarchy: [],
          pageNumbers: [4, 5],
          metadata: { tableData },
        },
      ],
      DOCUMENT,
    );

    expect(chunks).toHaveLength(1);
    expect(chunks[0].chunkType).toBe('table');
    expect(chunks[0].tokenCount).toBeGreaterThan(800);
    expect(chunks[0].content.split('\n')).toHaveLength(301);
    expect(chunks[0].content).toContain('| r299a | r299b | r299c |');
    expect(chunks[0].pageNumbers).toEqual([4, 5]);
  });

  it('flushes at the maximum size and carries the overlap forward', async () => {
    const chunker = createChunker({
      CHUNK_SIZE_MIN: 1,
      CHUNK_SIZE_MAX: 10,
      CHUNK_OVERLAP: 3,
    });

    const chunks = await chunker.chunk(
      [
        paragraph(words(6, 'a'), [1]),
        paragraph(words(4, 'b'), [2]),
        paragraph(words(2, 'c'), [3]),
      ],
      DOCUMENT,
    );

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toMatchObject({
      content: 'a0 a1 a2 a3 a4 a5\n\nb0 b1 b2 b3',
      tokenCount: 10,
      pageNumbers: [1, 2],
      hasOverlap: false,
    });
    expect(chunks[1]).toMatchObject({
      content: 'b1 b2 b3\n\nc0 c1',
      tokenCount: 5,
      pageNumbers: [2, 3],
      hasOverlap: true,
    });
  });

  it('does not emit a buffer holding only carried-over overlap', async () => {
    const chunker = createChunker({
      CHUNK_SIZE_MIN: 1,
      CHUNK_SIZE_MAX: 10,
      CHUNK_OVERLAP: 3,
    });

    const chunks = await chunker.chunk(
      [paragraph(words(6, 'a')), paragraph(words(4, 'b'))],
      DOCUMENT,
    );

    expect(chunks).toHaveLength(1);
    expect(chunks[0].tokenCount).toBe(10);
  });

  it('splits an oversized paragraph without dropping words', async () => {
    const chunker = createChunker({
      CHUNK_SIZE_MIN: 1,
      CHUNK_SIZE_MAX: 10,
      CHUNK_OVERLAP: 0,
    });
    const text = words(25, 'p');

    const chunks = await chunker.chunk([paragraph(text)], DOCUMENT);

    expect(chunks.length).toBeGreaterThanOrEqual(3);
    for (const chunk of chunks) {
      expect(chunk.tokenCount).toBeLessThanOrEqual(10);
      expect(chunk.chunkType).toBe('text');
    }
    expect(chunks.flatMap((chunk) => chunk.content.split(/\s+/))).toEqual(
      text.split(' '),
    );
  });

  it('emits a heading followed by another heading as a heading chunk', async () => {
    const chunks = await createChunker().chunk(
      [
        heading('1 Scope'),
        heading('1.1 General', ['1 Scope']),
        paragraph('This part covers the requirements.', [1], ['1 Scope', '1.1 General']),
      ],
      DOCUMENT,
    );

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toEqual({
      content: '1 Scope',
      tokenCount: 2,
      sectionHierarchy: ['1 Scope'],
      clauseNumber: '1',
      pageNumbers: [1],
      chunkType: 'heading',
      hasOverlap: false,
    });
    expect(chunks[1]).toMatchObject({
      content: '1.1 General\n\nThis part covers the requirements.',
      sectionHierarchy: ['1 Scope', '1.1 General'],
      clauseNumber: '1.1',
      chunkType: 'text',
    });
  });

  it('emits a trailing heading and replaces sibling sections', async () => {
    const chunks = await createChunker().chunk(
      [
        heading('1 Scope'),
        paragraph('Scope text.'),
        heading('2 Terms', [], [2]),
      ],
      DOCUMENT,
    );

    expect(chunks.map((chunk) => chunk.chunkType)).toEqual(['text', 'heading']);
    expect(chunks[1].sectionHierarchy).toEqual(['2 Terms']);
    expect(chunks[1].pageNumbers).toEqual([2]);
  });

  it('keeps every hierarchy a prefix of the observed heading path', async () => {
    const chunks = await createChunker().chunk(
      [
        heading('5 Tests'),
        heading('5.1 Setup', ['5 Tests']),
        paragraph('Setup text.'),
        heading('5.2 Procedure', ['5 Tests']),
        paragraph('Procedure text.'),
        heading('6 Reports'),
        paragraph('Report text.'),
      ],
      DOCUMENT,
    );

    expect(chunks.map((chunk) => chunk.sectionHierarchy)).toEqual([
      ['5 Tests'],
      ['5 Tests', '5.1 Setup'],
      ['5 Tests', '5.2 Procedure'],
      ['6 Reports'],
    ]);
  });

  it('uses the caption of a figure and merges page numbers in order', async () => {
    const chunks = await createChunker().chunk(
      [
        paragraph('See the wiring.', [3]),
        {
          elementType: 'figure',
          content: '[image]',
          sectionHierarchy: [],
          pageNumbers: [3, 4],
          metadata: { caption: 'Figure 2 Wiring diagram' },
        },
      ],
      DOCUMENT,
    );

    expect(chunks).toHaveLength(1);
    expect(chunks[0].content).toBe('See the wiring.\n\nFigure 2 Wiring diagram');
    expect(chunks[0].pageNumbers).toEqual([3, 4]);
    expect(chunks[0].clauseNumber).toBeNull();
  });

  it('skips elements of unknown type and reports them', async () => {
    const report = await createChunker().chunkWithReport(
      [
        paragraph('Before.'),
        {
          elementType: 'sidebar',
          content: 'Ignored',
          sectionHierarchy: [],
          pageNumbers: [1],
        },
        paragraph('After.'),
      ],
      DOCUMENT,
    );

    expect(report.chunks).toHaveLength(1);
    expect(report.chunks[0].content).toBe('Before.\n\nAfter.');
    expect(report.skippedElements).toEqual([
      {
        index: 1,
        elementType: 'sidebar',
        reason: 'Unknown element type "sidebar" at index 1',
      },
    ]);
    expect(report.statistics).toMatchObject({
      totalElements: 3,
      processedElements: 2,
      skippedElements: 1,
      totalChunks: 1,
      textChunks: 1,
      undersizedChunks: 1,
    });
  });

  it('returns frozen chunks', async () => {
    const [chunk] = await createChunker().chunk([paragraph('Text.')], DOCUMENT);

    expect(Object.isFrozen(chunk)).toBe(true);
    expect(Object.isFrozen(chunk.pageNumbers)).toBe(true);
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { IndexingModule } from './indexing.module';
import { IndexingTcpController } from './indexing-tcp.controller';
import { IndexingService } from './indexing.service';
import type { ChunkDocumentRequestDto } from './dto';

describe('IndexingTcpController', () => {
  let moduleRef: TestingModule;
  let controller: IndexingTcpController;

  beforeAll(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [
            () => ({
              CHUNK_SIZE_MIN: 20,
              CHUNK_SIZE_MAX: 200,
              CHUNK_OVERLAP: 20,
            }),
          ],
        }),
        IndexingModule,
      ],
    }).compile();

    controller = moduleRef.get(IndexingTcpController);
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  const payload: ChunkDocumentRequestDto = {
    document: {
      documentId: 'doc-42',
      documentTitle: 'Pressure Vessels',
      documentType: 'standard',
    },
    elements: [
      {
        elementType: 'heading',
        content: '5.3 Hydrostatic test',
        heading: '5.3 Hydrostatic test',
        sectionHierarchy: ['5 Testing'],
        pageNumbers: [21],
      },
      {
        elementType: 'paragraph',
        content: 'Each vessel shall be tested at 1.5 times its design pressure.',
        sectionHierarchy: ['5 Testing', '5.3 Hydrostatic test'],
        pageNumbers: [21],
      },
      {
        elementType: 'marginalia',
        content: 'ignored',
        sectionHierarchy: [],
        pageNumbers: [21],
      },
    ],
  };

  it('chunks and enriches a parsed document', async () => {
    const response = await controller.chunkDocument(payload);

    if (!response.success) {
      throw new Error(response.error);
    }
    expect(response.chunks).toHaveLength(1);
    expect(response.chunks[0]).toMatchObject({
      content:
        '5.3 Hydrostatic test\n\nEach vessel shall be tested at 1.5 times its design pressure.',
      sectionHierarchy: ['5.3 Hydrostatic test'],
      sectionTitle: '5.3 Hydrostatic test',
      clauseNumber: '5.3',
      pageNumbers: [21],
      chunkType: 'text',
      normative: true,
      documentId: 'doc-42',
      chunkIndex: 0,
    });
    expect(response.chunks[0].tokenCount).toBeGreaterThan(0);
    expect(response.skippedElements).toHaveLength(1);
    expect(response.errors).toEqual([
      'Unknown element type "marginalia" at index 2',
    ]);
  });

  it('answers failures with success false', async () => {
    jest
      .spyOn(moduleRef.get(IndexingService), 'chunkDocument')
      .mockRejectedValueOnce(new Error('tokenizer unavailable'));

    await expect(controller.chunkDocument(payload)).resolves.toEqual({
      success: false,
      error: 'tokenizer unavailable',
    });
  });
});

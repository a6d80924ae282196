import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import {
  QdrantSemanticSearchService,
  buildQdrantFilter,
} from './qdrant-semantic-search.service';
import { payloadToSearchResult } from './search-result.mapper';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';

const mockSearch = jest.fn();
const mockGetCollections = jest.fn();

jest.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: class {
    search = mockSearch;
    getCollections = mockGetCollections;
  },
}));

describe('buildQdrantFilter', () => {
  it('turns exact-match filters into a must clause', () => {
    expect(buildQdrantFilter({ documentType: 'standard', normative: true })).toEqual({
      must: [
        { key: 'documentType', match: { value: 'standard' } },
        { key: 'normative', match: { value: true } },
      ],
    });
  });

  it('returns no clause for no filters', () => {
    expect(buildQdrantFilter()).toBeUndefined();
    expect(buildQdrantFilter({})).toBeUndefined();
  });
});

describe('payloadToSearchResult', () => {
  it('reads citation fields and keeps the rest as metadata', () => {
    const result = payloadToSearchResult('p-1', 0.83, {
      content: 'Bolts shall be torqued in a star pattern.',
      documentId: 'doc-1',
      documentTitle: 'Bolted Joints Standard',
      documentType: 'standard',
      sectionHierarchy: ['6 Assembly', '6.4 Torque'],
      pageNumbers: [12],
      normative: 'yes',
      chunkIndex: 4,
    });

    expect(result).toEqual({
      id: 'p-1',
      content: 'Bolts shall be torqued in a star pattern.',
      score: 0.83,
      metadata: { chunkIndex: 4 },
      documentId: 'doc-1',
      documentTitle: 'Bolted Joints Standard',
      documentType: 'standard',
      sectionTitle: '6.4 Torque',
      sectionHierarchy: ['6 Assembly', '6.4 Torque'],
      clauseNumber: null,
      pageNumbers: [12],
      normative: null,
      chunkType: 'text',
    });
  });
});

describe('QdrantSemanticSearchService', () => {
  let service: QdrantSemanticSearchService;
  let embedQuery: jest.SpyInstance;

  beforeEach(() => {
    mockSearch.mockReset();
    mockGetCollections.mockReset();
    embedQuery = jest
      .spyOn(OllamaEmbeddings.prototype, 'embedQuery')
      .mockResolvedValue([0.1, 0.2, 0.3]);

    const configService = new ConfigService({
      QDRANT_URL: 'http://qdrant.test:6333',
      QDRANT_COLLECTION: 'test_chunks',
      EMBEDDING_PROVIDER: 'ollama',
    });
    service = new QdrantSemanticSearchService(
      configService,
      new EmbeddingProviderFactory(configService),
    );
  });

  afterEach(() => {
    embedQuery.mockRestore();
  });

  it('searches the collection with the query embedding and filters', async () => {
    mockSearch.mockResolvedValue([
      { id: 7, score: 0.91, payload: { content: 'torque limits', clauseNumber: '6.4' } },
    ]);

    const results = await service.search('torque', 5, { documentType: 'standard' });

    expect(mockSearch).toHaveBeenCalledWith('test_chunks', {
      vector: [0.1, 0.2, 0.3],
      limit: 5,
      with_payload: true,
      filter: { must: [{ key: 'documentType', match: { value: 'standard' } }] },
    });
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      id: '7',
      score: 0.91,
      content: 'torque limits',
      clauseNumber: '6.4',
    });
  });

  it('does not embed or search for zero results', async () => {
    await expect(service.search('torque', 0)).resolves.toEqual([]);
    expect(embedQuery).not.toHaveBeenCalled();
    expect(mockSearch).not.toHaveBeenCalled();
  });

  it('reports health from the collection listing', async () => {
    mockGetCollections.mockResolvedValueOnce({ collections: [] });
    await expect(service.healthCheck()).resolves.toBe(true);

    mockGetCollections.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    await expect(service.healthCheck()).resolves.toBe(false);
  });
});

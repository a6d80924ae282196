/**
 * Retrieval TCP Controller
 * Handles inter-service communication via TCP microservice
 *
 * TCP Endpoints:
 * 1. search - Hybrid (semantic + BM25) search with citations
 * 2. assess_coverage - Knowledge gap report for a list of areas
 * 3. build_lexical_index - Replace the in-memory BM25 index
 * 4. get_retrieval_health - Health check for service discovery
 */

import { Controller, Inject, Logger, UsePipes } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { HybridSearchService } from './services/hybrid-search.service';
import { LexicalIndexService } from './services/lexical-index.service';
import {
  CoverageAssessorService,
  serializeCoverageReport,
  type SerializedCoverageReport,
} from './services/coverage-assessor.service';
import { citeSearchResult } from './services/citation-formatter';
import {
  AssessCoverageRequestDto,
  BuildLexicalIndexRequestDto,
  SearchRequestDto,
} from './dto';
import { RetrievalError } from './errors';
import {
  SEMANTIC_SEARCHER,
  type SearchResult,
  type SemanticSearcher,
} from './types';
import { createRpcValidationPipe } from '../shared/validation/rpc-validation.pipe';

interface FailureResponse {
  success: false;
  error: string;
  code?: string;
  retryable?: boolean;
}

type SearchResponse =
  | {
      success: true;
      results: Array<SearchResult & { citation?: string }>;
      count: number;
    }
  | FailureResponse;

type AssessCoverageResponse =
  | ({ success: true } & SerializedCoverageReport)
  | FailureResponse;

type BuildLexicalIndexResponse =
  | { success: true; documentCount: number; builtAt: string | null }
  | FailureResponse;

/**
 * Health check response payload
 */
interface HealthCheckResponse {
  success: boolean;
  status: 'healthy' | 'degraded';
  message?: string;
  services?: {
    semantic: boolean;
    lexicalIndex: {
      indexed: boolean;
      documentCount: number;
      builtAt: string | null;
    };
  };
}

function toFailure(error: unknown): FailureResponse {
  if (error instanceof RetrievalError) {
    return {
      success: false,
      error: error.message,
      code: error.code,
      retryable: error.retryable,
    };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error occurred',
  };
}

@Controller()
@UsePipes(createRpcValidationPipe())
export class RetrievalTcpController {
  private readonly logger = new Logger(RetrievalTcpController.name);

  constructor(
    private readonly hybridSearchService: HybridSearchService,
    private readonly lexicalIndexService: LexicalIndexService,
    private readonly coverageAssessorService: CoverageAssessorService,
    @Inject(SEMANTIC_SEARCHER)
    private readonly semanticSearcher: SemanticSearcher,
  ) {}

  /**
   * TCP endpoint: search
   *
   * Input: { query, nResults?, filters?, includeCitations? }
   * Output: { success, results, count } | { success: false, error, code? }
   */
  @MessagePattern({ cmd: 'search' })
  async search(@Payload() payload: SearchRequestDto): Promise<SearchResponse> {
    try {
      this.logger.log(
        `TCP search request: "${payload.query}" nResults=${payload.nResults ?? 10}`,
      );

      // Fused results carry RRF scores, which are not a relevance percentage
      const scoresAreSimilarities = !this.lexicalIndexService.isIndexed;
      const results = await this.hybridSearchService.search(
        payload.query,
        payload.nResults ?? 10,
        payload.filters,
      );
      const includeCitations = payload.includeCitations ?? true;

      return {
        success: true,
        results: includeCitations
          ? results.map((result) => ({
              ...result,
              citation: citeSearchResult(result, scoresAreSimilarities),
            }))
          : results,
        count: results.length,
      };
    } catch (error: unknown) {
      this.logger.error(
        `TCP search failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return toFailure(error);
    }
  }

  /**
   * TCP endpoint: assess_coverage
   *
   * Input: { areas, similarityThreshold?, highConfidenceThreshold?, nResults? }
   * Output: { success, gaps, covered, summary } | { success: false, error }
   */
  @MessagePattern({ cmd: 'assess_coverage' })
  async assessCoverage(
    @Payload() payload: AssessCoverageRequestDto,
  ): Promise<AssessCoverageResponse> {
    try {
      this.logger.log(
        `TCP assess_coverage request for ${payload.areas.length} areas`,
      );

      const report = await this.coverageAssessorService.assess(payload.areas, {
        similarityThreshold: payload.similarityThreshold,
        highConfidenceThreshold: payload.highConfidenceThreshold,
        nResults: payload.nResults,
      });

      return { success: true, ...serializeCoverageReport(report) };
    } catch (error: unknown) {
      this.logger.error(
        `TCP assess_coverage failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return toFailure(error);
    }
  }

  /**
   * TCP endpoint: build_lexical_index
   *
   * Input: { documents: [{ id, content, metadata? }] }
   * Output: { success, documentCount, builtAt } | { success: false, error }
   */
  @MessagePattern({ cmd: 'build_lexical_index' })
  buildLexicalIndex(
    @Payload() payload: BuildLexicalIndexRequestDto,
  ): BuildLexicalIndexResponse {
    try {
      this.lexicalIndexService.buildIndex(payload.documents);

      return {
        success: true,
        documentCount: this.lexicalIndexService.documentCount,
        builtAt: this.lexicalIndexService.builtAt?.toISOString() ?? null,
      };
    } catch (error: unknown) {
      this.logger.error(
        `TCP build_lexical_index failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return toFailure(error);
    }
  }

  /**
   * TCP endpoint: get_retrieval_health
   *
   * Status:
   * - healthy: vector store reachable and lexical index built
   * - degraded: otherwise (search still answers, semantic-only or failing)
   */
  @MessagePattern({ cmd: 'get_retrieval_health' })
  async getHealth(): Promise<HealthCheckResponse> {
    let semanticHealthy = false;
    try {
      semanticHealthy = this.semanticSearcher.healthCheck
        ? await this.semanticSearcher.healthCheck()
        : true;
    } catch (error: unknown) {
      this.logger.warn(
        `Semantic health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const indexed = this.lexicalIndexService.isIndexed;
    const status = semanticHealthy && indexed ? 'healthy' : 'degraded';

    const response: HealthCheckResponse = {
      success: true,
      status,
      services: {
        semantic: semanticHealthy,
        lexicalIndex: {
          indexed,
          documentCount: this.lexicalIndexService.documentCount,
          builtAt: this.lexicalIndexService.builtAt?.toISOString() ?? null,
        },
      },
    };

    if (!semanticHealthy) {
      response.message = 'Semantic search unavailable';
    } else if (!indexed) {
      response.message = 'Lexical index not built, search is semantic only';
    }

    this.logger.log(`TCP get_retrieval_health: ${status}`);
    return response;
  }
}

/**
 * Coverage Assessor Service
 * Probes each knowledge area with a semantic search and reports the areas
 * the corpus does not cover well enough, with a priority and a confidence
 * for each gap.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvalidArgumentError } from '../errors';
import { mapWithConcurrency } from '../utils/concurrency';
import { gapConfidence, gapPriority, normalizedEntropy } from './coverage-scoring';
import {
  SEMANTIC_SEARCHER,
  type CoverageGap,
  type CoverageOptions,
  type CoverageReport,
  type CoveredArea,
  type OverallPriority,
  type SearchResult,
  type SemanticSearcher,
} from '../types';

type AreaOutcome =
  | { kind: 'gap'; gap: CoverageGap }
  | { kind: 'covered'; covered: CoveredArea };

export const DEFAULT_COVERAGE_OPTIONS: CoverageOptions = {
  similarityThreshold: 0.5,
  highConfidenceThreshold: 0.3,
  nResults: 10,
  entropyWeight: 0.3,
  maxConcurrency: 5,
};

@Injectable()
export class CoverageAssessorService {
  private readonly logger = new Logger(CoverageAssessorService.name);
  private readonly options: CoverageOptions;

  constructor(
    @Inject(SEMANTIC_SEARCHER)
    private readonly semanticSearcher: SemanticSearcher,
    configService: ConfigService,
  ) {
    this.options = resolveCoverageOptions(configService);
  }

  /**
   * Assess every area. A failing search for one area is reported as a
   * medium-priority gap and does not stop the others.
   */
  async assess(
    areas: readonly string[],
    overrides: Partial<CoverageOptions> = {},
  ): Promise<CoverageReport> {
    const options: CoverageOptions = {
      similarityThreshold:
        overrides.similarityThreshold ?? this.options.similarityThreshold,
      highConfidenceThreshold:
        overrides.highConfidenceThreshold ?? this.options.highConfidenceThreshold,
      nResults: overrides.nResults ?? this.options.nResults,
      entropyWeight: overrides.entropyWeight ?? this.options.entropyWeight,
      maxConcurrency: overrides.maxConcurrency ?? this.options.maxConcurrency,
    };
    validateCoverageOptions(options);

    const startTime = Date.now();
    const outcomes = await mapWithConcurrency(
      areas,
      options.maxConcurrency,
      (area) => this.assessArea(area, options),
    );

    const gaps: CoverageGap[] = [];
    const covered: CoveredArea[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === 'gap') {
        gaps.push(outcome.gap);
      } else {
        covered.push(outcome.covered);
      }
    }

    const totalAreas = areas.length;
    const report: CoverageReport = {
      gaps,
      covered,
      totalAreas,
      coverageRatio: totalAreas > 0 ? covered.length / totalAreas : 0,
      overallPriority: overallPriority(gaps, covered.length, totalAreas),
    };

    this.logger.log(
      `[Coverage] status=completed areas=${totalAreas} gaps=${gaps.length} covered=${covered.length} ` +
        `priority=${report.overallPriority} durationMs=${Date.now() - startTime}`,
    );

    return report;
  }

  private async assessArea(
    area: string,
    options: CoverageOptions,
  ): Promise<AreaOutcome> {
    try {
      const results = await this.semanticSearcher.search(area, options.nResults);
      return evaluateArea(area, results, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[Coverage] area="${area}" status=failed error=${message}`,
      );
      return {
        kind: 'gap',
        gap: {
          area,
          priority: 'medium',
          confidence: 0.5,
          reason: message,
          maxSimilarity: 0,
          resultCount: 0,
          suggestedQuery: null,
        },
      };
    }
  }
}

function evaluateArea(
  area: string,
  results: readonly SearchResult[],
  options: CoverageOptions,
): AreaOutcome {
  if (results.length === 0) {
    return {
      kind: 'gap',
      gap: {
        area,
        priority: 'high',
        confidence: 1.0,
        reason: 'No content found',
        maxSimilarity: 0,
        resultCount: 0,
        suggestedQuery: `'${area}' documentation OR tutorial OR guide`,
      },
    };
  }

  const similarities = results.map((result) => result.score);
  const maxSimilarity = Math.max(...similarities);
  const avgSimilarity =
    similarities.reduce((sum, score) => sum + score, 0) / similarities.length;

  if (maxSimilarity < options.similarityThreshold) {
    const confidence = gapConfidence(
      maxSimilarity,
      normalizedEntropy(similarities),
      results.length,
      options,
    );
    return {
      kind: 'gap',
      gap: {
        area,
        priority: gapPriority(
          maxSimilarity,
          confidence,
          options.highConfidenceThreshold,
        ),
        confidence,
        reason: `Low relevance scores (max: ${maxSimilarity.toFixed(2)})`,
        maxSimilarity,
        resultCount: results.length,
        suggestedQuery: `'${area}' best practices OR standards`,
      },
    };
  }

  return {
    kind: 'covered',
    covered: {
      area,
      chunkCount: results.length,
      avgSimilarity,
      bestMatchTitle: results[0].documentTitle || null,
    },
  };
}

function overallPriority(
  gaps: readonly CoverageGap[],
  coveredCount: number,
  totalAreas: number,
): OverallPriority {
  const highGaps = gaps.filter((gap) => gap.priority === 'high').length;
  if (highGaps > totalAreas * 0.5) {
    return 'high';
  }
  if (gaps.length > coveredCount) {
    return 'medium';
  }
  if (gaps.length > 0) {
    return 'low';
  }
  return 'sufficient';
}

export function resolveCoverageOptions(
  configService: ConfigService,
): CoverageOptions {
  const read = (key: string, fallback: number): number =>
    Number(configService.get<number>(key, fallback));

  const options: CoverageOptions = {
    similarityThreshold: read(
      'COVERAGE_SIMILARITY_THRESHOLD',
      DEFAULT_COVERAGE_OPTIONS.similarityThreshold,
    ),
    highConfidenceThreshold: read(
      'COVERAGE_HIGH_CONFIDENCE_THRESHOLD',
      DEFAULT_COVERAGE_OPTIONS.highConfidenceThreshold,
    ),
    nResults: read('COVERAGE_N_RESULTS', DEFAULT_COVERAGE_OPTIONS.nResults),
    entropyWeight: read(
      'COVERAGE_ENTROPY_WEIGHT',
      DEFAULT_COVERAGE_OPTIONS.entropyWeight,
    ),
    maxConcurrency: read(
      'COVERAGE_MAX_CONCURRENCY',
      DEFAULT_COVERAGE_OPTIONS.maxConcurrency,
    ),
  };
  validateCoverageOptions(options);
  return options;
}

export function validateCoverageOptions(options: CoverageOptions): void {
  if (!(options.similarityThreshold > 0)) {
    throw new InvalidArgumentError(
      `similarityThreshold must be positive, got ${options.similarityThreshold}`,
    );
  }
  if (!(options.highConfidenceThreshold >= 0)) {
    throw new InvalidArgumentError(
      `highConfidenceThreshold must not be negative, got ${options.highConfidenceThreshold}`,
    );
  }
  if (!Number.isInteger(options.nResults) || options.nResults < 1) {
    throw new InvalidArgumentError(
      `nResults must be a positive integer, got ${options.nResults}`,
    );
  }
  if (!(options.entropyWeight >= 0 && options.entropyWeight <= 0.5)) {
    throw new InvalidArgumentError(
      `entropyWeight must be between 0 and 0.5, got ${options.entropyWeight}`,
    );
  }
  if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
    throw new InvalidArgumentError(
      `maxConcurrency must be a positive integer, got ${options.maxConcurrency}`,
    );
  }
}

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Wire form of a report: scores rounded to three decimals, with a summary
 * block
 */
export function serializeCoverageReport(report: CoverageReport) {
  return {
    gaps: report.gaps.map((gap) => ({
      ...gap,
      confidence: round3(gap.confidence),
      maxSimilarity: round3(gap.maxSimilarity),
    })),
    covered: report.covered.map((area) => ({
      ...area,
      avgSimilarity: round3(area.avgSimilarity),
    })),
    summary: {
      totalAreas: report.totalAreas,
      coverageRatio: round3(report.coverageRatio),
      gapsCount: report.gaps.length,
      coveredCount: report.covered.length,
      overallPriority: report.overallPriority,
    },
  };
}

export type SerializedCoverageReport = ReturnType<typeof serializeCoverageReport>;

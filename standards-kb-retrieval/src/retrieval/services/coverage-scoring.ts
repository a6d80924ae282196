/**
 * Gap scoring for coverage assessment
 */

import type { CoverageOptions, GapPriority } from '../types';

/**
 * Shannon entropy of the score distribution, normalized to [0, 1] by
 * log2(n). Fewer than two scores give 0; an all-zero distribution is
 * treated as uniform and gives 1. Negative scores count as 0.
 */
export function normalizedEntropy(scores: readonly number[]): number {
  if (scores.length < 2) {
    return 0;
  }

  const weights = scores.map((score) => Math.max(0, score));
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total === 0) {
    return 1;
  }

  const entropy = weights.reduce((sum, weight) => {
    if (weight === 0) {
      return sum;
    }
    const p = weight / total;
    return sum - p * Math.log2(p);
  }, 0);

  return entropy / Math.log2(scores.length);
}

/**
 * Confidence that an area is a real gap: low best similarity, a flat score
 * distribution and few results all raise it
 */
export function gapConfidence(
  maxSimilarity: number,
  entropy: number,
  resultCount: number,
  options: Pick<CoverageOptions, 'similarityThreshold' | 'nResults' | 'entropyWeight'>,
): number {
  // cosine scores can be negative; the term stays within [0, 1]
  const similarityComponent = Math.min(
    1,
    Math.max(0, 1 - maxSimilarity / options.similarityThreshold),
  );
  const countComponent = Math.max(0, 1 - resultCount / options.nResults);
  const confidence =
    0.5 * similarityComponent +
    options.entropyWeight * entropy +
    (0.5 - options.entropyWeight) * countComponent;
  return Math.min(1, confidence);
}

export function gapPriority(
  maxSimilarity: number,
  confidence: number,
  highConfidenceThreshold: number,
): GapPriority {
  if (maxSimilarity < highConfidenceThreshold || confidence > 0.7) {
    return 'high';
  }
  if (confidence > 0.4) {
    return 'medium';
  }
  return 'low';
}

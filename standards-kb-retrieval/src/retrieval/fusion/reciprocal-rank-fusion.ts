/**
 * Reciprocal Rank Fusion
 *
 * score(item) = Σ 1 / (k + rank_i) over every list the item appears in,
 * with 1-based ranks. Items are deduplicated by id; the payload of the last
 * list containing an item wins. Ties keep first-encounter order.
 */

import { InvalidArgumentError } from '../errors';

export const RRF_K = 60;

export interface RankedItem {
  id: string;
}

export type FusedItem<T extends RankedItem> = T & {
  rrfScore: number;
};

export function reciprocalRankFusion<T extends RankedItem>(
  resultLists: ReadonlyArray<ReadonlyArray<T>>,
  k: number = RRF_K,
): Array<FusedItem<T>> {
  if (!Number.isFinite(k) || k < 0) {
    throw new InvalidArgumentError(`k must be a non-negative number, got ${k}`);
  }

  const fused = new Map<string, { item: T; rrfScore: number }>();

  for (const results of resultLists) {
    results.forEach((item, index) => {
      const contribution = 1 / (k + index + 1);
      const existing = fused.get(item.id);
      if (existing) {
        existing.rrfScore += contribution;
        existing.item = item;
      } else {
        fused.set(item.id, { item, rrfScore: contribution });
      }
    });
  }

  // Array.prototype.sort is stable, so equal scores keep insertion order
  return Array.from(fused.values())
    .sort((a, b) => b.rrfScore - a.rrfScore)
    .map(({ item, rrfScore }) => ({ ...item, rrfScore }));
}

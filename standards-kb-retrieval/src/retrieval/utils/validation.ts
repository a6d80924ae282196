import { InvalidArgumentError } from '../errors';

/** Result counts must be non-negative integers */
export function assertResultCount(nResults: number, name = 'nResults'): void {
  if (!Number.isInteger(nResults) || nResults < 0) {
    throw new InvalidArgumentError(
      `${name} must be a non-negative integer, got ${nResults}`,
    );
  }
}

/**
 * Raised to a query caller when the aggregator can no longer deliver a reply:
 * the loop has terminated, was stopped, or the handle used was released.
 */
export class AggregatorClosedError extends Error {
  readonly code = 'closed' as const;

  constructor(message = 'aggregator closed') {
    super(message);
    this.name = 'AggregatorClosedError';
  }
}

export function isAggregatorClosed(err: unknown): err is AggregatorClosedError {
  return err instanceof AggregatorClosedError;
}

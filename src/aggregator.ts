import type { BatchSummary, FetchResult } from './types.js';

export type AggregatorOptions = {
  onResult?: (result: FetchResult, tally: { succeeded: number; failed: number }) => void;
};

// Collects results in completion order until the stream is sealed
export class Aggregator {
  private pending: Promise<BatchSummary> | null = null;

  constructor(
    private readonly source: AsyncIterable<FetchResult>,
    private readonly opts: AggregatorOptions = {}
  ) {}

  drain(): Promise<BatchSummary> {
    this.pending ??= this.collect();
    return this.pending;
  }

  get done(): Promise<BatchSummary> {
    return this.drain();
  }

  private async collect(): Promise<BatchSummary> {
    const results: FetchResult[] = [];
    let succeeded = 0;
    let failed = 0;

    for await (const result of this.source) {
      results.push(result);
      if (result.ok) succeeded++;
      else failed++;
      this.opts.onResult?.(result, { succeeded, failed });
    }

    return { results, succeeded, failed, total: results.length };
  }
}

import { Aggregator, type AggregatorOptions } from './aggregator.js';
import type { AppConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { IdentitySelector, type RandomSource } from './identity.js';
import { WorkerPool } from './pool.js';
import { RateGate } from './rateGate.js';
import { RetryPolicy } from './retryPolicy.js';
import { createFetchStrategy } from './strategy.js';
import type { BatchSummary, FetchStrategy, Logger } from './types.js';

export type RunBatchOptions = {
  targets: readonly string[];
  config: Pick<AppConfig, 'scraper' | 'proxies' | 'extraction' | 'browser'>;
  strategy?: FetchStrategy; // built from config when omitted
  logger?: Logger;
  onResult?: AggregatorOptions['onResult'];
  random?: RandomSource;
  seed?: number;
};

/**
 * Runs one batch to completion and returns every result in completion order.
 * The strategy and the rate gate are shut down once every job has settled,
 * even when the aggregator fails first.
 */
export async function runBatch(opts: RunBatchOptions): Promise<BatchSummary> {
  const { targets, config, logger } = opts;
  if (targets.length === 0) {
    throw new ConfigurationError('no targets to fetch', 'targets');
  }
  checkScraper(config.scraper);

  const { scraper, proxies } = config;
  const identities = new IdentitySelector({
    userAgents: scraper.userAgents,
    proxies,
    random: opts.random,
    seed: opts.seed
  });
  const policy = new RetryPolicy({
    maxRetries: scraper.maxRetries,
    retryDelayMs: scraper.retryDelayMs,
    rotateIdentity: identities.canRotate
  });
  const gate = new RateGate(scraper.rateLimitMs);
  const strategy = opts.strategy ?? createFetchStrategy(config);

  const pool = new WorkerPool(
    { workers: scraper.workers, timeoutMs: scraper.timeoutMs, strategy, identities, gate, policy, logger },
    targets.length
  );
  const aggregator = new Aggregator(pool.results, { onResult: opts.onResult });
  pool.addJobs(targets);
  pool.start();

  try {
    const [summary] = await Promise.all([aggregator.drain(), pool.done]);
    return summary;
  } finally {
    // no attempt may outlive the gate or the strategy
    await Promise.allSettled([pool.done]);
    gate.close();
    await strategy.close?.();
  }
}

function checkScraper(scraper: AppConfig['scraper']): void {
  const { workers, timeoutMs, rateLimitMs, maxRetries, retryDelayMs } = scraper;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigurationError(`workers must be an integer >= 1, got ${workers}`, 'scraper.workers');
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`timeout must be > 0, got ${timeoutMs}ms`, 'scraper.timeout');
  }
  if (!Number.isFinite(rateLimitMs) || rateLimitMs < 0) {
    throw new ConfigurationError(`rate limit must be >= 0, got ${rateLimitMs}ms`, 'scraper.rateLimit');
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ConfigurationError(`max retries must be an integer >= 0, got ${maxRetries}`, 'scraper.maxRetries');
  }
  if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
    throw new ConfigurationError(`retry delay must be >= 0, got ${retryDelayMs}ms`, 'scraper.retryDelay');
  }
}

import { describe, expect, it, vi } from 'vitest';
import { BrowserFetchStrategy } from '../src/browser.js';
import { loadConfig } from '../src/config.js';
import { runBatch } from '../src/engine.js';
import { ConfigurationError } from '../src/errors.js';
import { DirectFetchStrategy } from '../src/http.js';
import { createFetchStrategy } from '../src/strategy.js';
import { FakeStrategy, delayed, failure, silentLogger, success } from './helpers.js';

const config = (...flags: string[]) =>
  loadConfig(['--workers', '2', '--rate-limit', '0', '--retries', '1', '--retry-delay', '0', ...flags], {});

describe('runBatch', () => {
  it('refuses an empty batch', async () => {
    await expect(runBatch({ targets: [], config: config(), strategy: new FakeStrategy() })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('returns one result per target and shuts the strategy down', async () => {
    const strategy = new FakeStrategy((target) => (target.endsWith('/bad') ? failure() : success()));
    const onResult = vi.fn();
    const summary = await runBatch({
      targets: ['http://a.test/', 'http://b.test/bad', 'http://c.test/'],
      config: config(),
      strategy,
      logger: silentLogger(),
      onResult
    });

    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.results.find((r) => r.url === 'http://b.test/bad')?.attempts).toBe(2);
    expect(onResult).toHaveBeenCalledTimes(3);
    expect(strategy.closed).toBe(1);
  });

  it('paces attempts through the rate gate', async () => {
    const started = performance.now();
    await runBatch({
      targets: ['http://a.test/', 'http://b.test/', 'http://c.test/'],
      config: config('--rate-limit', '30ms', '--workers', '3'),
      strategy: new FakeStrategy(),
      logger: silentLogger()
    });
    expect(performance.now() - started).toBeGreaterThanOrEqual(59);
  });

  it('rotates proxies across retries when several are configured', async () => {
    const strategy = new FakeStrategy((_, ctx) => (ctx.attempt === 0 ? failure() : success()));
    const cfg = loadConfig(['--workers', '1', '--rate-limit', '0', '--retries', '1', '--retry-delay', '0', '--proxy'], {
      PROXY_LIST: 'http://proxy-a:8080,http://proxy-b:8080'
    });
    const summary = await runBatch({ targets: ['http://a.test/'], config: cfg, strategy, logger: silentLogger(), seed: 9 });

    const [first, second] = strategy.calls.map((c) => c.ctx.identity.proxy?.url);
    expect(second).not.toBe(first);
    expect(summary.results[0].identity.proxy?.url).toBe(second);
  });

  it.each([
    ['workers', { workers: 0 }, 'scraper.workers'],
    ['timeout', { timeoutMs: 0 }, 'scraper.timeout'],
    ['rate limit', { rateLimitMs: -1 }, 'scraper.rateLimit'],
    ['max retries', { maxRetries: 1.5 }, 'scraper.maxRetries']
  ])('rejects an invalid %s as a configuration error', async (_, override, field) => {
    const strategy = new FakeStrategy();
    const cfg = config();
    const run = runBatch({ targets: ['http://a.test/'], config: { ...cfg, scraper: { ...cfg.scraper, ...override } }, strategy });

    await expect(run).rejects.toBeInstanceOf(ConfigurationError);
    await expect(run).rejects.toMatchObject({ field });
    expect(strategy.calls).toHaveLength(0);
  });

  it('lets every job settle before closing the strategy when a result handler throws', async () => {
    const strategy = new FakeStrategy(() => delayed(10, success()));
    const onResult = vi.fn(() => {
      throw new Error('sink failed');
    });

    await expect(
      runBatch({
        targets: ['http://a.test/', 'http://b.test/', 'http://c.test/'],
        config: config('--workers', '1', '--retries', '0'),
        strategy,
        logger: silentLogger(),
        onResult
      })
    ).rejects.toThrow('sink failed');

    expect(onResult).toHaveBeenCalledTimes(1);
    expect(strategy.calls).toHaveLength(3);
    expect(strategy.callsAfterClose).toBe(0);
    expect(strategy.closed).toBe(1);
  });
});

describe('createFetchStrategy', () => {
  it('uses plain HTTP unless the browser is enabled', () => {
    expect(createFetchStrategy(config())).toBeInstanceOf(DirectFetchStrategy);
    expect(createFetchStrategy(config('--browser'))).toBeInstanceOf(BrowserFetchStrategy);
  });

  it('validates extraction settings up front', () => {
    const cfg = config();
    expect(() => createFetchStrategy({ ...cfg, extraction: { selectors: {}, regex: { bad: '(' } } })).toThrow(
      ConfigurationError
    );
  });
});

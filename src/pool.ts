import pLimit from 'p-limit';
import { Channel } from './channel.js';
import type { IdentitySelector } from './identity.js';
import type { RateGate } from './rateGate.js';
import type { RetryPolicy } from './retryPolicy.js';
import type { AttemptContext, Extracted, FetchResult, FetchStrategy, Identity, Job, Logger, Outcome } from './types.js';
import { formatDuration, redactUrl, sleep, toErrorMessage } from './utils.js';

export type WorkerPoolOptions = {
  workers: number;
  timeoutMs: number; // per attempt
  strategy: FetchStrategy;
  identities: IdentitySelector;
  gate: RateGate;
  policy: RetryPolicy;
  logger?: Logger;
};

// Progress of one job, kept outside the retry loop so a throw can still be reported
type JobState = {
  identity: Identity;
  attempts: number;
  started: number;
};

/**
 * Runs one batch of jobs with at most `workers` in flight.
 *
 *   const pool = new WorkerPool(opts, urls.length);
 *   pool.addJobs(urls);
 *   pool.start();
 *   for await (const result of pool.results) { ... }
 */
export class WorkerPool {
  readonly results: Channel<FetchResult>;
  readonly done: Promise<void>;

  private jobs: Job[] | null = null;
  private started = false;
  private resolveDone: () => void = () => undefined;
  private rejectDone: (err: unknown) => void = () => undefined;
  private limit: ReturnType<typeof pLimit>;
  private log: Logger;

  constructor(private readonly opts: WorkerPoolOptions, batchSize: number) {
    if (!Number.isInteger(opts.workers) || opts.workers < 1) {
      throw new RangeError(`workers must be an integer >= 1, got ${opts.workers}`);
    }
    if (!Number.isFinite(opts.timeoutMs) || opts.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be > 0, got ${opts.timeoutMs}`);
    }
    this.results = new Channel<FetchResult>(batchSize);
    this.limit = pLimit(opts.workers);
    this.log = opts.logger ?? console;
    this.done = new Promise<void>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });
  }

  addJobs(targets: readonly string[]): void {
    if (this.jobs) throw new Error('jobs were already added to this pool');
    if (targets.length > this.results.capacity) {
      throw new RangeError(`pool was sized for ${this.results.capacity} jobs, got ${targets.length}`);
    }
    const jobs = targets.map((target, index) => ({ index, target }));
    this.jobs = jobs;
    if (this.started) this.launch(jobs);
  }

  start(): void {
    if (this.started) throw new Error('worker pool already started');
    this.started = true;
    if (this.jobs) this.launch(this.jobs);
  }

  private launch(jobs: Job[]): void {
    const tasks = jobs.map((job) => this.limit(() => this.runJob(job)));
    // the pool, never a job, seals the results once every job has settled
    void Promise.allSettled(tasks).then((settled) => {
      this.results.close();
      const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
      if (failure) this.rejectDone(failure.reason);
      else this.resolveDone();
    });
  }

  private async runJob(job: Job): Promise<void> {
    const state: JobState = {
      identity: this.opts.identities.select(null),
      attempts: 0,
      started: performance.now()
    };
    let result: FetchResult;
    try {
      this.log.log(`[pool ${this.limit.activeCount}/${this.opts.workers}] processing ${job.target}`);
      result = await this.process(job, state);
    } catch (err) {
      const outcome: Outcome = {
        ok: false,
        reason: { kind: 'transport-error', message: toErrorMessage(err) },
        durationMs: performance.now() - state.started
      };
      result = this.toResult(job, outcome, { ...state, attempts: Math.max(1, state.attempts) });
    }
    this.results.send(result);
  }

  private async process(job: Job, state: JobState): Promise<FetchResult> {
    const { gate, policy, identities } = this.opts;

    for (;;) {
      const n = state.attempts;
      await gate.acquire();
      const outcome = await this.attempt(job, state.identity, n);
      state.attempts = n + 1;
      const decision = policy.decide(n, outcome);
      if (decision.action === 'accept') return this.toResult(job, outcome, state);

      const reason = outcome.ok ? '' : outcome.reason.message;
      this.log.warn(
        `[retry] ${job.target} after ${formatDuration(decision.afterMs)} (retry ${n + 1}/${policy.maxAttempts - 1}): ${reason}`
      );
      await sleep(decision.afterMs);
      if (decision.rotateIdentity) {
        state.identity = identities.select(state.identity);
        if (state.identity.proxy) this.log.log(`[retry] ${job.target} rotating proxy to ${redactUrl(state.identity.proxy.url)}`);
      }
    }
  }

  // One attempt, bounded by its deadline even if the strategy ignores the signal
  private async attempt(job: Job, identity: Identity, n: number): Promise<Outcome> {
    const { strategy, timeoutMs } = this.opts;
    const controller = new AbortController();
    const started = performance.now();
    const elapsed = () => performance.now() - started;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<Outcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          ok: false,
          reason: { kind: 'timeout', message: `attempt timed out after ${timeoutMs}ms` },
          durationMs: elapsed()
        });
      }, timeoutMs);
    });

    const context: AttemptContext = {
      identity,
      timeoutMs,
      signal: controller.signal,
      jobIndex: job.index,
      attempt: n
    };
    const fetched = strategy.fetch(job.target, context).catch(
      (err: unknown): Outcome => ({
        ok: false,
        reason: { kind: 'transport-error', message: toErrorMessage(err) },
        durationMs: elapsed()
      })
    );

    try {
      return await Promise.race([fetched, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toResult(job: Job, outcome: Outcome, state: JobState): FetchResult {
    const base = {
      index: job.index,
      url: job.target,
      attempts: state.attempts,
      retries: state.attempts - 1,
      durationMs: performance.now() - state.started,
      identity: freezeIdentity(state.identity),
      jsRendered: this.opts.strategy.rendersJs,
      timestamp: new Date().toISOString()
    };
    if (outcome.ok) {
      return Object.freeze({
        ...base,
        ok: true,
        content: outcome.payload.content,
        extracted: freezeExtracted(outcome.payload.extracted),
        statusCode: outcome.statusCode,
        screenshot: outcome.payload.screenshot
      });
    }
    return Object.freeze({
      ...base,
      ok: false,
      statusCode: outcome.statusCode,
      error: outcome.reason.message,
      errorKind: outcome.reason.kind
    });
  }
}

// Copies, so the selector's own proxy entries stay untouched
function freezeIdentity(identity: Identity): Identity {
  const proxy = identity.proxy ? Object.freeze({ ...identity.proxy }) : null;
  return Object.freeze({ userAgent: identity.userAgent, proxy });
}

function freezeExtracted(extracted: Extracted): Extracted {
  const out: Extracted = {};
  for (const [name, value] of Object.entries(extracted)) {
    if (Array.isArray(value)) {
      const values = [...value];
      Object.freeze(values);
      out[name] = values;
    } else {
      out[name] = value;
    }
  }
  return Object.freeze(out);
}

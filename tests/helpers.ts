import { vi } from 'vitest';
import type { AttemptContext, FetchStrategy, Logger, Outcome } from '../src/types.js';

export const silentLogger = (): Logger => ({ log: vi.fn(), warn: vi.fn() });

export const success = (content = '<html></html>'): Outcome => ({
  ok: true,
  statusCode: 200,
  payload: { content, extracted: {} },
  durationMs: 1
});

export const failure = (message = 'boom'): Outcome => ({
  ok: false,
  reason: { kind: 'transport-error', message },
  durationMs: 1
});

export const delayed = (ms: number, outcome: Outcome) =>
  new Promise<Outcome>((resolve) => setTimeout(() => resolve(outcome), ms));

type Respond = (target: string, ctx: AttemptContext) => Outcome | Promise<Outcome>;

// Records every attempt it sees and answers through `respond`
export class FakeStrategy implements FetchStrategy {
  readonly name = 'fake';
  rendersJs = false;
  readonly calls: { target: string; ctx: AttemptContext }[] = [];
  closed = 0;
  callsAfterClose = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly respond: Respond = () => success()) {}

  async fetch(target: string, ctx: AttemptContext): Promise<Outcome> {
    this.calls.push({ target, ctx });
    if (this.closed > 0) this.callsAfterClose++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.respond(target, ctx);
    } finally {
      this.inFlight--;
    }
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

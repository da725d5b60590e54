import got, { ParseError, TimeoutError, type Got, type Response } from 'got';
import { HttpProxyAgent, HttpsProxyAgent } from 'hpagent';
import type { Extractor } from './extract.js';
import { DecodeError } from './extract.js';
import type { AttemptContext, FetchStrategy, Outcome, ProxyEndpoint } from './types.js';
import { toErrorMessage } from './utils.js';

type ProxyAgents = { http: HttpProxyAgent; https: HttpsProxyAgent };

export function proxyUrlWithAuth(proxy: ProxyEndpoint): string {
  const u = new URL(proxy.url);
  if (proxy.username && proxy.password) {
    u.username = encodeURIComponent(proxy.username);
    u.password = encodeURIComponent(proxy.password);
  }
  return u.toString();
}

/**
 * Plain HTTP GET per attempt. Headers and proxy come from the attempt's
 * identity; retries are left to the worker pool.
 */
export class DirectFetchStrategy implements FetchStrategy {
  readonly name = 'http';
  readonly rendersJs = false;

  private client: Got = got.extend({
    followRedirect: true,
    retry: { limit: 0 },
    throwHttpErrors: false
  });
  private agents = new Map<string, ProxyAgents>();

  constructor(private readonly extractor: Extractor) {}

  async fetch(target: string, ctx: AttemptContext): Promise<Outcome> {
    const started = performance.now();
    const elapsed = () => performance.now() - started;

    let res: Response<string>;
    try {
      res = await this.client.get(target, {
        responseType: 'text',
        headers: { 'user-agent': ctx.identity.userAgent },
        agent: ctx.identity.proxy ? this.agentsFor(ctx.identity.proxy) : undefined,
        timeout: { request: ctx.timeoutMs },
        signal: ctx.signal
      });
    } catch (err) {
      if (ctx.signal.aborted || err instanceof TimeoutError) {
        return { ok: false, reason: { kind: 'timeout', message: `request timed out after ${ctx.timeoutMs}ms` }, durationMs: elapsed() };
      }
      if (err instanceof ParseError) {
        return { ok: false, reason: { kind: 'decode-error', message: err.message }, durationMs: elapsed() };
      }
      return { ok: false, reason: { kind: 'transport-error', message: toErrorMessage(err) }, durationMs: elapsed() };
    }

    if (res.statusCode !== 200) {
      return {
        ok: false,
        statusCode: res.statusCode,
        reason: {
          kind: 'non-success-status',
          statusCode: res.statusCode,
          message: `received non-200 status code: ${res.statusCode}`
        },
        durationMs: elapsed()
      };
    }

    try {
      const extracted = this.extractor.extract(res.body);
      return { ok: true, statusCode: res.statusCode, payload: { content: res.body, extracted }, durationMs: elapsed() };
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      return { ok: false, statusCode: res.statusCode, reason: { kind: 'decode-error', message: err.message }, durationMs: elapsed() };
    }
  }

  get proxyAgentCount(): number {
    return this.agents.size;
  }

  async close(): Promise<void> {
    for (const { http, https } of this.agents.values()) {
      http.destroy();
      https.destroy();
    }
    this.agents.clear();
  }

  // One agent pair per proxy endpoint, reused across attempts
  private agentsFor(proxy: ProxyEndpoint): ProxyAgents {
    const url = proxyUrlWithAuth(proxy);
    let agents = this.agents.get(url);
    if (!agents) {
      agents = {
        http: new HttpProxyAgent({ keepAlive: true, proxy: url }),
        https: new HttpsProxyAgent({ keepAlive: true, proxy: url })
      };
      this.agents.set(url, agents);
    }
    return agents;
  }
}

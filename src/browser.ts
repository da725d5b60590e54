import fs from 'node:fs';
import path from 'node:path';
import { chromium } from 'playwright-core';
import type { Extractor } from './extract.js';
import { DecodeError } from './extract.js';
import type { AttemptContext, FetchStrategy, Outcome } from './types.js';
import { sanitizeFilename, toErrorMessage, urlHost } from './utils.js';

// The slice of the playwright API this strategy drives
export interface RenderPage {
  goto(url: string, options: { timeout: number; waitUntil: 'load' }): Promise<{ status(): number } | null>;
  waitForTimeout(ms: number): Promise<void>;
  content(): Promise<string>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newContext(options: {
    userAgent?: string;
    proxy?: { server: string; username?: string; password?: string };
  }): Promise<RenderContext>;
  close(): Promise<void>;
}

export type BrowserOptions = {
  headless: boolean;
  userAgent?: string; // overrides the identity's user agent when set
  waitTimeMs: number;
  screenshot: boolean;
  screenshotDir: string;
  executablePath?: string;
};

export type BrowserLauncher = (opts: { headless: boolean; executablePath?: string }) => Promise<RenderBrowser>;

const launchChromium: BrowserLauncher = (opts) => chromium.launch(opts);

class RenderTimeout extends Error {}

/**
 * Renders each target in Chromium before capturing its HTML.
 * All workers share one lazily launched browser; every attempt gets its own
 * context so user agent and proxy can differ per attempt.
 */
export class BrowserFetchStrategy implements FetchStrategy {
  readonly name = 'browser';
  readonly rendersJs = true;

  private browser: Promise<RenderBrowser> | null = null;

  constructor(
    private readonly extractor: Extractor,
    private readonly opts: BrowserOptions,
    private readonly launch: BrowserLauncher = launchChromium
  ) {}

  async fetch(target: string, ctx: AttemptContext): Promise<Outcome> {
    const started = performance.now();
    const elapsed = () => performance.now() - started;

    let context: RenderContext | null = null;
    try {
      const browser = await this.getBrowser();
      const { proxy } = ctx.identity;
      context = await browser.newContext({
        userAgent: this.opts.userAgent || ctx.identity.userAgent,
        proxy: proxy ? { server: proxy.url, username: proxy.username, password: proxy.password } : undefined
      });
      const page = await context.newPage();
      const render = async () => {
        const response = await page.goto(target, { timeout: ctx.timeoutMs, waitUntil: 'load' });
        if (this.opts.waitTimeMs > 0) await page.waitForTimeout(this.opts.waitTimeMs);
        const html = await page.content();
        const screenshot = this.opts.screenshot ? await this.capture(page, target, ctx) : undefined;
        return { statusCode: response?.status() ?? 0, html, screenshot };
      };
      const { statusCode, html, screenshot } = await untilAborted(render(), ctx.signal);

      if (statusCode !== 0 && statusCode !== 200) {
        return {
          ok: false,
          statusCode,
          reason: { kind: 'non-success-status', statusCode, message: `received non-200 status code: ${statusCode}` },
          durationMs: elapsed()
        };
      }
      const extracted = this.extractor.extract(html);
      return { ok: true, statusCode, payload: { content: html, extracted, screenshot }, durationMs: elapsed() };
    } catch (err) {
      if (err instanceof RenderTimeout || ctx.signal.aborted || (err instanceof Error && err.name === 'TimeoutError')) {
        return { ok: false, reason: { kind: 'timeout', message: 'browser timeout' }, durationMs: elapsed() };
      }
      if (err instanceof DecodeError) {
        return { ok: false, reason: { kind: 'decode-error', message: err.message }, durationMs: elapsed() };
      }
      return { ok: false, reason: { kind: 'transport-error', message: toErrorMessage(err) }, durationMs: elapsed() };
    } finally {
      await context?.close().catch((err: unknown) => {
        console.warn(`[browser] failed to close context: ${toErrorMessage(err)}`);
      });
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    // a launch that failed has already been reported by the attempt that hit it
    const browser = await pending.catch(() => null);
    await browser?.close();
  }

  private getBrowser(): Promise<RenderBrowser> {
    if (!this.browser) {
      const launching = this.launch({ headless: this.opts.headless, executablePath: this.opts.executablePath });
      // a failed launch is not cached, the next attempt tries again
      void launching.catch(() => {
        if (this.browser === launching) this.browser = null;
      });
      this.browser = launching;
    }
    return this.browser;
  }

  private async capture(page: RenderPage, target: string, ctx: AttemptContext): Promise<string> {
    await fs.promises.mkdir(this.opts.screenshotDir, { recursive: true });
    const filename = `${sanitizeFilename(urlHost(target))}-${ctx.jobIndex}-${ctx.attempt}-${Date.now()}.png`;
    const outPath = path.join(this.opts.screenshotDir, filename);
    await page.screenshot({ path: outPath, fullPage: true });
    return outPath;
  }
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RenderTimeout());
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

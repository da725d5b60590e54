import fs from 'node:fs';
import path from 'node:path';
import type { FetchResult, Identity } from './types.js';
import { redactUrl } from './utils.js';

export type OutputFormat = 'json' | 'csv';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function writeJson(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

// Column order for CSV
export const CSV_COLUMNS = [
  'index',
  'url',
  'ok',
  'status_code',
  'attempts',
  'retries',
  'duration_ms',
  'user_agent',
  'proxy',
  'js_rendered',
  'screenshot',
  'error_kind',
  'error',
  'extracted',
  'timestamp'
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string | number | boolean | undefined>;

export function csvEscape(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) return '';
  let s = String(value);
  const needsQuotes = /[",\n\r]/.test(s);
  if (needsQuotes) {
    s = '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

// Proxy passwords never reach the output file
export function redactIdentity(identity: Identity): Identity {
  const { proxy } = identity;
  if (!proxy) return identity;
  return {
    userAgent: identity.userAgent,
    proxy: {
      url: redactUrl(proxy.url),
      username: proxy.username,
      password: proxy.password ? '***' : undefined
    }
  };
}

function toCsvRow(result: FetchResult): CsvRow {
  const { proxy } = redactIdentity(result.identity);
  return {
    index: result.index,
    url: result.url,
    ok: result.ok,
    status_code: result.statusCode,
    attempts: result.attempts,
    retries: result.retries,
    duration_ms: Math.round(result.durationMs),
    user_agent: result.identity.userAgent,
    proxy: proxy?.url,
    js_rendered: result.jsRendered,
    screenshot: result.screenshot,
    error_kind: result.errorKind,
    error: result.error,
    extracted: result.extracted ? JSON.stringify(result.extracted) : undefined,
    timestamp: result.timestamp
  };
}

export function toCsv(results: readonly FetchResult[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const result of results) {
    const row = toCsvRow(result);
    lines.push(CSV_COLUMNS.map((k) => csvEscape(row[k])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function saveResults(
  results: readonly FetchResult[],
  opts: { outputFile: string; outputFormat: OutputFormat }
): string {
  const outPath = path.resolve(opts.outputFile);
  if (opts.outputFormat === 'csv') {
    ensureDir(path.dirname(outPath));
    fs.writeFileSync(outPath, toCsv(results), 'utf-8');
  } else {
    writeJson(
      outPath,
      results.map((result) => ({ ...result, identity: redactIdentity(result.identity) }))
    );
  }
  return outPath;
}

export function sleep(ms: number) {
  return new Promise<void>((res) => setTimeout(res, ms));
}

export function sanitizeFilename(input: string): string {
  const base = input
    .replace(/[\/:*?"<>|]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
  return base || 'file';
}

export function urlHost(urlStr: string): string {
  try {
    return new URL(urlStr).host || 'page';
  } catch {
    return 'page';
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

const DURATION_UNITS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

const DURATION_PART = /\s*(\d+(?:\.\d+)?)\s*(ns|us|µs|ms|s|m|h)/iy;

// A number of milliseconds, a bare number string, or unit pairs such as "250ms", "1.5m", "1m30s"
export function parseDuration(input: number | string): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }
  const text = input.trim();
  if (/^\d+(?:\.\d+)?$/.test(text)) return Math.round(parseFloat(text));

  let total = 0;
  let parts = 0;
  DURATION_PART.lastIndex = 0;
  while (DURATION_PART.lastIndex < text.length) {
    const m = DURATION_PART.exec(text);
    if (!m) return null;
    total += parseFloat(m[1]) * DURATION_UNITS[m[2].toLowerCase()];
    parts++;
  }
  return parts > 0 ? Math.round(total) : null;
}

// Hides credentials embedded in a proxy URL before it is logged or written
export function redactUrl(urlStr: string): string {
  try {
    const u = new URL(urlStr);
    if (u.password) u.password = '***';
    return u.toString();
  } catch {
    return urlStr;
  }
}

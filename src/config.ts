import fs from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { ExtractionConfig } from './extract.js';
import type { ProxyEndpoint } from './types.js';
import { parseDuration, toErrorMessage } from './utils.js';

export const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/14.1.1 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/92.0.4515.107 Safari/537.36'
];

export const DEFAULT_SELECTORS: Record<string, string> = { title: 'title', heading: 'h1' };

export type AppConfig = {
  scraper: {
    workers: number;
    rateLimitMs: number;
    maxRetries: number;
    retryDelayMs: number;
    timeoutMs: number;
    userAgents: string[];
  };
  io: {
    inputFile?: string;
    outputFile: string;
    outputFormat: 'json' | 'csv';
  };
  extraction: ExtractionConfig;
  proxies: {
    enabled: boolean;
    rotate: boolean;
    list: ProxyEndpoint[];
  };
  browser: {
    enabled: boolean;
    headless: boolean;
    userAgent?: string;
    waitTimeMs: number;
    screenshot: boolean;
    screenshotDir: string;
    executablePath?: string;
  };
};

const duration = (bound: 'nonNegative' | 'positive') =>
  z
    .union([z.number(), z.string()])
    .transform((value, ctx) => {
      const ms = parseDuration(value);
      if (ms === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
        return z.NEVER;
      }
      return ms;
    })
    .pipe(bound === 'positive' ? z.number().positive() : z.number().nonnegative());

const httpUrl = z
  .string()
  .url()
  .refine(
    (value) => {
      try {
        return /^https?:$/.test(new URL(value).protocol);
      } catch {
        return false;
      }
    },
    { message: 'proxy must use http or https' }
  );

const proxyEntry = z.union([
  httpUrl,
  z.object({
    url: httpUrl,
    username: z.string().optional(),
    password: z.string().optional()
  })
]);

const configSchema = z.object({
  scraper: z
    .object({
      workers: z.number().int().min(1).default(3),
      rateLimit: duration('nonNegative').default('1s'),
      maxRetries: z.number().int().min(0).default(3),
      retryDelay: duration('nonNegative').default('2s'),
      timeout: duration('positive').default('30s'),
      userAgents: z.array(z.string().min(1)).default([])
    })
    .default({}),
  io: z
    .object({
      inputFile: z.string().min(1).optional(),
      outputFile: z.string().min(1).default('results.json'),
      outputFormat: z.enum(['json', 'csv']).default('json')
    })
    .default({}),
  extraction: z
    .object({
      selectors: z.record(z.string().min(1)).default(DEFAULT_SELECTORS),
      regex: z.record(z.string()).default({})
    })
    .default({}),
  proxies: z
    .object({
      enabled: z.boolean().default(false),
      rotate: z.boolean().default(true),
      list: z.array(proxyEntry).default([]),
      auth: z
        .object({
          username: z.string().optional(),
          password: z.string().optional()
        })
        .default({})
    })
    .default({}),
  browser: z
    .object({
      enabled: z.boolean().default(false),
      headless: z.boolean().default(true),
      userAgent: z.string().min(1).optional(),
      waitTime: duration('nonNegative').default('5s'),
      screenshot: z.boolean().default(false),
      screenshotDir: z.string().min(1).default('screenshots'),
      executablePath: z.string().min(1).optional()
    })
    .default({})
});

type RawConfig = Record<string, unknown>;

const isRecord = (value: unknown): value is RawConfig =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Later layers win; arrays are replaced, not concatenated
export function mergeLayers(...layers: RawConfig[]): RawConfig {
  const out: RawConfig = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = out[key];
      out[key] = isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
    }
  }
  return out;
}

const camelCase = (key: string) => key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

// Section keys may be snake_case (`rate_limit`, `wait_time`); selector and pattern names are left alone
function normalizeKeys(raw: RawConfig): RawConfig {
  const out: RawConfig = {};
  for (const [section, value] of Object.entries(raw)) {
    if (!isRecord(value) || section === 'extraction') {
      out[section] = value;
      continue;
    }
    const fields: RawConfig = {};
    for (const [key, field] of Object.entries(value)) {
      // an empty YAML value means "not set"
      if (field !== null) fields[camelCase(key)] = field;
    }
    out[section] = fields;
  }
  return out;
}

// JSON, or YAML for `.yaml` / `.yml` files
export function readConfigFile(filePath: string): RawConfig {
  const ext = path.extname(filePath).toLowerCase();
  let parsed: unknown;
  try {
    const text = fs.readFileSync(filePath, 'utf-8');
    parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`cannot read config file ${filePath}: ${toErrorMessage(err)}`, 'config');
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`config file ${filePath} must contain a mapping at the top level`, 'config');
  }
  return normalizeKeys(parsed);
}

// `--name=value` or `--name value`; the last occurrence wins
function readFlag(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  let value: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg.startsWith(prefix)) value = arg.slice(prefix.length);
    else if (arg === `--${name}` && next !== undefined && !next.startsWith('--')) value = next;
  }
  return value;
}

function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

const num = (raw: string | undefined) => (raw == null || raw.trim() === '' ? undefined : Number(raw));
const bool = (raw: string | undefined) => (raw == null || raw.trim() === '' ? undefined : raw === '1' || raw.toLowerCase() === 'true');
const str = (raw: string | undefined) => (raw == null || raw.trim() === '' ? undefined : raw.trim());

function envLayer(env: NodeJS.ProcessEnv): RawConfig {
  const proxyList = str(env.PROXY_LIST)
    ?.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const userAgent = str(env.USER_AGENT);
  return {
    scraper: {
      workers: num(env.WORKERS),
      rateLimit: str(env.RATE_LIMIT),
      maxRetries: num(env.MAX_RETRIES),
      retryDelay: str(env.RETRY_DELAY),
      timeout: str(env.TIMEOUT),
      userAgents: userAgent ? [userAgent] : undefined
    },
    io: {
      inputFile: str(env.INPUT_FILE),
      outputFile: str(env.OUTPUT_FILE),
      outputFormat: str(env.OUTPUT_FORMAT)
    },
    proxies: {
      enabled: bool(env.PROXY_ENABLED),
      list: proxyList,
      auth: { username: str(env.PROXY_USERNAME), password: str(env.PROXY_PASSWORD) }
    },
    browser: {
      enabled: bool(env.BROWSER_ENABLED),
      executablePath: str(env.CHROME_PATH)
    }
  };
}

function flagLayer(argv: string[]): RawConfig {
  const selectors: RawConfig = {};
  const title = readFlag(argv, 'title-selector');
  const heading = readFlag(argv, 'heading-selector');
  if (title) selectors.title = title;
  if (heading) selectors.heading = heading;
  return {
    scraper: {
      workers: num(readFlag(argv, 'workers')),
      rateLimit: readFlag(argv, 'rate-limit'),
      maxRetries: num(readFlag(argv, 'retries')),
      retryDelay: readFlag(argv, 'retry-delay'),
      timeout: readFlag(argv, 'timeout')
    },
    io: {
      inputFile: readFlag(argv, 'input'),
      outputFile: readFlag(argv, 'output'),
      outputFormat: readFlag(argv, 'format')
    },
    extraction: { selectors },
    proxies: { enabled: hasFlag(argv, 'proxy') ? true : undefined },
    browser: { enabled: hasFlag(argv, 'browser') ? true : undefined }
  };
}

export function parseConfig(raw: RawConfig): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    const field = parsed.error.issues[0]?.path.join('.');
    throw new ConfigurationError(`invalid configuration: ${issues.join('; ')}`, field);
  }

  const { scraper, io, extraction, proxies, browser } = parsed.data;
  const list: ProxyEndpoint[] = proxies.list.map((entry) => {
    const endpoint: ProxyEndpoint = typeof entry === 'string' ? { url: entry } : entry;
    // shared credentials only fill in endpoints that carry none of their own
    if (endpoint.username || !proxies.auth.username) return endpoint;
    return { ...endpoint, username: proxies.auth.username, password: proxies.auth.password };
  });
  return {
    scraper: {
      workers: scraper.workers,
      rateLimitMs: scraper.rateLimit,
      maxRetries: scraper.maxRetries,
      retryDelayMs: scraper.retryDelay,
      timeoutMs: scraper.timeout,
      userAgents: scraper.userAgents.length > 0 ? scraper.userAgents : [...DEFAULT_USER_AGENTS]
    },
    io,
    extraction,
    proxies: { enabled: proxies.enabled, rotate: proxies.rotate, list },
    browser: {
      enabled: browser.enabled,
      headless: browser.headless,
      userAgent: browser.userAgent,
      waitTimeMs: browser.waitTime,
      screenshot: browser.screenshot,
      screenshotDir: browser.screenshotDir,
      executablePath: browser.executablePath
    }
  };
}

/**
 * Defaults, then the JSON or YAML config file (`--config` or SCRAPER_CONFIG), then
 * environment variables, then command-line flags.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configFile = readFlag(argv, 'config') ?? str(env.SCRAPER_CONFIG);
  const fileLayer = configFile ? readConfigFile(configFile) : {};
  // selector flags extend the default selectors unless the file brings its own set
  const fileSelectors = isRecord(fileLayer.extraction) && isRecord(fileLayer.extraction.selectors);
  const defaults: RawConfig = fileSelectors ? {} : { extraction: { selectors: DEFAULT_SELECTORS } };
  return parseConfig(mergeLayers(defaults, fileLayer, envLayer(env), flagLayer(argv)));
}

export type ProxyEndpoint = {
  url: string; // http(s)://host:port
  username?: string;
  password?: string;
};

// Outward-facing network presentation for one attempt
export type Identity = {
  userAgent: string;
  proxy: ProxyEndpoint | null;
};

export type Job = {
  index: number; // position in the submitted batch
  target: string;
};

export type Extracted = Record<string, string | string[]>;

export type FailureKind = 'transport-error' | 'non-success-status' | 'timeout' | 'decode-error';

export type FailureReason =
  | { kind: 'transport-error'; message: string }
  | { kind: 'non-success-status'; statusCode: number; message: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'decode-error'; message: string };

export type FetchPayload = {
  content: string;
  extracted: Extracted;
  screenshot?: string; // path of the rendered-page snapshot, browser strategy only
};

export type Outcome =
  | { ok: true; payload: FetchPayload; statusCode: number; durationMs: number }
  | { ok: false; reason: FailureReason; durationMs: number; statusCode?: number };

export type AttemptContext = {
  identity: Identity;
  timeoutMs: number;
  signal: AbortSignal; // aborts at the attempt deadline
  jobIndex: number;
  attempt: number; // 0-based
};

/**
 * One way of performing a single fetch attempt. Implementations must return
 * a `timeout` failure once `context.signal` aborts and must never retry.
 */
export interface FetchStrategy {
  readonly name: string;
  readonly rendersJs: boolean; // reported on every Result as `jsRendered`
  fetch(target: string, context: AttemptContext): Promise<Outcome>;
  close?(): Promise<void>;
}

// Terminal record for one job
export type FetchResult = Readonly<{
  index: number;
  url: string;
  ok: boolean;
  content?: string;
  extracted?: Extracted;
  statusCode?: number;
  error?: string;
  errorKind?: FailureKind;
  attempts: number;
  retries: number;
  durationMs: number;
  identity: Identity;
  screenshot?: string;
  jsRendered: boolean;
  timestamp: string; // ISO 8601 completion time
}>;

export type BatchSummary = {
  results: FetchResult[]; // completion order
  succeeded: number;
  failed: number;
  total: number;
};

export type Logger = Pick<Console, 'log' | 'warn'>;

import { ConfigurationError } from './errors.js';
import type { Identity, ProxyEndpoint } from './types.js';

export type RandomSource = () => number; // uniform in [0, 1)

// Small seedable PRNG so every selector owns its own sequence
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export type IdentityPoolOptions = {
  userAgents: string[];
  proxies?: {
    enabled: boolean;
    rotate: boolean;
    list: ProxyEndpoint[];
  };
  random?: RandomSource;
  seed?: number;
};

export class IdentitySelector {
  private readonly userAgents: string[];
  private readonly proxies: ProxyEndpoint[];
  private readonly rotate: boolean;
  private readonly random: RandomSource;

  constructor(opts: IdentityPoolOptions) {
    if (opts.userAgents.length === 0) {
      throw new ConfigurationError('identity pool needs at least one user agent', 'scraper.userAgents');
    }
    this.userAgents = [...opts.userAgents];
    this.proxies = opts.proxies?.enabled ? [...opts.proxies.list] : [];
    this.rotate = Boolean(opts.proxies?.rotate);
    this.random = opts.random ?? mulberry32(opts.seed ?? Date.now());
  }

  // True when a retry may land on a different proxy
  get canRotate(): boolean {
    return this.rotate && this.proxies.length > 1;
  }

  select(previous?: Identity | null): Identity {
    return {
      userAgent: this.pick(this.userAgents),
      proxy: this.pickProxy(previous?.proxy ?? null)
    };
  }

  private pickProxy(previous: ProxyEndpoint | null): ProxyEndpoint | null {
    if (this.proxies.length === 0) return null;
    if (!this.canRotate) return this.proxies[0];
    const candidates = previous ? this.proxies.filter((p) => p.url !== previous.url) : this.proxies;
    return this.pick(candidates.length > 0 ? candidates : this.proxies);
  }

  private pick<T>(pool: T[]): T {
    const i = Math.min(pool.length - 1, Math.floor(this.random() * pool.length));
    return pool[i];
  }
}

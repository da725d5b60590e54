import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import { IdentitySelector, mulberry32 } from '../src/identity.js';

const proxies = [{ url: 'http://proxy-a:8080' }, { url: 'http://proxy-b:8080' }, { url: 'http://proxy-c:8080' }];

describe('IdentitySelector', () => {
  it('requires at least one user agent', () => {
    expect(() => new IdentitySelector({ userAgents: [] })).toThrow(ConfigurationError);
  });

  it('returns no proxy when proxies are disabled', () => {
    const selector = new IdentitySelector({
      userAgents: ['ua-1'],
      proxies: { enabled: false, rotate: true, list: proxies },
      seed: 1
    });
    expect(selector.select()).toEqual({ userAgent: 'ua-1', proxy: null });
    expect(selector.canRotate).toBe(false);
  });

  it('tolerates an empty proxy list', () => {
    const selector = new IdentitySelector({ userAgents: ['ua-1'], proxies: { enabled: true, rotate: true, list: [] } });
    expect(selector.select().proxy).toBeNull();
    expect(selector.canRotate).toBe(false);
  });

  it('keeps the first proxy when rotation is off', () => {
    const selector = new IdentitySelector({
      userAgents: ['ua-1'],
      proxies: { enabled: true, rotate: false, list: proxies },
      seed: 7
    });
    const first = selector.select();
    expect(first.proxy).toEqual(proxies[0]);
    expect(selector.select(first).proxy).toEqual(proxies[0]);
  });

  it('always moves to a different proxy when rotating', () => {
    const selector = new IdentitySelector({
      userAgents: ['ua-1'],
      proxies: { enabled: true, rotate: true, list: proxies.slice(0, 2) },
      seed: 42
    });
    let identity = selector.select();
    for (let i = 0; i < 20; i++) {
      const next = selector.select(identity);
      expect(next.proxy?.url).not.toBe(identity.proxy?.url);
      identity = next;
    }
  });

  it('draws user agents from the injected random source', () => {
    const values = [0, 0.5, 0.99];
    let i = 0;
    const selector = new IdentitySelector({
      userAgents: ['ua-1', 'ua-2', 'ua-3'],
      random: () => values[i++ % values.length]
    });
    expect([selector.select(), selector.select(), selector.select()].map((id) => id.userAgent)).toEqual([
      'ua-1',
      'ua-2',
      'ua-3'
    ]);
  });

  it('replays the same sequence for the same seed', () => {
    const a = mulberry32(123);
    const b = mulberry32(123);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

import { describe, expect, it } from 'vitest';
import { RateGate } from '../src/rateGate.js';

describe('RateGate', () => {
  it('spaces N admissions by at least (N - 1) intervals', async () => {
    const gate = new RateGate(40);
    const admitted: number[] = [];
    const started = performance.now();
    await Promise.all(
      Array.from({ length: 4 }, async () => {
        await gate.acquire();
        admitted.push(performance.now());
      })
    );
    const span = Math.max(...admitted) - started;
    expect(span).toBeGreaterThanOrEqual(3 * 40 - 1);
    gate.close();
  });

  it('admits the first caller immediately', async () => {
    const gate = new RateGate(10_000);
    const started = performance.now();
    await gate.acquire();
    expect(performance.now() - started).toBeLessThan(100);
    gate.close();
  });

  it('never hands the same slot to two callers', async () => {
    let clock = 0;
    const gate = new RateGate(50, () => clock);
    await gate.acquire();
    const second = gate.acquire();
    expect(gate.waiting).toBe(1);
    clock = 50;
    gate.close();
    await second;
    expect(gate.waiting).toBe(0);
  });

  it('does not pace when the interval is zero', async () => {
    const gate = new RateGate(0);
    await Promise.all([gate.acquire(), gate.acquire(), gate.acquire()]);
    expect(gate.waiting).toBe(0);
  });

  it('releases pending callers on close', async () => {
    const gate = new RateGate(60_000);
    await gate.acquire();
    const blocked = gate.acquire();
    gate.close();
    await expect(blocked).resolves.toBeUndefined();
    await expect(gate.acquire()).resolves.toBeUndefined();
  });

  it('rejects a negative interval', () => {
    expect(() => new RateGate(-1)).toThrow(RangeError);
  });
});

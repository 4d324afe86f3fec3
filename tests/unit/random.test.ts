import { describe, it, expect } from 'vitest';
import { beta, gamma, gaussian, mulberry32, uniform } from '../../src/utils/random.js';

describe('seeded random', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = mulberry32(123);
    const b = mulberry32(123);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('draws Beta samples inside (0, 1) around the expected mean', () => {
    const rng = mulberry32(2024);
    let sum = 0;
    const n = 5000;
    for (let i = 0; i < n; i++) {
      const v = beta(rng, 2, 2);
      expect(v).toBeGreaterThan(0);
      expect(v).toBeLessThan(1);
      sum += v;
    }
    expect(sum / n).toBeGreaterThan(0.47);
    expect(sum / n).toBeLessThan(0.53);
  });

  it('centres gaussian draws on the mean', () => {
    const rng = mulberry32(77);
    let sum = 0;
    for (let i = 0; i < 5000; i++) sum += gaussian(rng, 3, 0.25);
    expect(sum / 5000).toBeGreaterThan(2.97);
    expect(sum / 5000).toBeLessThan(3.03);
  });

  it('keeps uniform draws in range', () => {
    const rng = mulberry32(5);
    for (let i = 0; i < 1000; i++) {
      const v = uniform(rng, -0.15, 0.15);
      expect(v).toBeGreaterThanOrEqual(-0.15);
      expect(v).toBeLessThan(0.15);
    }
  });

  it('rejects a non-positive gamma shape', () => {
    expect(() => gamma(mulberry32(1), 0)).toThrow(RangeError);
  });
});

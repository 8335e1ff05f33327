import { describe, it, expect } from 'vitest';
import { mulberry32, gaussian, businessDays } from '../../src/utils/random';

describe('mulberry32', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = mulberry32(7);
    const b = mulberry32(7);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    first.forEach((u) => {
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    });
  });

  it('should differ across seeds', () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });
});

describe('gaussian', () => {
  it('should be deterministic and roughly standard normal', () => {
    const a = gaussian(42);
    const b = gaussian(42);
    const draws = Array.from({ length: 4000 }, () => a());

    expect(b()).toBe(draws[0]);
    const mean = draws.reduce((s, v) => s + v, 0) / draws.length;
    const variance = draws.reduce((s, v) => s + (v - mean) ** 2, 0) / (draws.length - 1);
    expect(Math.abs(mean)).toBeLessThan(0.1);
    expect(variance).toBeGreaterThan(0.85);
    expect(variance).toBeLessThan(1.15);
  });
});

describe('businessDays', () => {
  it('should skip weekends', () => {
    expect(businessDays('2024-01-05', 3)).toEqual(['2024-01-05', '2024-01-08', '2024-01-09']);
  });

  it('should start on the next weekday when given a weekend', () => {
    expect(businessDays('2024-01-06', 1)).toEqual(['2024-01-08']);
  });
});

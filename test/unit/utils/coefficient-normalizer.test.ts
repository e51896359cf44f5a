import { describe, it, expect } from 'vitest';
import { normalizeCoefficients } from 'src/utils/coefficient-normalizer';
import { Rational } from 'src/utils/rational';

const vec = (...values: [number, number?][]) => values.map(([n, d]) => Rational.of(n, d ?? 1));

describe('normalizeCoefficients', () => {
  it('should clear denominators with their LCM', () => {
    const result = normalizeCoefficients(vec([1], [1, 2], [1]));
    expect(result).toEqual({
      ok: true,
      value: { multiplier: 2n, scaled: [2n, 1n, 2n], divisor: 1n, signFlipped: false, coefficients: [2, 1, 2] },
    });
  });

  it('should divide out the common factor', () => {
    const result = normalizeCoefficients(vec([2, 3], [4, 3]));
    expect(result.ok && result.value.coefficients).toEqual([1, 2]);
    expect(result.ok && result.value.divisor).toBe(2n);
  });

  it('should flip an all-negative vector', () => {
    const result = normalizeCoefficients(vec([-2], [-4], [-6]));
    expect(result.ok && result.value.coefficients).toEqual([1, 2, 3]);
    expect(result.ok && result.value.signFlipped).toBe(true);
  });

  it('should reject mixed signs and zeros', () => {
    expect(normalizeCoefficients(vec([-1], [-2], [1]))).toMatchObject({
      ok: false,
      error: { kind: 'NonPositiveCoefficient', coefficients: ['-1', '-2', '1'] },
    });
    expect(normalizeCoefficients(vec([0], [1]))).toMatchObject({
      ok: false,
      error: { kind: 'NonPositiveCoefficient', coefficients: ['0', '1'] },
    });
    expect(normalizeCoefficients([])).toMatchObject({ ok: false, error: { kind: 'NonPositiveCoefficient' } });
  });

  it('should reject coefficients beyond the safe integer range', () => {
    const result = normalizeCoefficients([Rational.of(2n ** 60n), Rational.ONE]);
    expect(result).toMatchObject({ ok: false, error: { kind: 'CoefficientOverflow' } });
  });
});

import type { NormalizedCoefficients, RationalVector, Result, SolveError } from 'types';
import { gcd, lcm } from 'src/utils/rational';

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Scale a rational nullspace vector to the smallest all-positive integer vector.
 */
export function normalizeCoefficients(vector: RationalVector): Result<NormalizedCoefficients, SolveError> {
  const multiplier = vector.reduce((acc, x) => lcm(acc, x.denominator), 1n);
  const scaled = vector.map((x) => (x.numerator * multiplier) / x.denominator);
  const divisor = scaled.reduce((acc, x) => gcd(acc, x), 0n) || 1n;

  let integers = scaled.map((x) => x / divisor);
  const signFlipped = integers.length > 0 && integers.every((x) => x <= 0n);
  if (signFlipped) {
    integers = integers.map((x) => -x);
  }

  if (integers.length === 0 || integers.some((x) => x <= 0n)) {
    return {
      ok: false,
      error: {
        kind: 'NonPositiveCoefficient',
        coefficients: integers.map(String),
        message: `Coefficients [${integers.join(', ')}] are not all positive`,
      },
    };
  }
  if (integers.some((x) => x > MAX_SAFE)) {
    return {
      ok: false,
      error: {
        kind: 'CoefficientOverflow',
        coefficients: integers.map(String),
        message: 'Coefficients exceed the safe integer range',
      },
    };
  }

  return {
    ok: true,
    value: {
      multiplier,
      scaled,
      divisor,
      signFlipped,
      coefficients: integers.map(Number),
    },
  };
}

import type { BalanceResult, BalanceTrace } from 'types';
import { parseEquation } from 'src/parsers/equation-parser';
import { buildMatrix } from 'src/utils/stoichiometry-matrix';
import { solveNullspace } from 'src/utils/nullspace';
import { normalizeCoefficients } from 'src/utils/coefficient-normalizer';
import { checkConservation } from 'src/validators/conservation-validator';
import { renderBalancedEquation } from 'src/generators/equation-renderer';

export interface BalanceOptions {
  trace?: boolean; // attach a BalanceTrace for "show work" (default false)
}

/**
 * Balance an equation such as "Fe + O2 = Fe2O3".
 * Pure and synchronous; failures come back as typed errors, never thrown.
 */
export function balance(text: string, opts: BalanceOptions = {}): BalanceResult {
  const wantTrace = opts.trace ?? false;
  const trace: BalanceTrace = { input: text };
  const withTrace = () => (wantTrace ? { trace } : {});

  const parsed = parseEquation(text);
  if (!parsed.ok) return { ok: false, error: parsed.error, ...withTrace() };
  const equation = parsed.value;
  trace.equation = equation;

  const matrix = buildMatrix(equation);
  trace.matrix = matrix;

  const nullspace = solveNullspace(matrix);
  if (!nullspace.ok) return { ok: false, error: nullspace.error, ...withTrace() };
  trace.nullspace = nullspace.value;

  const normalized = normalizeCoefficients(nullspace.value);
  if (!normalized.ok) return { ok: false, error: normalized.error, ...withTrace() };
  const { coefficients, multiplier, scaled, divisor, signFlipped } = normalized.value;
  trace.normalization = { multiplier, scaled, divisor, signFlipped };
  trace.coefficients = coefficients;

  if (!checkConservation(equation, coefficients).balanced) {
    throw new Error(`Internal error: coefficients [${coefficients.join(', ')}] do not conserve every element`);
  }

  const split = equation.reactants.length;
  return {
    ok: true,
    equation,
    coefficients,
    reactantCoefficients: coefficients.slice(0, split),
    productCoefficients: coefficients.slice(split),
    balanced: renderBalancedEquation(equation, coefficients),
    ...withTrace(),
  };
}

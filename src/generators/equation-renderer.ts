import type { Compound, CoefficientVector, Equation } from 'types';

function formatTerm(compound: Compound, coefficient: number): string {
  return coefficient === 1 ? compound.formula : `${coefficient}${compound.formula}`;
}

/**
 * Render "2H2 + O2 -> 2H2O": coefficient 1 omitted, original arrow kept.
 */
export function renderBalancedEquation(equation: Equation, coefficients: CoefficientVector): string {
  const split = equation.reactants.length;
  const left = equation.reactants.map((c, i) => formatTerm(c, coefficients[i] ?? 1));
  const right = equation.products.map((c, i) => formatTerm(c, coefficients[split + i] ?? 1));
  return `${left.join(' + ')} ${equation.arrow} ${right.join(' + ')}`;
}

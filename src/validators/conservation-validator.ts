import type { CoefficientVector, ElementSymbol, Equation } from 'types';

export interface ElementBalance {
  element: ElementSymbol;
  reactantTotal: number;
  productTotal: number;
}

export interface ConservationReport {
  balanced: boolean;
  elements: ElementBalance[];
}

/**
 * Substitute coefficients back into the equation and total each element per side.
 */
export function checkConservation(equation: Equation, coefficients: CoefficientVector): ConservationReport {
  const totals = new Map<ElementSymbol, ElementBalance>();
  const compounds = [...equation.reactants, ...equation.products];

  compounds.forEach((compound, column) => {
    const coefficient = coefficients[column] ?? 0;
    const isReactant = column < equation.reactants.length;
    for (const [element, count] of compound.composition) {
      const entry = totals.get(element) ?? { element, reactantTotal: 0, productTotal: 0 };
      if (isReactant) {
        entry.reactantTotal += coefficient * count;
      } else {
        entry.productTotal += coefficient * count;
      }
      totals.set(element, entry);
    }
  });

  const elements = [...totals.values()].sort((a, b) => (a.element < b.element ? -1 : a.element > b.element ? 1 : 0));
  return {
    balanced: coefficients.length === compounds.length && elements.every((e) => e.reactantTotal === e.productTotal),
    elements,
  };
}

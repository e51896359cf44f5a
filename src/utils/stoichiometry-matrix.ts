import { uniq } from 'es-toolkit';
import type { ElementSymbol, Equation, StoichiometryMatrix } from 'types';
import { Rational } from 'src/utils/rational';

/**
 * One row per element (sorted), one column per compound (reactants, then products).
 * Product columns are negated so that a balanced equation is a nullspace vector.
 */
export function buildMatrix(equation: Equation): StoichiometryMatrix {
  const compounds = [...equation.reactants, ...equation.products];
  const reactantCount = equation.reactants.length;

  const elements: ElementSymbol[] = uniq(compounds.flatMap((c) => [...c.composition.keys()])).sort((a, b) =>
    a < b ? -1 : a > b ? 1 : 0,
  );

  const rows = elements.map((element) =>
    compounds.map((compound, column) => {
      const count = compound.composition.get(element) ?? 0;
      return Rational.of(column < reactantCount ? count : -count);
    }),
  );

  return {
    elements,
    species: compounds.map((c) => c.formula),
    reactantCount,
    rows,
  };
}

import type { BalanceError } from 'types';

function where(error: BalanceError): string {
  if (!('term' in error) || !error.term) return '';
  const side = error.term.side === 'reactants' ? 'reactant' : 'product';
  return ` (${side} ${error.term.index}: '${error.term.formula}')`;
}

/**
 * User-facing sentence for each error kind.
 */
export function describeError(error: BalanceError): string {
  switch (error.kind) {
    case 'EmptyFormula':
      return `A formula is empty${where(error)}. Check for a stray '+' or hydrate separator.`;
    case 'EmptyReactantSide':
      return 'There are no reactants before the arrow.';
    case 'EmptyProductSide':
      return 'There are no products after the arrow.';
    case 'UnknownElement':
      return `'${error.symbol}' is not an element${where(error)}. Element symbols start with an uppercase letter, e.g. Na, Cl.`;
    case 'NumeralInPlaceOfSymbol': {
      const formula = error.term ? ` '${error.term.formula}'` : '';
      return error.suggestion
        ? `Invalid formula${formula}. Did you mean '${error.suggestion}'? Use the letter O for oxygen, not the number 0.`
        : `Found the number '${error.numeral}' where an element symbol was expected${where(error)}.`;
    }
    case 'InvalidCharacter':
      return `Unexpected character '${error.char}'${where(error)}.`;
    case 'InvalidMultiplier':
      return `Invalid count '${error.value}'${where(error)}. Counts must be positive whole numbers.`;
    case 'UnbalancedBrackets':
      return `Bracket '${error.bracket}' is not matched${where(error)}.`;
    case 'MissingSeparator':
      return 'Invalid chemical equation. Use "->", "→", or "=" to separate reactants and products.';
    case 'ExtraSeparator':
      return `Only one "->", "→", or "=" is allowed; found another '${error.separator}'.`;
    case 'NoSolution':
      return 'Equation cannot be balanced. This usually means the equation is invalid or impossible to balance. If you have catalyst(s) in the equation, please remove them and try again.';
    case 'AmbiguousSolution':
      return `Equation has ${error.freeVariables} independent ways to balance; it is really several reactions. Split it up and try again.`;
    case 'DisconnectedSystem':
      return `Equation cannot be balanced with ${error.species.join(', ')} in it. Remove them and try again.`;
    case 'NonPositiveCoefficient':
      return `Equation cannot be balanced with positive coefficients (got ${error.coefficients.join(', ')}). Check which side each compound belongs on.`;
    case 'CoefficientOverflow':
      return 'The balanced coefficients are too large to report.';
  }
}

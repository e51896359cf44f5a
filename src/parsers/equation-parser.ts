import type { ArrowToken, Compound, Equation, ParseError, Result, Side } from 'types';
import { ARROW_TOKENS } from 'src/constants';
import { parseFormula } from 'src/parsers/formula-parser';

interface SeparatorMatch {
  arrow: ArrowToken;
  position: number;
}

/**
 * Find the first separator in scan order, starting at `from`.
 */
function findSeparator(text: string, from = 0): SeparatorMatch | null {
  for (let i = from; i < text.length; i++) {
    for (const arrow of ARROW_TOKENS) {
      if (text.startsWith(arrow, i)) {
        return { arrow, position: i };
      }
    }
  }
  return null;
}

function parseSide(text: string, side: Side): Result<Compound[], ParseError> {
  const compounds: Compound[] = [];
  const terms = text.split('+');

  for (let t = 0; t < terms.length; t++) {
    const term = terms[t]!.trim();
    const location = { side, index: t + 1 };

    // Leading coefficient, e.g. the 2 in "2H2O"
    const match = /^(\d+)\s*/.exec(term);
    const stated = match ? match[1]! : null;
    const formula = match ? term.slice(match[0]!.length) : term;

    if (stated !== null && formula === '') {
      return {
        ok: false,
        error: {
          kind: 'NumeralInPlaceOfSymbol',
          numeral: stated,
          position: 0,
          suggestion: stated.includes('0') ? stated.replace(/0/g, 'O') : undefined,
          term: { ...location, formula: term },
          message: `${side === 'reactants' ? 'Reactant' : 'Product'} ${t + 1} ('${term}'): Expected an element symbol but found '${stated}'`,
        },
      };
    }

    if (stated !== null && Number(stated) === 0) {
      return {
        ok: false,
        error: {
          kind: 'InvalidMultiplier',
          value: stated,
          position: 0,
          term: { ...location, formula: term },
          message: `Coefficient '${stated}' of ${side.slice(0, -1)} ${t + 1} must be positive`,
        },
      };
    }

    const parsed = parseFormula(formula);
    if (!parsed.ok) {
      return {
        ok: false,
        error: {
          ...parsed.error,
          term: { ...location, formula },
          message: `${side === 'reactants' ? 'Reactant' : 'Product'} ${t + 1} ('${formula}'): ${parsed.error.message}`,
        },
      };
    }

    const compound: Compound = { formula, composition: parsed.value };
    if (stated !== null) compound.statedCoefficient = Number(stated);
    compounds.push(compound);
  }

  return { ok: true, value: compounds };
}

/**
 * Split "A + B -> C + D" into reactant and product compounds.
 * Order is preserved; it fixes the column order of the matrix.
 */
export function parseEquation(text: string): Result<Equation, ParseError> {
  const separator = findSeparator(text);
  if (!separator) {
    return {
      ok: false,
      error: { kind: 'MissingSeparator', message: 'Use "->", "→", or "=" to separate reactants and products' },
    };
  }

  const rest = separator.position + separator.arrow.length;
  const extra = findSeparator(text, rest);
  if (extra) {
    return {
      ok: false,
      error: {
        kind: 'ExtraSeparator',
        separator: extra.arrow,
        position: extra.position,
        message: `Found a second separator '${extra.arrow}' at position ${extra.position}; an equation has exactly two sides`,
      },
    };
  }

  const left = text.slice(0, separator.position).trim();
  const right = text.slice(rest).trim();
  if (left === '') {
    return { ok: false, error: { kind: 'EmptyReactantSide', message: 'No reactants before the separator' } };
  }
  if (right === '') {
    return { ok: false, error: { kind: 'EmptyProductSide', message: 'No products after the separator' } };
  }

  const reactants = parseSide(left, 'reactants');
  if (!reactants.ok) return reactants;
  const products = parseSide(right, 'products');
  if (!products.ok) return products;

  return {
    ok: true,
    value: { reactants: reactants.value, products: products.value, arrow: separator.arrow },
  };
}

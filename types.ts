// Core types for equation balancing

import type { Rational } from 'src/utils/rational';

/**
 * A validated element symbol such as 'H', 'Na' or 'Og'.
 * Only produced by `isElementSymbol`, which checks the element table.
 */
export type ElementSymbol = string & { readonly __brand: 'ElementSymbol' };

/**
 * Atom counts for one compound after expanding groups and hydrates.
 * Keys are sorted; every count is >= 1. Missing elements count as 0.
 */
export type FormulaComposition = ReadonlyMap<ElementSymbol, number>;

export interface Compound {
  formula: string; // term text, trimmed, without a leading coefficient
  composition: FormulaComposition;
  statedCoefficient?: number; // leading integer the user typed, ignored when balancing
}

export type ArrowToken = '->' | '→' | '=';

export type Side = 'reactants' | 'products';

/**
 * Parsed equation. Immutable post-parse.
 */
export interface Equation {
  reactants: readonly Compound[];
  products: readonly Compound[];
  arrow: ArrowToken;
}

/**
 * Element-by-compound matrix over the rationals.
 * Rows follow `elements` (sorted), columns follow `species` (reactants then products).
 * Product columns hold negated counts.
 */
export interface StoichiometryMatrix {
  elements: readonly ElementSymbol[];
  species: readonly string[];
  reactantCount: number;
  rows: readonly (readonly Rational[])[];
}

export type RationalVector = readonly Rational[];

export type CoefficientVector = readonly number[];

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface TermLocation {
  side: Side;
  index: number; // 1-based position of the term on its side
  formula: string;
}

interface ErrorBase {
  message: string;
}

interface FormulaErrorBase extends ErrorBase {
  position: number; // character position in the formula (0-based)
  term?: TermLocation; // attached by the equation parser
}

export type FormulaError =
  | (FormulaErrorBase & { kind: 'EmptyFormula' })
  | (FormulaErrorBase & { kind: 'UnknownElement'; symbol: string })
  | (FormulaErrorBase & { kind: 'NumeralInPlaceOfSymbol'; numeral: string; suggestion?: string })
  | (FormulaErrorBase & { kind: 'InvalidCharacter'; char: string })
  | (FormulaErrorBase & { kind: 'InvalidMultiplier'; value: string })
  | (FormulaErrorBase & { kind: 'UnbalancedBrackets'; bracket: string });

export type EquationError =
  | (ErrorBase & { kind: 'MissingSeparator' })
  | (ErrorBase & { kind: 'ExtraSeparator'; separator: string; position: number })
  | (ErrorBase & { kind: 'EmptyReactantSide' })
  | (ErrorBase & { kind: 'EmptyProductSide' });

export type ParseError = FormulaError | EquationError;

export type SolveError =
  | (ErrorBase & { kind: 'NoSolution'; rank: number; columns: number })
  | (ErrorBase & { kind: 'AmbiguousSolution'; freeVariables: number })
  | (ErrorBase & { kind: 'DisconnectedSystem'; species: string[] })
  | (ErrorBase & { kind: 'NonPositiveCoefficient'; coefficients: string[] })
  | (ErrorBase & { kind: 'CoefficientOverflow'; coefficients: string[] });

export type BalanceError = ParseError | SolveError;

export type BalanceErrorKind = BalanceError['kind'];

/**
 * Intermediate values of coefficient normalization, kept for "show work".
 */
export interface NormalizationSteps {
  multiplier: bigint; // LCM of the nullspace denominators
  scaled: readonly bigint[]; // nullspace vector times multiplier
  divisor: bigint; // GCD of the scaled entries
  signFlipped: boolean;
}

export interface NormalizedCoefficients extends NormalizationSteps {
  coefficients: CoefficientVector;
}

/**
 * Read-only snapshots of each pipeline stage that was reached.
 */
export interface BalanceTrace {
  input: string;
  equation?: Equation;
  matrix?: StoichiometryMatrix;
  nullspace?: RationalVector;
  normalization?: NormalizationSteps;
  coefficients?: CoefficientVector;
}

export interface BalanceSuccess {
  ok: true;
  equation: Equation;
  coefficients: CoefficientVector;
  reactantCoefficients: CoefficientVector;
  productCoefficients: CoefficientVector;
  balanced: string;
  trace?: BalanceTrace;
}

export interface BalanceFailure {
  ok: false;
  error: BalanceError;
  trace?: BalanceTrace;
}

export type BalanceResult = BalanceSuccess | BalanceFailure;

export { balance } from 'src/balancer';
export type { BalanceOptions } from 'src/balancer';
export { parseFormula } from 'src/parsers/formula-parser';
export { parseEquation } from 'src/parsers/equation-parser';
export { buildMatrix } from 'src/utils/stoichiometry-matrix';
export { reduceToEchelonForm, solveNullspace } from 'src/utils/nullspace';
export type { EchelonForm } from 'src/utils/nullspace';
export { normalizeCoefficients } from 'src/utils/coefficient-normalizer';
export { Rational, gcd, lcm } from 'src/utils/rational';
export { checkConservation } from 'src/validators/conservation-validator';
export type { ConservationReport, ElementBalance } from 'src/validators/conservation-validator';
export { renderBalancedEquation } from 'src/generators/equation-renderer';
export { renderWork } from 'src/generators/work-renderer';
export { formatComposition } from 'src/generators/formula-formatter';
export { describeError } from 'src/diagnostics';
export { ELEMENTS, ATOMIC_NUMBERS, isElementSymbol } from 'src/constants';
export type {
  ArrowToken,
  BalanceError,
  BalanceErrorKind,
  BalanceFailure,
  BalanceResult,
  BalanceSuccess,
  BalanceTrace,
  CoefficientVector,
  Compound,
  ElementSymbol,
  Equation,
  EquationError,
  FormulaComposition,
  FormulaError,
  NormalizationSteps,
  NormalizedCoefficients,
  ParseError,
  RationalVector,
  Result,
  Side,
  SolveError,
  StoichiometryMatrix,
  TermLocation,
} from 'types';

import { describe, it, expect } from 'vitest';
import { balance } from 'src/balancer';
import { parseEquation } from 'src/parsers/equation-parser';
import { checkConservation } from 'src/validators/conservation-validator';
import { gcd } from 'src/utils/rational';
import type { BalanceSuccess } from 'types';

function balanced(text: string): BalanceSuccess {
  const result = balance(text);
  if (!result.ok) throw new Error(`expected ${text} to balance: ${result.error.message}`);
  return result;
}

const EQUATIONS = [
  'H2 + O2 -> H2O',
  'Fe + O2 = Fe2O3',
  'Al + H2SO4 → Al2(SO4)3 + H2',
  'CuSO4·5H2O -> CuSO4 + H2O',
  'C3H8 + O2 -> CO2 + H2O',
  'KMnO4 + HCl -> KCl + MnCl2 + H2O + Cl2',
  'Ca(OH)2 + H3PO4 -> Ca3(PO4)2 + H2O',
  'K4[Fe(CN)6] + H2SO4 + H2O -> K2SO4 + FeSO4 + (NH4)2SO4 + CO',
];

describe('balance', () => {
  it('should balance hydrogen combustion', () => {
    const result = balanced('H2 + O2 -> H2O');
    expect(result.reactantCoefficients).toEqual([2, 1]);
    expect(result.productCoefficients).toEqual([2]);
    expect(result.balanced).toBe('2H2 + O2 -> 2H2O');
  });

  it('should balance formulas whose last count is ten or more', () => {
    expect(balanced('P4O10 + H2O -> H3PO4').balanced).toBe('P4O10 + 6H2O -> 4H3PO4');
    expect(balanced('C4H10 + O2 -> CO2 + H2O').balanced).toBe('2C4H10 + 13O2 -> 8CO2 + 10H2O');
  });

  it('should keep the equals sign', () => {
    const result = balanced('Fe + O2 = Fe2O3');
    expect(result.reactantCoefficients).toEqual([4, 3]);
    expect(result.productCoefficients).toEqual([2]);
    expect(result.balanced).toBe('4Fe + 3O2 = 2Fe2O3');
  });

  it('should balance equations with groups', () => {
    const result = balanced('Al + H2SO4 → Al2(SO4)3 + H2');
    expect(result.reactantCoefficients).toEqual([2, 3]);
    expect(result.productCoefficients).toEqual([1, 3]);
    expect(result.balanced).toBe('2Al + 3H2SO4 → Al2(SO4)3 + 3H2');
  });

  it('should balance hydrates', () => {
    const result = balanced('CuSO4·5H2O -> CuSO4 + H2O');
    expect(result.reactantCoefficients).toEqual([1]);
    expect(result.productCoefficients).toEqual([1, 5]);
    expect(result.balanced).toBe('CuSO4·5H2O -> CuSO4 + 5H2O');
  });

  it('should balance larger equations', () => {
    expect(balanced('C3H8 + O2 -> CO2 + H2O').coefficients).toEqual([1, 5, 3, 4]);
    expect(balanced('KMnO4 + HCl -> KCl + MnCl2 + H2O + Cl2').balanced).toBe(
      '2KMnO4 + 16HCl -> 2KCl + 2MnCl2 + 8H2O + 5Cl2',
    );
  });

  it('should report a zero typed for the letter O', () => {
    const result = balance('H20 -> H2O');
    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'NumeralInPlaceOfSymbol', suggestion: 'H2O', term: { side: 'reactants', index: 1 } },
    });
  });

  it('should report equations without a solution', () => {
    expect(balance('Na -> Cl')).toMatchObject({ ok: false, error: { kind: 'NoSolution' } });
  });

  it('should report mixed-sign solutions', () => {
    expect(balance('H2 -> H2O + H2O2')).toMatchObject({
      ok: false,
      error: { kind: 'NonPositiveCoefficient', coefficients: ['-1', '-2', '1'] },
    });
  });

  it('should ignore coefficients already written in the input', () => {
    expect(balanced('3H2 + 7O2 -> H2O').balanced).toBe('2H2 + O2 -> 2H2O');
  });

  it('should attach a trace only when asked', () => {
    expect(balanced('H2 + O2 -> H2O').trace).toBeUndefined();

    const traced = balance('H2 + O2 -> H2O', { trace: true });
    expect(traced.trace?.nullspace?.map(String)).toEqual(['1', '1/2', '1']);
    expect(traced.trace?.normalization).toEqual({ multiplier: 2n, scaled: [2n, 1n, 2n], divisor: 1n, signFlipped: false });
    expect(traced.trace?.coefficients).toEqual([2, 1, 2]);
  });

  it('should trace as far as a failing request got', () => {
    const failed = balance('Na -> Cl', { trace: true });
    expect(failed.ok).toBe(false);
    expect(failed.trace?.matrix?.elements).toEqual(['Cl', 'Na']);
    expect(failed.trace?.nullspace).toBeUndefined();
  });

  describe('properties', () => {
    it.each(EQUATIONS)('conserves every element in %s', (text) => {
      const result = balanced(text);
      const report = checkConservation(result.equation, result.coefficients);
      expect(report.balanced).toBe(true);
      for (const entry of report.elements) {
        expect(entry.reactantTotal).toBe(entry.productTotal);
      }
    });

    it.each(EQUATIONS)('returns minimal positive integers for %s', (text) => {
      const { coefficients } = balanced(text);
      for (const c of coefficients) {
        expect(Number.isInteger(c) && c > 0).toBe(true);
      }
      expect(coefficients.reduce((acc, c) => gcd(acc, BigInt(c)), 0n)).toBe(1n);
    });

    it.each(EQUATIONS)('is deterministic for %s', (text) => {
      expect(balanced(text).coefficients).toEqual(balanced(text).coefficients);
    });

    it.each(EQUATIONS)('re-parses its own output for %s', (text) => {
      const result = balanced(text);
      const reparsed = parseEquation(result.balanced);
      expect(reparsed.ok).toBe(true);
      if (!reparsed.ok) return;

      const original = [...result.equation.reactants, ...result.equation.products];
      const again = [...reparsed.value.reactants, ...reparsed.value.products];
      expect(again.map((c) => Object.fromEntries(c.composition))).toEqual(
        original.map((c) => Object.fromEntries(c.composition)),
      );
      expect(again.map((c) => c.statedCoefficient ?? 1)).toEqual([...result.coefficients]);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { parseEquation } from 'src/parsers/equation-parser';
import { buildMatrix } from 'src/utils/stoichiometry-matrix';
import { reduceToEchelonForm, solveNullspace } from 'src/utils/nullspace';
import type { StoichiometryMatrix } from 'types';

function matrixOf(text: string): StoichiometryMatrix {
  const result = parseEquation(text);
  if (!result.ok) throw new Error(result.error.message);
  return buildMatrix(result.value);
}

function vectorOf(text: string): string[] {
  const result = solveNullspace(matrixOf(text));
  if (!result.ok) throw new Error(result.error.message);
  return result.value.map(String);
}

function errorOf(text: string) {
  const result = solveNullspace(matrixOf(text));
  if (result.ok) throw new Error(`expected ${text} to have no unique solution`);
  return result.error;
}

describe('reduceToEchelonForm', () => {
  it('should produce the reduced row-echelon form', () => {
    const { rows, pivotColumns } = reduceToEchelonForm(matrixOf('H2 + O2 -> H2O').rows);
    expect(rows.map((row) => row.map(String))).toEqual([
      ['1', '0', '-1'],
      ['0', '1', '-1/2'],
    ]);
    expect(pivotColumns).toEqual([0, 1]);
  });

  it('should not modify its input', () => {
    const matrix = matrixOf('H2 + O2 -> H2O');
    reduceToEchelonForm(matrix.rows);
    expect(matrix.rows[0]!.map(String)).toEqual(['2', '0', '-2']);
  });
});

describe('solveNullspace', () => {
  it('should set the free variable to 1', () => {
    expect(vectorOf('H2 + O2 -> H2O')).toEqual(['1', '1/2', '1']);
    expect(vectorOf('Fe + O2 = Fe2O3')).toEqual(['2', '3/2', '1']);
    expect(vectorOf('Al + H2SO4 → Al2(SO4)3 + H2')).toEqual(['2/3', '1', '1/3', '1']);
    expect(vectorOf('CuSO4·5H2O -> CuSO4 + H2O')).toEqual(['1/5', '1/5', '1']);
  });

  it('should report only the trivial solution', () => {
    expect(errorOf('Na -> Cl')).toMatchObject({ kind: 'NoSolution', rank: 2, columns: 2 });
  });

  it('should report more than one degree of freedom', () => {
    expect(errorOf('H2 + He -> H2 + He')).toMatchObject({ kind: 'AmbiguousSolution', freeVariables: 2 });
  });

  it('should report compounds forced to zero', () => {
    expect(errorOf('Na + Cl2 -> NaCl + Ar')).toMatchObject({ kind: 'DisconnectedSystem', species: ['Ar'] });
  });
});

import type { RationalVector, Result, SolveError, StoichiometryMatrix } from 'types';
import { Rational } from 'src/utils/rational';

export interface EchelonForm {
  rows: Rational[][];
  pivotColumns: number[];
}

/**
 * Gauss-Jordan elimination to reduced row-echelon form.
 * Pivots are the first non-zero entry found; arithmetic is exact.
 */
export function reduceToEchelonForm(matrix: readonly (readonly Rational[])[]): EchelonForm {
  const rows = matrix.map((row) => [...row]);
  const columnCount = rows[0]?.length ?? 0;
  const pivotColumns: number[] = [];
  let pivotRow = 0;

  for (let col = 0; col < columnCount && pivotRow < rows.length; col++) {
    let found = -1;
    for (let r = pivotRow; r < rows.length; r++) {
      if (!rows[r]![col]!.isZero()) {
        found = r;
        break;
      }
    }
    if (found === -1) continue;

    [rows[pivotRow], rows[found]] = [rows[found]!, rows[pivotRow]!];
    const pivot = rows[pivotRow]!;
    const pivotValue = pivot[col]!;
    for (let c = 0; c < columnCount; c++) {
      pivot[c] = pivot[c]!.div(pivotValue);
    }

    for (let r = 0; r < rows.length; r++) {
      if (r === pivotRow) continue;
      const row = rows[r]!;
      const factor = row[col]!;
      if (factor.isZero()) continue;
      for (let c = 0; c < columnCount; c++) {
        row[c] = row[c]!.sub(factor.mul(pivot[c]!));
      }
    }

    pivotColumns.push(col);
    pivotRow++;
  }

  return { rows, pivotColumns };
}

/**
 * Basis vector of the matrix's null space, with the single free variable set to 1.
 */
export function solveNullspace(matrix: StoichiometryMatrix): Result<RationalVector, SolveError> {
  const columns = matrix.species.length;
  const { rows, pivotColumns } = reduceToEchelonForm(matrix.rows);
  const rank = pivotColumns.length;
  const freeColumns: number[] = [];
  for (let c = 0; c < columns; c++) {
    if (!pivotColumns.includes(c)) freeColumns.push(c);
  }

  if (freeColumns.length === 0) {
    return {
      ok: false,
      error: {
        kind: 'NoSolution',
        rank,
        columns,
        message: 'Only the all-zero solution exists; the equation cannot be balanced as written',
      },
    };
  }
  if (freeColumns.length > 1) {
    return {
      ok: false,
      error: {
        kind: 'AmbiguousSolution',
        freeVariables: freeColumns.length,
        message: `The null space has ${freeColumns.length} dimensions; the coefficients are not unique`,
      },
    };
  }

  const free = freeColumns[0]!;
  const vector: Rational[] = new Array<Rational>(columns).fill(Rational.ZERO);
  vector[free] = Rational.ONE;
  pivotColumns.forEach((col, r) => {
    vector[col] = rows[r]![free]!.neg();
  });

  const zeroSpecies = matrix.species.filter((_, c) => vector[c]!.isZero());
  if (zeroSpecies.length > 0) {
    return {
      ok: false,
      error: {
        kind: 'DisconnectedSystem',
        species: zeroSpecies,
        message: `No balanced equation can include ${zeroSpecies.join(', ')}`,
      },
    };
  }

  return { ok: true, value: vector };
}

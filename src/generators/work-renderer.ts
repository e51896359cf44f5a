import { zip } from 'es-toolkit';
import type { BalanceTrace } from 'types';
import type { Rational } from 'src/utils/rational';
import { ATOMIC_NUMBERS } from 'src/constants';
import { reduceToEchelonForm } from 'src/utils/nullspace';
import { checkConservation } from 'src/validators/conservation-validator';
import { formatComposition } from 'src/generators/formula-formatter';

function formatTable(header: readonly string[], rows: readonly (readonly string[])[], labels: readonly string[]): string[] {
  const labelWidth = Math.max(0, ...labels.map((l) => l.length));
  const widths = header.map((h, c) => Math.max(h.length, ...rows.map((row) => (row[c] ?? '').length)));
  const line = (label: string, cells: readonly string[]) =>
    `  ${label.padEnd(labelWidth)}  ${cells.map((cell, c) => cell.padStart(widths[c] ?? 0)).join('  ')}`.trimEnd();
  return [line('', header), ...rows.map((row, r) => line(labels[r] ?? '', row))];
}

const formatVector = (values: readonly (Rational | bigint | number)[]) => `[${values.map(String).join(', ')}]`;

/**
 * Text for the "show work" command, one entry per line.
 * Stops after the last stage the trace reached.
 */
export function renderWork(trace: BalanceTrace): string[] {
  const { equation, matrix } = trace;
  if (!equation || !matrix) {
    return [`Could not parse the equation: ${trace.input}`];
  }

  const lines: string[] = [];
  lines.push(`Species: ${matrix.species.join(', ')}`);
  lines.push(
    `Compositions: ${[...equation.reactants, ...equation.products].map((c) => formatComposition(c.composition)).join(', ')}`,
  );
  lines.push(`Elements: ${matrix.elements.map((e) => `${e} (Z=${ATOMIC_NUMBERS[e] ?? '?'})`).join(', ')}`);
  lines.push('');
  lines.push('Matrix:');
  lines.push(...formatTable(matrix.species, matrix.rows.map((row) => row.map(String)), matrix.elements));

  const echelon = reduceToEchelonForm(matrix.rows);
  lines.push('');
  lines.push('Reduced row-echelon form:');
  lines.push(
    ...formatTable(
      matrix.species,
      echelon.rows.map((row) => row.map(String)),
      echelon.rows.map((_, r) => `r${r + 1}`),
    ),
  );
  lines.push('');

  if (!trace.nullspace) {
    lines.push('No nullspace vector found - equation cannot be balanced');
    return lines;
  }
  lines.push(`Nullspace vector: ${formatVector(trace.nullspace)}`);

  const steps = trace.normalization;
  if (!steps) return lines;
  lines.push(`Multiplier (LCM of denominators): ${steps.multiplier}`);
  lines.push(`Raw coefficients: ${formatVector(steps.scaled)}`);
  lines.push(`Divisor (GCD): ${steps.divisor}`);
  if (steps.signFlipped) lines.push('Signs flipped to make every coefficient positive');

  const coefficients = trace.coefficients;
  if (!coefficients) return lines;
  lines.push(`Final coefficients: ${formatVector(coefficients)}`);
  lines.push(
    `Pairs: ${zip(matrix.species, coefficients)
      .map(([species, n]) => `${n} ${species}`)
      .join(', ')}`,
  );

  lines.push('');
  lines.push('Conservation check:');
  for (const entry of checkConservation(equation, coefficients).elements) {
    const mark = entry.reactantTotal === entry.productTotal ? '=' : '≠';
    lines.push(`  ${entry.element}: ${entry.reactantTotal} ${mark} ${entry.productTotal}`);
  }

  return lines;
}

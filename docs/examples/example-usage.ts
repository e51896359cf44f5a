import { balance, parseFormula, renderWork, describeError } from 'index';

console.log('chem-balance Examples');
console.log('=====================\n');

const composition = parseFormula('K4[Fe(CN)6]');
if (composition.ok) {
  console.log('K4[Fe(CN)6] =', Object.fromEntries(composition.value));
  console.log();
}

for (const equation of ['H2 + O2 -> H2O', 'Al + H2SO4 → Al2(SO4)3 + H2', 'CuSO4·5H2O -> CuSO4 + H2O', 'H20 -> H2O']) {
  const result = balance(equation);
  console.log(`${equation.padEnd(30)} => ${result.ok ? result.balanced : describeError(result.error)}`);
}
console.log();

// Show the work behind one result
const traced = balance('Fe + O2 = Fe2O3', { trace: true });
if (traced.trace) {
  for (const line of renderWork(traced.trace)) console.log(line);
}

import type { FormulaComposition } from 'types';

function formatPart(symbol: string, count: number) {
  return count === 1 ? symbol : `${symbol}${count}`;
}

/**
 * Hill notation: C first, then H, then the rest alphabetically.
 * Without carbon every element is alphabetical, H included.
 */
export function formatComposition(composition: FormulaComposition): string {
  const counts = new Map<string, number>(composition);
  const parts: string[] = [];

  if (counts.has('C')) {
    for (const first of ['C', 'H']) {
      const n = counts.get(first);
      if (n) {
        parts.push(formatPart(first, n));
        counts.delete(first);
      }
    }
  }
  for (const el of [...counts.keys()].sort()) {
    parts.push(formatPart(el, counts.get(el) ?? 0));
  }

  return parts.join('');
}

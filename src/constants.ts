import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ElementSymbol } from 'types';

const elementSchema = z.object({
  symbol: z.string().regex(/^[A-Z][a-z]*$/),
  atomicNumber: z.number().int().positive(),
});

export type ElementEntry = z.infer<typeof elementSchema>;

function loadElements(): ElementEntry[] {
  const path = fileURLToPath(new URL('./data/elements.json', import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return z.array(elementSchema).parse(raw);
}

export const ELEMENTS: readonly ElementEntry[] = loadElements();

export const ATOMIC_NUMBERS: Readonly<Record<string, number>> = Object.fromEntries(
  ELEMENTS.map((e) => [e.symbol, e.atomicNumber]),
);

const KNOWN_SYMBOLS = new Set(ELEMENTS.map((e) => e.symbol));

export function isElementSymbol(text: string): text is ElementSymbol {
  return KNOWN_SYMBOLS.has(text);
}

// Accepted between the parts of a hydrate, e.g. CuSO4·5H2O
export const HYDRATE_SEPARATORS: ReadonlySet<string> = new Set(['·', '•', '.', '*']);

export const ARROW_TOKENS = ['->', '→', '='] as const;

export const OPENING_BRACKETS: Readonly<Record<string, string>> = { '(': ')', '[': ']' };
export const CLOSING_BRACKETS: ReadonlySet<string> = new Set([')', ']']);

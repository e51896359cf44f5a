import type { ElementSymbol, FormulaComposition, FormulaError, Result } from 'types';
import {
  CLOSING_BRACKETS,
  HYDRATE_SEPARATORS,
  OPENING_BRACKETS,
  isElementSymbol,
} from 'src/constants';

type Counts = Map<ElementSymbol, number>;

interface CountToken {
  run: string;
  position: number;
  afterElement: boolean;
}

const isDigit = (ch: string) => ch >= '0' && ch <= '9';
const isUpper = (ch: string) => ch >= 'A' && ch <= 'Z';
const isLower = (ch: string) => ch >= 'a' && ch <= 'z';
const isSpace = (ch: string) => /\s/.test(ch);

function fail(error: FormulaError): { ok: false; error: FormulaError } {
  return { ok: false, error };
}

function addCount(target: Counts, symbol: ElementSymbol, n: number): boolean {
  const next = (target.get(symbol) ?? 0) + n;
  if (!Number.isSafeInteger(next)) return false;
  target.set(symbol, next);
  return true;
}

/**
 * Replace the zeros of a digit run with the letter O, e.g. H20 -> H2O.
 * Only the digit at `zeroOffset` is replaced when given.
 */
function suggestLetter(text: string, start: number, run: string, zeroOffset?: number): string | undefined {
  if (!run.includes('0')) return undefined;
  const fixed = zeroOffset === undefined
    ? run.replace(/0/g, 'O')
    : run.slice(0, zeroOffset) + 'O' + run.slice(zeroOffset + 1);
  return text.slice(0, start) + fixed + text.slice(start + run.length);
}

/**
 * Parse one formula such as H2O, Al2(SO4)3, K4[Fe(CN)6] or CuSO4·5H2O
 * into element counts. Pure; the first problem found is returned.
 */
export function parseFormula(text: string): Result<FormulaComposition, FormulaError> {
  if (text.trim() === '') {
    return fail({ kind: 'EmptyFormula', position: 0, message: 'Formula is empty' });
  }

  const total: Counts = new Map();
  let i = 0;
  let segmentIndex = 0;

  const readDigits = (): string => {
    const start = i;
    while (i < text.length && isDigit(text[i]!)) i++;
    return text.slice(start, i);
  };

  const toMultiplier = (run: string, position: number): Result<number, FormulaError> => {
    const value = Number(run);
    if (value === 0 || !Number.isSafeInteger(value)) {
      return fail({
        kind: 'InvalidMultiplier',
        value: run,
        position,
        message: `Invalid multiplier '${run}' at position ${position}`,
      });
    }
    return { ok: true, value };
  };

  // Each pass handles one hydrate segment; the first has no leading multiplier.
  while (i <= text.length) {
    while (i < text.length && isSpace(text[i]!)) i++;
    const segmentStart = i;
    let multiplier = 1;

    if (segmentIndex > 0 && i < text.length && isDigit(text[i]!)) {
      const position = i;
      const parsed = toMultiplier(readDigits(), position);
      if (!parsed.ok) return parsed;
      multiplier = parsed.value;
    }

    const frames: Counts[] = [new Map()];
    const openers: { char: string; position: number }[] = [];
    let lastCount: CountToken | null = null;

    // Reads the count after an element or a closing bracket (default 1).
    const readCount = (afterElement: boolean): Result<{ value: number; token: CountToken | null }, FormulaError> => {
      if (i >= text.length || !isDigit(text[i]!)) {
        return { ok: true, value: { value: 1, token: null } };
      }
      const position = i;
      const run = readDigits();
      const parsed = toMultiplier(run, position);
      if (!parsed.ok) return parsed;
      if (run.startsWith('0')) {
        return fail({
          kind: 'NumeralInPlaceOfSymbol',
          numeral: run,
          position,
          suggestion: suggestLetter(text, position, run, 0),
          message: `Count '${run}' at position ${position} starts with zero; did you mean the letter O?`,
        });
      }
      return { ok: true, value: { value: parsed.value, token: { run, position, afterElement } } };
    };

    while (i < text.length) {
      const ch = text[i]!;

      if (isSpace(ch)) {
        i++;
        continue;
      }

      if (HYDRATE_SEPARATORS.has(ch)) {
        if (openers.length > 0) {
          return fail({
            kind: 'InvalidCharacter',
            char: ch,
            position: i,
            message: `Hydrate separator '${ch}' at position ${i} is inside brackets`,
          });
        }
        break;
      }

      lastCount = null;
      const top = frames[frames.length - 1]!;

      if (isUpper(ch)) {
        const position = i;
        i++;
        while (i < text.length && isLower(text[i]!)) i++;
        const symbol = text.slice(position, i);
        if (!isElementSymbol(symbol)) {
          return fail({
            kind: 'UnknownElement',
            symbol,
            position,
            message: `Unknown element '${symbol}' at position ${position}`,
          });
        }
        const count = readCount(true);
        if (!count.ok) return count;
        lastCount = count.value.token;
        if (!addCount(top, symbol, count.value.value)) {
          return fail({ kind: 'InvalidMultiplier', value: String(count.value.value), position, message: `Count for '${symbol}' is too large` });
        }
        continue;
      }

      if (isLower(ch)) {
        const position = i;
        while (i < text.length && isLower(text[i]!)) i++;
        const symbol = text.slice(position, i);
        return fail({
          kind: 'UnknownElement',
          symbol,
          position,
          message: `Unknown element '${symbol}' at position ${position}; symbols start with an uppercase letter`,
        });
      }

      if (isDigit(ch)) {
        const position = i;
        const run = readDigits();
        return fail({
          kind: 'NumeralInPlaceOfSymbol',
          numeral: run,
          position,
          suggestion: suggestLetter(text, position, run),
          message: `Expected an element symbol at position ${position} but found '${run}'`,
        });
      }

      if (OPENING_BRACKETS[ch] !== undefined) {
        openers.push({ char: ch, position: i });
        frames.push(new Map());
        i++;
        continue;
      }

      if (CLOSING_BRACKETS.has(ch)) {
        const opener = openers.pop();
        if (!opener || OPENING_BRACKETS[opener.char] !== ch) {
          return fail({
            kind: 'UnbalancedBrackets',
            bracket: ch,
            position: i,
            message: `Unmatched '${ch}' at position ${i}`,
          });
        }
        const position = i;
        i++;
        const group = frames.pop()!;
        const count = readCount(false);
        if (!count.ok) return count;
        lastCount = count.value.token;
        const parent = frames[frames.length - 1]!;
        for (const [symbol, n] of group) {
          if (!addCount(parent, symbol, n * count.value.value)) {
            return fail({ kind: 'InvalidMultiplier', value: String(count.value.value), position, message: `Group count at position ${position} is too large` });
          }
        }
        continue;
      }

      return fail({
        kind: 'InvalidCharacter',
        char: ch,
        position: i,
        message: `Invalid character '${ch}' at position ${i}`,
      });
    }

    const unclosed = openers[openers.length - 1];
    if (unclosed) {
      return fail({
        kind: 'UnbalancedBrackets',
        bracket: unclosed.char,
        position: unclosed.position,
        message: `Unclosed '${unclosed.char}' at position ${unclosed.position}`,
      });
    }

    // A trailing count like the 20 in H20 is almost always a zero typed for an O.
    // Counts from 10 up (P4O10, C4H10) are read as written.
    const trailing = lastCount;
    if (trailing && trailing.afterElement && /^[2-9]0$/.test(trailing.run)) {
      return fail({
        kind: 'NumeralInPlaceOfSymbol',
        numeral: trailing.run,
        position: trailing.position,
        suggestion: suggestLetter(text, trailing.position, trailing.run, trailing.run.length - 1),
        message: `Count '${trailing.run}' at position ${trailing.position} looks like a number used in place of a letter`,
      });
    }

    const counts = frames[0]!;
    if (counts.size === 0) {
      return fail({
        kind: 'EmptyFormula',
        position: segmentStart,
        message: `No elements found at position ${segmentStart}`,
      });
    }
    for (const [symbol, n] of counts) {
      if (!addCount(total, symbol, n * multiplier)) {
        return fail({ kind: 'InvalidMultiplier', value: String(multiplier), position: segmentStart, message: 'Hydrate multiplier is too large' });
      }
    }

    if (i >= text.length) break;
    i++; // past the separator
    segmentIndex++;
  }

  const sorted: Counts = new Map([...total.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  return { ok: true, value: sorted };
}

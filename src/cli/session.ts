import type { BalanceSuccess } from 'types';
import { balance } from 'src/balancer';
import { describeError } from 'src/diagnostics';
import { renderWork } from 'src/generators/work-renderer';

export type MessageLevel = 'plain' | 'info' | 'success' | 'warning' | 'error';

export interface SessionMessage {
  level: MessageLevel;
  text: string;
}

export interface SessionReply {
  quit: boolean;
  messages: SessionMessage[];
}

export const BANNER = [
  'Enter an unbalanced chemical equation (e.g., "H2 + O2 -> H2O"). To quit, enter "q"',
  'Note: Use letter "O" for oxygen, not the number "0"',
];

export const HELP = [
  'Commands:',
  '  <equation>   balance it, e.g. "Al + H2SO4 → Al2(SO4)3 + H2"',
  '  show work    show the matrix and vectors behind the last balanced equation',
  '  help         show this message',
  '  q            quit',
  'Separators: "->", "→" or "=". Groups: () and []. Hydrates: CuSO4·5H2O',
];

const QUIT_WORDS = new Set(['q', 'quit', 'exit']);

const reply = (messages: SessionMessage[], quit = false): SessionReply => ({ quit, messages });
const plainLines = (lines: readonly string[]): SessionMessage[] => lines.map((text): SessionMessage => ({ level: 'plain', text }));

/**
 * Command dispatch for the interactive prompt.
 * Holds the last successful result for "show work"; a failed request clears it.
 */
export class BalancerSession {
  private lastResult: BalanceSuccess | null = null;

  get last(): BalanceSuccess | null {
    return this.lastResult;
  }

  handle(line: string): SessionReply {
    const input = line.trim();
    const command = input.toLowerCase();

    if (QUIT_WORDS.has(command)) {
      return reply([{ level: 'plain', text: 'Good-bye' }], true);
    }
    if (input === '') {
      return reply([{ level: 'warning', text: 'Please enter an unbalanced chemical equation or "q" to quit' }]);
    }
    if (command === 'help') {
      return reply(plainLines(HELP));
    }
    if (command === 'show work') {
      const trace = this.lastResult?.trace;
      if (!trace) {
        return reply([{ level: 'warning', text: 'No previous balanced equation to show work for.' }]);
      }
      return reply(plainLines(renderWork(trace)));
    }

    const result = balance(input, { trace: true });
    if (!result.ok) {
      this.lastResult = null;
      return reply([{ level: 'error', text: describeError(result.error) }]);
    }

    this.lastResult = result;
    return reply([
      { level: 'success', text: 'Balanced equation:' },
      { level: 'plain', text: result.balanced },
      { level: 'info', text: 'To show work, enter "show work". To quit, enter "q".' },
    ]);
  }
}

import { Command } from 'commander';
import { input } from '@inquirer/prompts';
import { balance } from 'src/balancer';
import { describeError } from 'src/diagnostics';
import { renderWork } from 'src/generators/work-renderer';
import { logger } from 'src/cli/logger';
import { BANNER, BalancerSession, type SessionReply } from 'src/cli/session';

export interface CliOptions {
  showWork?: boolean;
  json?: boolean;
}

function printReply(reply: SessionReply): void {
  for (const { level, text } of reply.messages) {
    logger[level](text);
  }
}

export function runOnce(equation: string, options: CliOptions): boolean {
  const result = balance(equation, { trace: options.showWork ?? false });
  logger.debug(`balancing "${equation}"`);

  if (options.json) {
    logger.json(result);
    return result.ok;
  }

  if (result.ok) {
    logger.plain(result.balanced);
  } else {
    logger.error(describeError(result.error));
  }
  if (options.showWork && result.trace) {
    logger.header('Work');
    renderWork(result.trace).forEach((line) => logger.plain(line));
  }
  return result.ok;
}

export async function runInteractive(session = new BalancerSession()): Promise<void> {
  BANNER.forEach((line) => logger.plain(line));

  for (;;) {
    let line: string;
    try {
      line = await input({ message: 'Enter equation:' });
    } catch (err) {
      // Ctrl-C
      if (err instanceof Error && err.name === 'ExitPromptError') {
        logger.plain('Good-bye');
        return;
      }
      throw err;
    }

    const reply = session.handle(line);
    printReply(reply);
    if (reply.quit) return;
    logger.divider();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('chem-balance')
    .description('Balance chemical equations with exact rational arithmetic')
    .version('0.1.0')
    .argument('[equation...]', 'equation to balance, e.g. "H2 + O2 -> H2O"; omit for the interactive prompt')
    .option('--show-work', 'print the matrix and the vectors behind the result')
    .option('--json', 'print the result as JSON')
    .action(async (words: string[], options: CliOptions) => {
      if (words.length === 0) {
        await runInteractive();
        return;
      }
      if (!runOnce(words.join(' '), options)) {
        process.exitCode = 1;
      }
    });

  return program;
}

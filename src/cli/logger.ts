import chalk from 'chalk';

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Map) return Object.fromEntries(value);
  return value;
}

export const logger = {
  plain: (message: string) => console.log(message),
  info: (message: string) => console.log(chalk.blue('ℹ'), message),
  success: (message: string) => console.log(chalk.green('✓'), message),
  warning: (message: string) => console.log(chalk.yellow('⚠'), message),
  error: (message: string) => console.error(chalk.red('✗'), message),
  debug: (message: string) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('🔍'), message);
    }
  },
  header: (title: string) => {
    console.log();
    console.log(chalk.bold.cyan(`═══ ${title} ═══`));
    console.log();
  },
  divider: () => {
    console.log(chalk.gray('='.repeat(50)));
  },
  json: (data: unknown) => {
    console.log(JSON.stringify(data, jsonReplacer, 2));
  },
};

import { createProgram } from 'src/cli/program';
import { logger } from 'src/cli/logger';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });

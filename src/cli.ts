#!/usr/bin/env node

import { CommanderError } from 'commander';
import { makeLaunchCommand } from './commands/launch.js';
import { formatError, isLauncherError } from './lib/errors.js';
import { createLogger } from './lib/log.js';

const program = makeLaunchCommand();

try {
  await program.parseAsync(process.argv);
} catch (err) {
  // Commander has already printed help, the version or its own usage error
  if (err instanceof CommanderError) {
    process.exit(err.exitCode);
  }
  const logger = createLogger();
  if (isLauncherError(err)) {
    logger.error(formatError(err));
  } else if (err instanceof Error) {
    logger.error(err.message);
  } else {
    logger.error(String(err));
  }
  process.exit(1);
}

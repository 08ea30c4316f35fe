import chalk from 'chalk';

const LOG_PREFIX = '[dotenv-exec]';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  stream?: NodeJS.WritableStream;
}

/** Everything goes to stderr: stdout belongs to the child. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const stream = options.stream ?? process.stderr;
  const write = (line: string): void => {
    stream.write(`${line}\n`);
  };

  return {
    debug(message) {
      if (verbose) write(chalk.dim(`${LOG_PREFIX} ${message}`));
    },
    warn(message) {
      write(chalk.yellow(`${LOG_PREFIX} Warning: ${message}`));
    },
    error(message) {
      write(chalk.red(`${LOG_PREFIX} ${message}`));
    },
  };
}

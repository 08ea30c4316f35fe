import { Command } from 'commander';
import { getVersion, TOOL_NAME } from '../lib/config.js';
import { executeLaunch } from '../lib/command-ops/launch-ops.js';
import { createLogger } from '../lib/log.js';

interface LaunchCommandOptions {
  file?: string;
  environment?: string;
  strict?: boolean;
  verbose?: boolean;
}

export function makeLaunchCommand(): Command {
  const cmd = new Command(TOOL_NAME)
    .description(
      'Run a command with variables loaded from .env files. ' +
      'Reads .env from the current directory unless --file is given.'
    )
    .version(getVersion())
    .argument('[command...]', 'command to run, followed by its arguments')
    .option('-f, --file <path>', 'custom environment file (must exist)')
    .option('-e, --environment <name>', 'named environment file, <environments dir>/<name>.env (must exist)')
    .option('--strict', 'pass only the loaded variables to the command')
    .option('--no-strict', 'pass the ambient environment through as well')
    .option('--verbose', 'log loaded files and the resolved command on stderr')
    .passThroughOptions()
    .exitOverride()
    .showSuggestionAfterError()
    .action(async (argv: string[], opts: LaunchCommandOptions) => {
      process.exitCode = await executeLaunch(
        {
          argv,
          file: opts.file,
          environment: opts.environment,
          strict: opts.strict,
        },
        { logger: createLogger({ verbose: opts.verbose }) },
      );
    });

  return cmd;
}

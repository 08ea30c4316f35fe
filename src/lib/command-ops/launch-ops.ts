import { getEnvironmentsDir } from '../config.js';
import { discoverTables } from '../discovery.js';
import { ambientFromProcess, merge } from '../env/index.js';
import { loadUserConfig } from '../global-config.js';
import { linkageFor } from '../linkage.js';
import { createLogger } from '../log.js';
import type { Logger } from '../log.js';
import { runChild } from '../process.js';
import type { ChildRunner } from '../process.js';

export interface LaunchOptions {
  /** Command token followed by its arguments, as typed after the options. */
  argv: string[];
  file?: string;
  environment?: string;
  /** Undefined when neither `--strict` nor `--no-strict` was given. */
  strict?: boolean;
  cwd?: string;
}

export interface LaunchDeps {
  env?: NodeJS.ProcessEnv;
  run?: ChildRunner;
  logger?: Logger;
  platform?: NodeJS.Platform;
}

/**
 * Load the environment files, merge them over the ambient environment and
 * run the command. Resolves with the child's exit code.
 */
export async function executeLaunch(options: LaunchOptions, deps: LaunchDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? createLogger();
  const run = deps.run ?? runChild;
  const cwd = options.cwd ?? process.cwd();

  const loaded = discoverTables({
    cwd,
    file: options.file,
    environment: options.environment,
    environmentsDir: getEnvironmentsDir(env),
  });
  for (const { source, path, table } of loaded) {
    logger.debug(`${source}: ${table.size} variable(s) from ${path}`);
  }

  const result = merge(
    ambientFromProcess(env),
    loaded.map(l => l.table),
    { strict: options.strict ?? loadUserConfig().strict ?? false, argv: options.argv },
  );
  logger.debug(`strict mode ${result.strict ? 'on' : 'off'}, ${result.env.length} variable(s) passed`);
  logger.debug(`running ${[result.command, ...result.args].join(' ')}`);

  // Looked up on the launcher's PATH: a strict child environment may have none
  return run({
    command: result.command,
    args: result.args,
    env: result.env,
    cwd,
    searchPath: env.PATH,
    linkage: linkageFor(deps.platform ?? process.platform),
  });
}

import { ConfigError } from '../errors.js';
import { COMMAND_KEY, CONTROL_VARIABLES, STRICT_ALLOWLIST, STRICT_KEY } from './keys.js';
import type { EnvironmentTable } from './table.js';

export interface Invocation {
  /** `--strict` as given on the command line. */
  strict: boolean;
  /** Command token followed by its arguments. */
  argv: readonly string[];
}

export interface MergeResult {
  /** `KEY=VALUE` strings for the child: ambient first, then loaded variables. */
  env: string[];
  command: string;
  args: string[];
  strict: boolean;
}

/** Combine tables lowest precedence first; a later assignment moves the key to the end. */
export function layerTables(tables: readonly EnvironmentTable[]): Map<string, string> {
  const effective = new Map<string, string>();
  for (const table of tables) {
    for (const [name, value] of table.entries()) {
      effective.delete(name);
      effective.set(name, value);
    }
  }
  return effective;
}

export function keyOf(entry: string): string | undefined {
  const eq = entry.indexOf('=');
  return eq > 0 ? entry.slice(0, eq) : undefined;
}

export function ambientFromProcess(env: NodeJS.ProcessEnv): string[] {
  const out: string[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out.push(`${key}=${value}`);
  }
  return out;
}

/**
 * Decide what the child sees and what it runs.
 *
 * Non-strict: the ambient environment minus control variables, then every
 * loaded variable. Strict (flag, or a non-empty `DOTENV_STRICT` in the
 * files): loaded variables only. `DOTENV_COMMAND` replaces the command and
 * pushes every invocation token into its arguments.
 */
export function merge(
  ambient: readonly string[],
  tables: readonly EnvironmentTable[],
  invocation: Invocation,
): MergeResult {
  const effective = layerTables(tables);

  const alias = effective.get(COMMAND_KEY);
  effective.delete(COMMAND_KEY);

  const override = effective.get(STRICT_KEY);
  effective.delete(STRICT_KEY);

  const strict = (override !== undefined && override !== '') || invocation.strict;

  let command: string | undefined;
  let args: string[];
  if (alias !== undefined && alias !== '') {
    command = alias;
    args = [...invocation.argv];
  } else {
    [command, ...args] = invocation.argv;
  }

  if (command === undefined || command === '') {
    throw new ConfigError('No command provided. Usage: dotenv-exec [options] <command> [args...]');
  }

  const env: string[] = [];
  for (const entry of ambient) {
    const key = keyOf(entry);
    if (key === undefined || CONTROL_VARIABLES.has(key)) continue;
    if (strict && !STRICT_ALLOWLIST.has(key)) continue;
    env.push(entry);
  }
  for (const [name, value] of effective) {
    env.push(`${name}=${value}`);
  }

  return { env, command, args, strict };
}

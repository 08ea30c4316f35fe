import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import which from 'which';
import { SpawnError } from './errors.js';
import { keyOf } from './env/index.js';
import { noopLinkage } from './linkage.js';
import type { ChildLinkage } from './linkage.js';

export interface RunChildOptions {
  command: string;
  args: readonly string[];
  /** `KEY=VALUE` strings; a later duplicate wins. */
  env: readonly string[];
  cwd?: string;
  /** Directories searched for a bare command name, as in `PATH`. */
  searchPath?: string;
  linkage?: ChildLinkage;
}

export type ChildRunner = (options: RunChildOptions) => Promise<number>;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export function toEnvObject(entries: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of entries) {
    const key = keyOf(entry);
    if (key !== undefined) env[key] = entry.slice(key.length + 1);
  }
  return env;
}

/** Shell convention: a signal death exits with 128 + the signal number. */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const signum = SIGNAL_NUMBERS.get(signal);
    if (signum !== undefined) return 128 + signum;
  }
  return 1;
}

/**
 * Locate a bare command name on `searchPath`. A name containing a path
 * separator, or one that is not found, is returned unchanged.
 */
export function resolveCommand(command: string, searchPath: string | undefined): string {
  if (searchPath === undefined || /[\\/]/.test(command)) return command;
  return which.sync(command, { path: searchPath, nothrow: true }) ?? command;
}

/** Spawn with inherited stdio and resolve with the exit code to propagate. */
export const runChild: ChildRunner = (options) => {
  return new Promise((resolve, reject) => {
    const child = spawn(resolveCommand(options.command, options.searchPath), [...options.args], {
      cwd: options.cwd,
      env: toEnvObject(options.env),
      stdio: 'inherit',
    });
    const detach = (options.linkage ?? noopLinkage).attach(child);

    child.once('error', (err) => {
      detach();
      reject(new SpawnError(options.command, err));
    });
    child.once('close', (code, signal) => {
      detach();
      resolve(exitCodeFor(code, signal));
    });
  });
};

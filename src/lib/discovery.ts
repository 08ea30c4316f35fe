import { join, resolve } from 'node:path';
import { DEFAULT_ENV_FILE, ENVIRONMENT_FILE_EXTENSION, expandHome } from './config.js';
import { loadEnvFile } from './env-loader.js';
import { validateEnvironmentName } from './validation.js';
import type { EnvironmentTable } from './env/index.js';

export type TableSource = 'environment' | 'file' | 'default';

export interface LoadedTable {
  source: TableSource;
  path: string;
  table: EnvironmentTable;
}

export interface DiscoveryOptions {
  cwd: string;
  /** `--file`: required, relative to `cwd`, `~/` expanded. */
  file?: string;
  /** `--environment`: required, looked up in `environmentsDir`. */
  environment?: string;
  environmentsDir: string;
}

export function namedEnvironmentPath(name: string, environmentsDir: string): string {
  validateEnvironmentName(name);
  return join(environmentsDir, `${name}${ENVIRONMENT_FILE_EXTENSION}`);
}

/**
 * Load the tables for one invocation, lowest precedence first: the named
 * environment, then the local layer (`--file`, or `.env` in `cwd` when it
 * exists).
 */
export function discoverTables(options: DiscoveryOptions): LoadedTable[] {
  const loaded: LoadedTable[] = [];

  if (options.environment !== undefined) {
    const path = namedEnvironmentPath(options.environment, options.environmentsDir);
    loaded.push({ source: 'environment', path, table: loadEnvFile(path) });
  }

  if (options.file !== undefined) {
    const path = resolve(options.cwd, expandHome(options.file));
    loaded.push({ source: 'file', path, table: loadEnvFile(path) });
  } else {
    const path = join(options.cwd, DEFAULT_ENV_FILE);
    loaded.push({ source: 'default', path, table: loadEnvFile(path, { optional: true }) });
  }

  return loaded;
}

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import envPaths from 'env-paths';
import { parse as parseYaml } from 'yaml';
import { createLogger } from './log.js';
import { UserConfigSchema, type UserConfig } from './types.js';

const paths = envPaths('dotenv-exec', { suffix: '' });

let _cache: UserConfig | undefined;

export function getUserConfigPath(): string {
  return join(paths.config, 'config.yaml');
}

/**
 * Read `config.yaml` from the user config directory. A missing file means
 * defaults; a corrupt one is reported and ignored.
 */
export function loadUserConfig(): UserConfig {
  if (_cache !== undefined) return _cache;

  const file = getUserConfigPath();
  if (!existsSync(file)) {
    _cache = {};
    return _cache;
  }

  try {
    const raw: unknown = parseYaml(readFileSync(file, 'utf8'));
    _cache = UserConfigSchema.parse(raw ?? {});
  } catch (err) {
    createLogger().warn(
      `user config is corrupt, ignoring: ${file} (${err instanceof Error ? err.message : String(err)})`
    );
    _cache = {};
  }
  return _cache;
}

export function resetGlobalConfigCache(): void {
  _cache = undefined;
}

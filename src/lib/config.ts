import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { HOME_KEY } from './env/keys.js';
import { loadUserConfig } from './global-config.js';
import { PackageManifestSchema } from './types.js';
import type { PackageManifest } from './types.js';

// ── Constants ──

export const TOOL_NAME = 'dotenv-exec';
export const DEFAULT_ENV_FILE = '.env';
export const DEFAULT_ENVIRONMENTS_DIR_NAME = '.dotenv';
export const ENVIRONMENT_FILE_EXTENSION = '.env';

// ── Caches ──

let _packageRoot: string | null = null;

function readManifest(pkgPath: string): PackageManifest | null {
  try {
    const parsed = PackageManifestSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf8')));
    return parsed.success ? parsed.data : null;
  } catch {
    // not valid JSON
    return null;
  }
}

// ── Package Root ──

/**
 * Walk up from this file to the package.json that declares the
 * `dotenv-exec` bin. Works from dist/lib/config.js and src/lib/config.ts.
 */
export function getPackageRoot(): string {
  if (_packageRoot) return _packageRoot;

  const thisFile = fileURLToPath(import.meta.url);
  let dir = dirname(thisFile);
  while (true) {
    const pkgPath = join(dir, 'package.json');
    if (existsSync(pkgPath) && readManifest(pkgPath)?.bin?.[TOOL_NAME]) {
      _packageRoot = dir;
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: two levels up from this file (standard npm layout)
  _packageRoot = dirname(dirname(dirname(thisFile)));
  return _packageRoot;
}

export function getVersion(): string {
  return readManifest(join(getPackageRoot(), 'package.json'))?.version ?? '0.0.0';
}

// ── Paths ──

/** Expand a leading `~` or `~/` to the home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/**
 * Directory holding named environments (`<dir>/<name>.env`):
 * 1. DOTENV_HOME env var
 * 2. environmentsDir in the user config
 * 3. ~/.dotenv
 */
export function getEnvironmentsDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[HOME_KEY]?.trim();
  if (fromEnv) return expandHome(fromEnv);

  const configured = loadUserConfig().environmentsDir;
  if (configured) return expandHome(configured);

  return join(homedir(), DEFAULT_ENVIRONMENTS_DIR_NAME);
}

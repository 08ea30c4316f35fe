import { ConfigError } from './errors.js';

const ENVIRONMENT_NAME_RE = /^[a-zA-Z0-9][a-zA-Z0-9._-]{0,127}$/;
const RESERVED_NAMES = new Set(['.', '..', '']);

/** A named environment maps to `<dir>/<name>.env`, so the name must stay a plain file name. */
export function validateEnvironmentName(name: string): void {
  if (RESERVED_NAMES.has(name)) {
    throw new ConfigError(`"${name}" cannot be used as an environment name`);
  }
  if (!ENVIRONMENT_NAME_RE.test(name)) {
    throw new ConfigError(
      `Invalid environment name "${name}". Names must start with alphanumeric, ` +
      `contain only letters, digits, dots, hyphens, underscores, and be 1-128 chars.`
    );
  }
}

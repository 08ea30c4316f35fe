import { readFileSync } from 'node:fs';
import { errorCode, IoError, MalformedEntryError, NotFoundError } from './errors.js';
import { EnvironmentTable, parse } from './env/index.js';

export interface LoadEnvOptions {
  /** A missing file yields an empty table instead of `NotFoundError`. */
  optional?: boolean;
}

export function loadEnvFile(envPath: string, options: LoadEnvOptions = {}): EnvironmentTable {
  let content: string;
  try {
    content = readFileSync(envPath, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      if (options.optional) return EnvironmentTable.empty();
      throw new NotFoundError(envPath);
    }
    throw new IoError(envPath, err);
  }

  try {
    return parse(content);
  } catch (err) {
    if (err instanceof MalformedEntryError) throw err.withPath(envPath);
    throw err;
  }
}

// ── Error taxonomy ──
//
// Every failure the launcher reports is one of these. Callers match on
// `kind`; only the CLI turns them into messages and exit codes.

export class NotFoundError extends Error {
  readonly kind = 'NotFound' as const;

  constructor(readonly path: string) {
    super(`file not found: ${path}`);
    this.name = 'NotFoundError';
  }
}

export class MalformedEntryError extends Error {
  readonly kind = 'MalformedEntry' as const;

  constructor(
    readonly line: number,
    readonly reason: string,
    readonly path?: string,
  ) {
    super(path ? `${path}:${line}: ${reason}` : `line ${line}: ${reason}`);
    this.name = 'MalformedEntryError';
  }

  /** Same error, attributed to the file it was read from. */
  withPath(path: string): MalformedEntryError {
    return new MalformedEntryError(this.line, this.reason, path);
  }
}

export class IoError extends Error {
  readonly kind = 'IOError' as const;

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`unable to read file ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'IoError';
  }
}

export class ConfigError extends Error {
  readonly kind = 'ConfigError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SpawnError extends Error {
  readonly kind = 'SpawnError' as const;

  constructor(
    readonly command: string,
    cause: unknown,
  ) {
    super(`unable to execute command "${command}": ${describeCause(cause)}`, { cause });
    this.name = 'SpawnError';
  }
}

export type LauncherError =
  | NotFoundError
  | MalformedEntryError
  | IoError
  | ConfigError
  | SpawnError;

export function isLauncherError(err: unknown): err is LauncherError {
  return (
    err instanceof NotFoundError ||
    err instanceof MalformedEntryError ||
    err instanceof IoError ||
    err instanceof ConfigError ||
    err instanceof SpawnError
  );
}

export function formatError(err: LauncherError): string {
  switch (err.kind) {
    case 'NotFound':
      return `Environment file does not exist: ${err.path}`;
    case 'MalformedEntry':
      return `Malformed entry at ${err.path ? `${err.path}:` : 'line '}${err.line}: ${err.reason}`;
    case 'IOError':
      return `Can't load variables: ${err.message}`;
    case 'ConfigError':
      return err.message;
    case 'SpawnError':
      return err.message;
    default: {
      const unreachable: never = err;
      return String(unreachable);
    }
  }
}

/** Narrow a Node system error to its `code`, if it has one. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

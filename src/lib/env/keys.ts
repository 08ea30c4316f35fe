/** Names the launcher interprets itself. None of them reach the child. */
export const COMMAND_KEY = 'DOTENV_COMMAND';
export const STRICT_KEY = 'DOTENV_STRICT';
export const HOME_KEY = 'DOTENV_HOME';

export const CONTROL_VARIABLES: ReadonlySet<string> = new Set([COMMAND_KEY, STRICT_KEY, HOME_KEY]);

/** Ambient names kept in strict mode. Strict means exactly the file contents. */
export const STRICT_ALLOWLIST: ReadonlySet<string> = new Set<string>();

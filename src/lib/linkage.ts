import type { ChildProcess } from 'node:child_process';

/**
 * Ties a child's lifetime to ours. `attach` returns the function that
 * undoes it once the child has exited.
 */
export interface ChildLinkage {
  attach(child: ChildProcess): () => void;
}

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export const noopLinkage: ChildLinkage = {
  attach: () => () => {},
};

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/** Relay termination signals to the child and take it down if we exit first. */
export const signalForwardingLinkage: ChildLinkage = {
  attach(child) {
    const forward = (signal: NodeJS.Signals): void => {
      if (isRunning(child)) child.kill(signal);
    };
    const onExit = (): void => {
      if (isRunning(child)) child.kill('SIGTERM');
    };

    for (const signal of FORWARDED_SIGNALS) process.on(signal, forward);
    process.on('exit', onExit);

    return () => {
      for (const signal of FORWARDED_SIGNALS) process.off(signal, forward);
      process.off('exit', onExit);
    };
  },
};

export function linkageFor(platform: NodeJS.Platform): ChildLinkage {
  return platform === 'win32' ? noopLinkage : signalForwardingLinkage;
}

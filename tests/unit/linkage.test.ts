import { describe, it, expect, vi, afterEach } from 'vitest';
import { ChildProcess } from 'node:child_process';
import {
  FORWARDED_SIGNALS,
  linkageFor,
  noopLinkage,
  signalForwardingLinkage,
} from '../../src/lib/linkage.js';

describe('signalForwardingLinkage', () => {
  let detach: (() => void) | undefined;

  afterEach(() => {
    detach?.();
    detach = undefined;
    vi.restoreAllMocks();
  });

  it('forwards termination signals to a running child', () => {
    const child = new ChildProcess();
    const kill = vi.spyOn(child, 'kill').mockReturnValue(true);
    const before = new Set(process.listeners('SIGINT'));

    detach = signalForwardingLinkage.attach(child);
    const listener = process.listeners('SIGINT').find(l => !before.has(l));
    listener?.('SIGINT');

    expect(kill).toHaveBeenCalledWith('SIGINT');
  });

  it('terminates the child when this process exits', () => {
    const child = new ChildProcess();
    const kill = vi.spyOn(child, 'kill').mockReturnValue(true);
    const before = new Set(process.listeners('exit'));

    detach = signalForwardingLinkage.attach(child);
    const listener = process.listeners('exit').find(l => !before.has(l));
    listener?.(0);

    expect(kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('leaves an exited child alone', () => {
    const child = new ChildProcess();
    Object.defineProperty(child, 'exitCode', { value: 0 });
    const kill = vi.spyOn(child, 'kill').mockReturnValue(true);
    const before = new Set(process.listeners('SIGTERM'));

    detach = signalForwardingLinkage.attach(child);
    const listener = process.listeners('SIGTERM').find(l => !before.has(l));
    expect(listener).toBeDefined();
    listener?.('SIGTERM');

    expect(kill).not.toHaveBeenCalled();
  });

  it('removes its listeners on detach', () => {
    const counts = FORWARDED_SIGNALS.map(s => process.listenerCount(s));
    const exitCount = process.listenerCount('exit');

    const undo = signalForwardingLinkage.attach(new ChildProcess());
    expect(FORWARDED_SIGNALS.map(s => process.listenerCount(s))).toEqual(counts.map(c => c + 1));

    undo();
    expect(FORWARDED_SIGNALS.map(s => process.listenerCount(s))).toEqual(counts);
    expect(process.listenerCount('exit')).toBe(exitCount);
  });
});

describe('linkageFor', () => {
  it('forwards signals on POSIX platforms', () => {
    expect(linkageFor('linux')).toBe(signalForwardingLinkage);
    expect(linkageFor('darwin')).toBe(signalForwardingLinkage);
  });

  it('does nothing on Windows', () => {
    expect(linkageFor('win32')).toBe(noopLinkage);
    const before = process.listenerCount('SIGINT');
    noopLinkage.attach(new ChildProcess())();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});

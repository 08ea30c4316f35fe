import { describe, it, expect, beforeEach } from 'vitest';
import { Writable } from 'node:stream';
import chalk from 'chalk';
import { createLogger } from '../../src/lib/log.js';

function capture(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { stream, lines };
}

describe('createLogger', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('drops debug output unless verbose', () => {
    const { stream, lines } = capture();
    createLogger({ stream }).debug('hidden');
    expect(lines).toEqual([]);
  });

  it('prefixes every line', () => {
    const { stream, lines } = capture();
    const logger = createLogger({ verbose: true, stream });
    logger.debug('loaded');
    logger.warn('careful');
    logger.error('boom');
    expect(lines).toEqual([
      '[dotenv-exec] loaded\n',
      '[dotenv-exec] Warning: careful\n',
      '[dotenv-exec] boom\n',
    ]);
  });
});

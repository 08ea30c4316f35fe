import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadEnvFile } from '../../src/lib/env-loader.js';
import { IoError, MalformedEntryError, NotFoundError } from '../../src/lib/errors.js';

describe('loadEnvFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'dotenv-exec-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns an empty table when an optional file does not exist', () => {
    const table = loadEnvFile(join(tmpDir, '.env'), { optional: true });
    expect(table.size).toBe(0);
  });

  it('throws NotFoundError when a required file does not exist', () => {
    const envPath = join(tmpDir, 'missing.env');
    expect(() => loadEnvFile(envPath)).toThrow(NotFoundError);
    expect(() => loadEnvFile(envPath)).toThrow(`file not found: ${envPath}`);
  });

  it('parses valid .env file', () => {
    const envPath = join(tmpDir, '.env');
    writeFileSync(envPath, 'FOO=bar\nBAZ=qux\nAPI_KEY=test-secret\n');
    expect(loadEnvFile(envPath).toObject()).toEqual({
      FOO: 'bar',
      BAZ: 'qux',
      API_KEY: 'test-secret',
    });
  });

  it('handles empty .env file', () => {
    const envPath = join(tmpDir, '.env');
    writeFileSync(envPath, '');
    expect(loadEnvFile(envPath).size).toBe(0);
  });

  it('handles comments and empty lines', () => {
    const envPath = join(tmpDir, '.env');
    writeFileSync(envPath, '# comment\n\nKEY=value\n# another comment\n');
    expect(loadEnvFile(envPath).toObject()).toEqual({ KEY: 'value' });
  });

  it('throws IoError for a path that cannot be read as a file', () => {
    const dirPath = join(tmpDir, 'dir.env');
    mkdirSync(dirPath);
    let caught: unknown;
    try {
      loadEnvFile(dirPath, { optional: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(IoError);
    expect(caught).toMatchObject({ kind: 'IOError', path: dirPath });
  });

  it('reports malformed entries with the file path and line', () => {
    const envPath = join(tmpDir, '.env');
    writeFileSync(envPath, 'A=1\nB="open\n');
    let caught: unknown;
    try {
      loadEnvFile(envPath);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedEntryError);
    expect(caught).toMatchObject({ line: 2, path: envPath });
    expect(caught instanceof Error && caught.message).toBe(`${envPath}:2: unterminated " quote`);
  });
});

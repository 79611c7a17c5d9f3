import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadDotEnv, parseDotEnv, parseDotEnvLine } from '../src/env.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('parseDotEnv', () => {
  it('reads keys, quotes, comments and export prefixes', () => {
    expect(
      parseDotEnv(['# pallet setup', 'PALLET_CAPACITY=30', 'export LOG_LEVEL="debug"', "ARTIFACT_PREFIX='PANEL'", 'broken line', ''].join('\n'))
    ).toEqual({ PALLET_CAPACITY: '30', LOG_LEVEL: 'debug', ARTIFACT_PREFIX: 'PANEL' });
  });
});

describe('parseDotEnvLine', () => {
  it('keeps unmatched quotes and inner equals signs', () => {
    expect(parseDotEnvLine('  REFERENCE_PATTERN = ^BUILD=.*$ ')).toEqual(['REFERENCE_PATTERN', '^BUILD=.*$']);
    expect(parseDotEnvLine('ARTIFACT_PREFIX="PANEL')).toEqual(['ARTIFACT_PREFIX', '"PANEL']);
    expect(parseDotEnvLine('EMPTY=')).toEqual(['EMPTY', '']);
    expect(parseDotEnvLine('# LOG_LEVEL=debug')).toBeNull();
    expect(parseDotEnvLine('=value')).toBeNull();
  });
});

describe('loadDotEnv', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('applies missing keys without overriding existing ones', async () => {
    const envPath = path.join(tempDir, '.env');
    await fs.writeFile(envPath, 'PALLET_CAPACITY=30\nLOG_LEVEL=debug\n', 'utf8');
    const env: NodeJS.ProcessEnv = { LOG_LEVEL: 'warn' };

    const applied = await loadDotEnv(envPath, env);

    expect(applied).toEqual(['PALLET_CAPACITY']);
    expect(env).toEqual({ PALLET_CAPACITY: '30', LOG_LEVEL: 'warn' });
  });

  it('does nothing without a .env file', async () => {
    const env: NodeJS.ProcessEnv = {};
    expect(await loadDotEnv(path.join(tempDir, '.env'), env)).toEqual([]);
    expect(env).toEqual({});
  });
});

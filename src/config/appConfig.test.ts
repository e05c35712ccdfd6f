import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigurationError, loadConfig } from './appConfig';

const ENV_KEYS = ['MEDIA_LIBSQL_URL', 'TURSO_DATABASE_URL', 'MEDIA_LIBSQL_AUTH_TOKEN', 'TURSO_AUTH_TOKEN', 'MEDIA_MIGRATIONS_PATH'];

describe('loadConfig', () => {
  let tempDir: string;
  let savedEnv: Map<string, string | undefined>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-config-'));
    savedEnv = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    for (const [key, value] of savedEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', () => {
    expect(loadConfig(path.join(tempDir, 'missing.json'))).toEqual({
      media: {
        libsql: { url: 'file:./data/media.db', authToken: undefined },
        migrationsPath: './sql',
      },
    });
  });

  it('reads overrides from the config file', () => {
    const configPath = path.join(tempDir, 'app.config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({ media: { libsql: { url: 'file:/tmp/library.db', authToken: 'test-token' }, migrationsPath: './migrations' } }),
    );

    expect(loadConfig(configPath).media).toEqual({
      libsql: { url: 'file:/tmp/library.db', authToken: 'test-token' },
      migrationsPath: './migrations',
    });
  });

  it('prefers environment variables over the config file', () => {
    const configPath = path.join(tempDir, 'app.config.json');
    fs.writeFileSync(configPath, JSON.stringify({ media: { libsql: { url: 'file:/tmp/library.db' } } }));
    vi.stubEnv('MEDIA_LIBSQL_URL', ' libsql://media.example.test ');
    vi.stubEnv('TURSO_AUTH_TOKEN', 'test-secret');

    expect(loadConfig(configPath).media.libsql).toEqual({
      url: 'libsql://media.example.test',
      authToken: 'test-secret',
    });
  });

  it('rejects a blank database url', () => {
    vi.stubEnv('MEDIA_LIBSQL_URL', '   ');

    expect(() => loadConfig(path.join(tempDir, 'missing.json'))).toThrow(ConfigurationError);
  });

  it('rejects an unparsable config file', () => {
    const configPath = path.join(tempDir, 'app.config.json');
    fs.writeFileSync(configPath, '{ not json');

    expect(() => loadConfig(configPath)).toThrow(`Unable to parse config file: ${configPath}`);
  });
});

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createClient } from '@libsql/client';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { applyMigrations, splitStatements } from './migrations';

describe('splitStatements', () => {
  it('splits on statement-ending semicolons and drops blanks', () => {
    expect(splitStatements('CREATE TABLE a (x INTEGER);\n\nCREATE TABLE b (y TEXT);\n')).toEqual([
      'CREATE TABLE a (x INTEGER)',
      'CREATE TABLE b (y TEXT)',
    ]);
  });
});

describe('applyMigrations', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-sql-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('applies sql files in lexical order', async () => {
    fs.writeFileSync(path.join(tempDir, '002_seed.sql'), "INSERT INTO notes (body) VALUES ('hello');\n");
    fs.writeFileSync(path.join(tempDir, '001_schema.sql'), 'CREATE TABLE notes (body TEXT);\n');
    fs.writeFileSync(path.join(tempDir, 'README.md'), 'ignored');
    const client = createClient({ url: ':memory:' });

    try {
      const applied = await applyMigrations(client, tempDir);
      const result = await client.execute('SELECT body FROM notes');

      expect(applied).toEqual(['001_schema.sql', '002_seed.sql']);
      expect(result.rows.map((row) => row.body)).toEqual(['hello']);
    } finally {
      client.close();
    }
  });

  it('reports a missing directory', async () => {
    const client = createClient({ url: ':memory:' });
    const missing = path.join(tempDir, 'nope');

    try {
      await expect(applyMigrations(client, missing)).rejects.toThrow(`Unable to read SQL directory at ${missing}`);
    } finally {
      client.close();
    }
  });
});

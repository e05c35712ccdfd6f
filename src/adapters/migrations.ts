import fs from 'node:fs/promises';
import path from 'node:path';

import type { Client } from '@libsql/client';

import { createLogger } from '../utils/logger';

const log = createLogger('migrations');

export function splitStatements(contents: string): string[] {
  return contents
    .split(/;\s*(?:\n|$)/)
    .map((statement) => statement.trim())
    .filter(Boolean);
}

/** Applies every `.sql` file of `directory` in lexical order and returns the applied file names. */
export async function applyMigrations(client: Client, directory: string): Promise<string[]> {
  const sqlDir = path.resolve(directory);
  const files = await fs
    .readdir(sqlDir)
    .then((entries) => entries.filter((file) => file.endsWith('.sql')).sort())
    .catch((error) => {
      throw new Error(`Unable to read SQL directory at ${sqlDir}: ${error instanceof Error ? error.message : String(error)}`);
    });

  for (const file of files) {
    const contents = await fs.readFile(path.join(sqlDir, file), 'utf-8');
    log.info({ file }, 'Applying migration');
    for (const statement of splitStatements(contents)) {
      await client.execute(statement);
    }
  }

  return files;
}

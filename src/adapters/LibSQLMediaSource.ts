import { type Client, createClient, type InValue, type ResultSet, type Row, type Value } from '@libsql/client';

import { createLogger } from '../utils/logger';
import type { MediaCollection, MediaCursor, MediaSource, QuerySelection } from './MediaSource';

const log = createLogger('libsql-media-source');

export interface LibSQLMediaSourceOptions {
  url: string;
  authToken?: string;
}

interface CollectionTable {
  table: string;
  nativeOrder: string | null;
}

const COLLECTION_TABLES: Record<MediaCollection['kind'], CollectionTable> = {
  songs: { table: 'audio_media', nativeOrder: null },
  playlists: { table: 'audio_playlists', nativeOrder: '_id ASC' },
  playlistMembers: { table: 'audio_playlist_members', nativeOrder: 'play_order ASC' },
};

export class LibSQLMediaSource implements MediaSource {
  private readonly ready: Promise<void>;

  constructor(private readonly client: Client) {
    this.ready = this.client.execute('PRAGMA foreign_keys = ON').then(() => undefined);
    void this.ready.catch((error: unknown) => {
      log.warn({ error }, 'Media source setup failed');
    });
  }

  static fromOptions(options: LibSQLMediaSourceOptions): LibSQLMediaSource {
    return new LibSQLMediaSource(createClient({ url: options.url, authToken: options.authToken }));
  }

  async query(
    collection: MediaCollection,
    selection: QuerySelection | null,
    sortOrder: string | null,
  ): Promise<MediaCursor | null> {
    const { sql, args } = buildQuery(collection, selection, sortOrder);
    try {
      await this.ready;
      const result = await this.client.execute({ sql, args });
      return new LibSQLCursor(result);
    } catch (error) {
      log.warn({ error, collection: collection.kind, sql }, 'Media query failed');
      return null;
    }
  }

  close(): void {
    this.client.close();
  }
}

export function buildQuery(
  collection: MediaCollection,
  selection: QuerySelection | null,
  sortOrder: string | null,
): { sql: string; args: InValue[] } {
  const { table, nativeOrder } = COLLECTION_TABLES[collection.kind];
  const clauses: string[] = [];
  const args: InValue[] = [];

  if (collection.kind === 'playlistMembers') {
    clauses.push('playlist_id = ?');
    args.push(collection.playlistId);
  }
  if (selection) {
    clauses.push(`(${selection.clause})`);
    args.push(...selection.args);
  }

  let sql = `SELECT * FROM ${table}`;
  if (clauses.length) {
    sql += ` WHERE ${clauses.join(' AND ')}`;
  }
  const order = sortOrder ?? nativeOrder;
  if (order) {
    sql += ` ORDER BY ${order}`;
  }
  return { sql, args };
}

export class LibSQLCursor implements MediaCursor {
  private rows: Row[];
  private readonly columns: string[];
  private position = -1;
  private released = false;

  constructor(result: ResultSet) {
    this.rows = result.rows;
    this.columns = result.columns;
  }

  hasRows(): boolean {
    return this.rows.length > 0;
  }

  advance(): boolean {
    this.assertOpen();
    if (this.position < this.rows.length) {
      this.position += 1;
    }
    return this.position < this.rows.length;
  }

  columnOffset(name: string): number {
    return this.columns.indexOf(name);
  }

  getText(offset: number): string | null {
    const value = this.cell(offset);
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
      return String(value);
    }
    return null;
  }

  getInt(offset: number): number | null {
    const value = this.cell(offset);
    if (typeof value === 'number') {
      return Number.isFinite(value) ? Math.trunc(value) : null;
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
    }
    return null;
  }

  release(): void {
    this.released = true;
    this.rows = [];
  }

  isReleased(): boolean {
    return this.released;
  }

  private cell(offset: number): Value | undefined {
    this.assertOpen();
    const row = this.rows[this.position];
    if (!row) {
      throw new Error('Cursor is not positioned on a row');
    }
    if (offset < 0 || offset >= this.columns.length) {
      throw new RangeError(`Column offset ${offset} is out of range`);
    }
    return row[offset];
  }

  private assertOpen(): void {
    if (this.released) {
      throw new Error('Cursor has already been released');
    }
  }
}

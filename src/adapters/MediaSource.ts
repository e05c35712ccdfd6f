export type MediaCollection =
  | { kind: 'songs' }
  | { kind: 'playlists' }
  | { kind: 'playlistMembers'; playlistId: number };

export interface QuerySelection {
  clause: string;
  args: Array<string | number>;
}

/**
 * Row-by-row view over one query's result set. Positioned before the first row until
 * `advance()` is called; must be released exactly once by whoever acquired it.
 */
export interface MediaCursor {
  hasRows(): boolean;
  advance(): boolean;
  /** Returns -1 when the result set has no column of that name. */
  columnOffset(name: string): number;
  getText(offset: number): string | null;
  getInt(offset: number): number | null;
  release(): void;
}

export interface MediaSource {
  /** Resolves to `null` when the source has no result to offer (unavailable, failed query). */
  query(
    collection: MediaCollection,
    selection: QuerySelection | null,
    sortOrder: string | null,
  ): Promise<MediaCursor | null>;
}

export function readText(cursor: MediaCursor, offset: number): string {
  return readOptionalText(cursor, offset) ?? '';
}

export function readOptionalText(cursor: MediaCursor, offset: number): string | null {
  return offset < 0 ? null : cursor.getText(offset);
}

export function readInt(cursor: MediaCursor, offset: number): number {
  if (offset < 0) {
    return 0;
  }
  return cursor.getInt(offset) ?? 0;
}

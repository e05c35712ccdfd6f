import type { MediaCursor } from '../adapters/MediaSource';

export enum ScanContext {
  LIBRARY = 'library',
  PLAYLIST = 'playlist',
}

export type SongField =
  | 'id'
  | 'title'
  | 'artist'
  | 'album'
  | 'year'
  | 'track'
  | 'composer'
  | 'duration'
  | 'size'
  | 'path'
  | 'createdAt'
  | 'updatedAt';

export type PlaylistField = 'id' | 'name' | 'createdAt' | 'updatedAt';

export type SongOffsets = Record<SongField, number>;
export type PlaylistOffsets = Record<PlaylistField, number>;

const LIBRARY_SONG_COLUMNS: Record<SongField, string> = {
  id: '_id',
  title: 'title',
  artist: 'artist',
  album: 'album',
  year: 'year',
  track: 'track',
  composer: 'composer',
  duration: 'duration',
  size: '_size',
  path: '_data',
  createdAt: 'date_added',
  updatedAt: 'date_modified',
};

// In the membership view `_id` is the membership row; the song itself is `audio_id`.
const PLAYLIST_SONG_COLUMNS: Record<SongField, string> = {
  ...LIBRARY_SONG_COLUMNS,
  id: 'audio_id',
};

export const SONG_COLUMNS: Record<ScanContext, Record<SongField, string>> = {
  [ScanContext.LIBRARY]: LIBRARY_SONG_COLUMNS,
  [ScanContext.PLAYLIST]: PLAYLIST_SONG_COLUMNS,
};

export const PLAYLIST_COLUMNS: Record<PlaylistField, string> = {
  id: '_id',
  name: 'name',
  createdAt: 'date_added',
  updatedAt: 'date_modified',
};

export const IS_MUSIC_COLUMN = 'is_music';

export function resolveSongOffsets(cursor: MediaCursor, context: ScanContext): SongOffsets {
  const columns = SONG_COLUMNS[context];
  const offset = (field: SongField): number => cursor.columnOffset(columns[field]);
  return {
    id: offset('id'),
    title: offset('title'),
    artist: offset('artist'),
    album: offset('album'),
    year: offset('year'),
    track: offset('track'),
    composer: offset('composer'),
    duration: offset('duration'),
    size: offset('size'),
    path: offset('path'),
    createdAt: offset('createdAt'),
    updatedAt: offset('updatedAt'),
  };
}

export function resolvePlaylistOffsets(cursor: MediaCursor): PlaylistOffsets {
  const offset = (field: PlaylistField): number => cursor.columnOffset(PLAYLIST_COLUMNS[field]);
  return {
    id: offset('id'),
    name: offset('name'),
    createdAt: offset('createdAt'),
    updatedAt: offset('updatedAt'),
  };
}

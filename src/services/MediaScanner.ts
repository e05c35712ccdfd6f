import {
  type MediaCollection,
  type MediaCursor,
  type MediaSource,
  type QuerySelection,
  readInt,
  readOptionalText,
  readText,
} from '../adapters/MediaSource';
import { createPlaylist, type Playlist } from '../models/Playlist';
import { createSong, type Song } from '../models/Song';
import {
  IS_MUSIC_COLUMN,
  resolvePlaylistOffsets,
  resolveSongOffsets,
  ScanContext,
  type SongOffsets,
} from './columnLayout';

export const PLAYABLE_SELECTION: QuerySelection = {
  clause: `${IS_MUSIC_COLUMN} != 0`,
  args: [],
};

export const SONG_SORT_ORDER = 'title ASC, artist ASC';

/**
 * Maps rows of the media source into Song and Playlist records.
 * Every query's cursor is released before the owning operation returns.
 */
export class MediaScanner {
  constructor(private readonly source: MediaSource) {}

  async scanSongs(): Promise<Song[]> {
    return this.collectSongs({ kind: 'songs' }, SONG_SORT_ORDER, ScanContext.LIBRARY);
  }

  async scanPlaylists(): Promise<Playlist[]> {
    const cursor = await this.source.query({ kind: 'playlists' }, null, null);
    if (!cursor) {
      return [];
    }
    try {
      if (!cursor.hasRows()) {
        return [];
      }
      const offsets = resolvePlaylistOffsets(cursor);
      const playlists: Playlist[] = [];
      while (cursor.advance()) {
        const id = readInt(cursor, offsets.id);
        const name = readText(cursor, offsets.name);
        const createdAt = readInt(cursor, offsets.createdAt);
        const updatedAt = readInt(cursor, offsets.updatedAt);
        const songs = await this.getSongsFromPlaylist(id);
        playlists.push(createPlaylist({ id, name, createdAt, updatedAt, songs }));
      }
      return playlists;
    } finally {
      cursor.release();
    }
  }

  async getSongsFromPlaylist(playlistId: number): Promise<Song[]> {
    return this.collectSongs({ kind: 'playlistMembers', playlistId }, null, ScanContext.PLAYLIST);
  }

  private async collectSongs(
    collection: MediaCollection,
    sortOrder: string | null,
    context: ScanContext,
  ): Promise<Song[]> {
    const cursor = await this.source.query(collection, PLAYABLE_SELECTION, sortOrder);
    if (!cursor) {
      return [];
    }
    try {
      if (!cursor.hasRows()) {
        return [];
      }
      const offsets = resolveSongOffsets(cursor, context);
      const songs: Song[] = [];
      while (cursor.advance()) {
        songs.push(mapSongRow(cursor, offsets));
      }
      return songs;
    } finally {
      cursor.release();
    }
  }
}

export function mapSongRow(cursor: MediaCursor, offsets: SongOffsets): Song {
  return createSong({
    id: readInt(cursor, offsets.id),
    title: readText(cursor, offsets.title),
    artist: readText(cursor, offsets.artist),
    album: readText(cursor, offsets.album),
    year: readOptionalText(cursor, offsets.year),
    track: readInt(cursor, offsets.track),
    composer: readOptionalText(cursor, offsets.composer),
    duration: readInt(cursor, offsets.duration),
    size: readInt(cursor, offsets.size),
    path: readOptionalText(cursor, offsets.path),
    createdAt: readInt(cursor, offsets.createdAt),
    updatedAt: readInt(cursor, offsets.updatedAt),
  });
}

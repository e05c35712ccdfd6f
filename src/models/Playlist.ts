import { createIdentity, type RecordIdentity } from './MediaRecord';
import type { Song } from './Song';

export interface Playlist extends RecordIdentity {
  name: string;
  songs: Song[];
}

export function createPlaylist(fields: Partial<Playlist> = {}, now: number = Date.now()): Playlist {
  const identity = createIdentity(now);
  return {
    id: fields.id ?? identity.id,
    createdAt: fields.createdAt ?? identity.createdAt,
    updatedAt: fields.updatedAt ?? identity.updatedAt,
    name: fields.name ?? '',
    songs: fields.songs ?? [],
  };
}

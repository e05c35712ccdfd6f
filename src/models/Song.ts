import { createIdentity, type RecordIdentity } from './MediaRecord';

export interface Song extends RecordIdentity {
  title: string;
  artist: string;
  album: string;
  composer: string | null;
  year: string | null;
  track: number;
  duration: number;
  size: number;
  path: string | null;
}

/** Fields left out or passed as `undefined` take their defaults. */
export function createSong(fields: Partial<Song> = {}, now: number = Date.now()): Song {
  const identity = createIdentity(now);
  return {
    id: fields.id ?? identity.id,
    createdAt: fields.createdAt ?? identity.createdAt,
    updatedAt: fields.updatedAt ?? identity.updatedAt,
    title: fields.title ?? '',
    artist: fields.artist ?? '',
    album: fields.album ?? '',
    composer: fields.composer ?? null,
    year: fields.year ?? null,
    track: fields.track ?? 0,
    duration: fields.duration ?? 0,
    size: fields.size ?? 0,
    path: fields.path ?? null,
  };
}

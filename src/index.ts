export { LibSQLCursor, LibSQLMediaSource } from './adapters/LibSQLMediaSource';
export type { LibSQLMediaSourceOptions } from './adapters/LibSQLMediaSource';
export { readInt, readOptionalText, readText } from './adapters/MediaSource';
export type { MediaCollection, MediaCursor, MediaSource, QuerySelection } from './adapters/MediaSource';
export { applyMigrations } from './adapters/migrations';
export { ConfigurationError, loadConfig } from './config/appConfig';
export type { AppConfig, MediaConfig, MediaLibSQLConfig } from './config/appConfig';
export { createIdentity, EMPTY_RECORD_TEXT, RecordEncodingError, serializeRecord } from './models/MediaRecord';
export type { ErrorReporter, RecordEncoder, RecordIdentity, SerializeOptions } from './models/MediaRecord';
export { createPlaylist } from './models/Playlist';
export type { Playlist } from './models/Playlist';
export { createSong } from './models/Song';
export type { Song } from './models/Song';
export { ScanContext } from './services/columnLayout';
export { MediaScanner, PLAYABLE_SELECTION, SONG_SORT_ORDER } from './services/MediaScanner';

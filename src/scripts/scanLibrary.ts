import dotenv from 'dotenv';

import { LibSQLMediaSource } from '../adapters/LibSQLMediaSource';
import { loadConfig } from '../config/appConfig';
import { type RecordIdentity, serializeRecord } from '../models/MediaRecord';
import { MediaScanner } from '../services/MediaScanner';
import { logger } from '../utils/logger';
import { parseScanCommand, type ScanCommand } from './scanArgs';

dotenv.config();

async function scan(scanner: MediaScanner, command: ScanCommand): Promise<RecordIdentity[]> {
  switch (command.kind) {
    case 'songs':
      return scanner.scanSongs();
    case 'playlists':
      return scanner.scanPlaylists();
    case 'playlist':
      return scanner.getSongsFromPlaylist(command.playlistId);
  }
}

async function main(): Promise<void> {
  const command = parseScanCommand(process.argv.slice(2));
  const config = loadConfig();
  const source = LibSQLMediaSource.fromOptions(config.media.libsql);

  try {
    const records = await scan(new MediaScanner(source), command);
    for (const record of records) {
      console.log(serializeRecord(record));
    }
  } finally {
    source.close();
  }
}

main().catch((error) => {
  logger.error({ error }, 'Failed to scan media library');
  process.exitCode = 1;
});

export type ScanCommand =
  | { kind: 'songs' }
  | { kind: 'playlists' }
  | { kind: 'playlist'; playlistId: number };

export const USAGE = 'Usage: scanLibrary <songs | playlists | playlist <id>>';

const PLAYLIST_ID_PATTERN = /^\d+$/;

export function parseScanCommand(args: string[]): ScanCommand {
  const [command, value] = args;
  switch (command) {
    case 'songs':
      return { kind: 'songs' };
    case 'playlists':
      return { kind: 'playlists' };
    case 'playlist': {
      if (value === undefined || !PLAYLIST_ID_PATTERN.test(value)) {
        throw new Error(`Invalid playlist id: ${value ?? '(missing)'}. ${USAGE}`);
      }
      return { kind: 'playlist', playlistId: Number(value) };
    }
    default:
      throw new Error(USAGE);
  }
}

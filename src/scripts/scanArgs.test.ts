import { describe, expect, it } from 'vitest';

import { parseScanCommand, USAGE } from './scanArgs';

describe('parseScanCommand', () => {
  it('reads the collection commands', () => {
    expect(parseScanCommand(['songs'])).toEqual({ kind: 'songs' });
    expect(parseScanCommand(['playlists'])).toEqual({ kind: 'playlists' });
  });

  it('reads a decimal playlist id', () => {
    expect(parseScanCommand(['playlist', '42'])).toEqual({ kind: 'playlist', playlistId: 42 });
  });

  it.each(['', ' ', '1e3', '-1', '4.5', '0x10'])('rejects playlist id %j', (value) => {
    expect(() => parseScanCommand(['playlist', value])).toThrow(`Invalid playlist id: ${value}. ${USAGE}`);
  });

  it('rejects a missing playlist id', () => {
    expect(() => parseScanCommand(['playlist'])).toThrow(`Invalid playlist id: (missing). ${USAGE}`);
  });

  it('rejects unknown commands', () => {
    expect(() => parseScanCommand([])).toThrow(USAGE);
    expect(() => parseScanCommand(['albums'])).toThrow(USAGE);
  });
});

import { PlaylistRef } from '../types/music';
import { CreatedPlaylist, LibraryClient } from './providers/types';
import { chunk } from './BatchEnricher';
import { PartialPlaylistError, TransportError } from '../utils/errors';
import { logEvent, logError } from '../utils/logger';
import { playlistUrl } from '../utils/tracks';

export const PLAYLIST_APPEND_BATCH_LIMIT = 100;

/**
 * Creates a playlist and appends `uris` to it in input order, one request
 * per 100 uris. Not transactional: if an append fails the playlist keeps
 * what was added before it and a {@link PartialPlaylistError} is thrown.
 */
export async function buildPlaylist(
  client: LibraryClient,
  ownerId: string,
  name: string,
  uris: ReadonlyArray<string>,
  isPublic: boolean
): Promise<PlaylistRef> {
  let created: CreatedPlaylist;
  try {
    created = await client.createPlaylist(ownerId, name, isPublic);
  } catch (error) {
    throw error instanceof TransportError
      ? error.withStage('build')
      : new TransportError(`Could not create playlist "${name}"`, 'build', { cause: error });
  }
  logEvent('playlist_created', { playlistId: created.id, name: created.name, public: isPublic });

  const appended: string[] = [];
  for (const batch of chunk(uris, PLAYLIST_APPEND_BATCH_LIMIT)) {
    try {
      await client.appendTracks(created.id, batch);
    } catch (error) {
      logError('playlist_append_failed', error instanceof Error ? error : undefined, {
        playlistId: created.id,
        appended: appended.length,
        total: uris.length,
      });
      throw new PartialPlaylistError(created.id, created.name, [...appended], uris.length, error);
    }
    appended.push(...batch);
  }

  logEvent('playlist_tracks_added', { playlistId: created.id, tracks: appended.length });

  return {
    id: created.id,
    name: created.name,
    public: isPublic,
    url: playlistUrl(created.id),
    trackCount: appended.length,
  };
}

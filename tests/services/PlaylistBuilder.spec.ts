import { describe, expect, it } from 'vitest';
import { buildPlaylist, PLAYLIST_APPEND_BATCH_LIMIT } from '../../src/services/PlaylistBuilder';
import { PartialPlaylistError, TransportError } from '../../src/utils/errors';
import { FakeLibraryClient } from '../helpers/FakeLibraryClient';

const uris = (n: number) => Array.from({ length: n }, (_, i) => `spotify:track:${i}`);

describe('buildPlaylist', () => {
  it('creates the playlist and appends in chunks of 100, in order', async () => {
    const client = new FakeLibraryClient();
    const input = uris(250);

    const playlist = await buildPlaylist(client, 'user-1', 'Road Trip', input, false);

    expect(PLAYLIST_APPEND_BATCH_LIMIT).toBe(100);
    expect(client.calls.created).toEqual([{ ownerId: 'user-1', name: 'Road Trip', isPublic: false }]);
    expect(client.calls.appended.map(c => c.uris.length)).toEqual([100, 100, 50]);
    expect(client.calls.appended[1]?.uris[0]).toBe('spotify:track:100');
    expect(client.playlists.get(playlist.id)).toEqual(input);
    expect(playlist).toEqual({
      id: 'pl-1',
      name: 'Road Trip',
      public: false,
      url: 'https://open.spotify.com/playlist/pl-1',
      trackCount: 250,
    });
  });

  it('creates an empty playlist without append calls', async () => {
    const client = new FakeLibraryClient();

    const playlist = await buildPlaylist(client, 'user-1', 'Empty', [], true);

    expect(client.calls.appended).toEqual([]);
    expect(playlist.trackCount).toBe(0);
    expect(playlist.public).toBe(true);
  });

  it('reports the partial state when an append fails', async () => {
    const client = new FakeLibraryClient();
    client.failAppendOnCall = 2;
    const input = uris(250);

    const error = await buildPlaylist(client, 'user-1', 'Road Trip', input, false).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialPlaylistError);
    if (!(error instanceof PartialPlaylistError)) return;
    expect(error.playlistId).toBe('pl-1');
    expect(error.appendedCount).toBe(100);
    expect(error.appendedUris).toEqual(input.slice(0, 100));
    expect(error.totalUris).toBe(250);
    expect(error.cause).toBeInstanceOf(TransportError);
    expect(client.calls.appended).toHaveLength(2);
    expect(client.playlists.get('pl-1')).toEqual(input.slice(0, 100));
  });

  it('fails with a build-stage transport error when creation fails', async () => {
    const client = new FakeLibraryClient();
    client.failCreate = true;

    const error = await buildPlaylist(client, 'user-1', 'Nope', uris(3), false).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ stage: 'build', status: 403 });
    expect(client.calls.appended).toEqual([]);
  });

  it('reads back the same order that was appended', async () => {
    const client = new FakeLibraryClient();
    const input = ['spotify:track:c', 'spotify:track:a', 'spotify:track:b'];

    const playlist = await buildPlaylist(client, 'user-1', 'Order', input, false);

    await expect(client.getPlaylistTrackUris(playlist.id)).resolves.toEqual(input);
  });
});

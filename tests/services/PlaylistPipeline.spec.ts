import { describe, expect, it } from 'vitest';
import { PlaylistPipeline } from '../../src/services/PlaylistPipeline';
import { PartialPlaylistError, PipelineStageError, TransportError } from '../../src/utils/errors';
import { FakeLibraryClient, savedItem } from '../helpers/FakeLibraryClient';

function libraryClient(): FakeLibraryClient {
  const client = new FakeLibraryClient();
  client.savedItems = [
    savedItem('t1', 'Volare', [['ar1', 'Domenico Modugno']], 'Italian Classics'),
    savedItem('t2', 'Night Drive', [['ar2', 'Synth Person']], 'Neon'),
    { track: null },
    savedItem('t3', 'Italian Summer', [['ar2', 'Synth Person'], ['ar3', 'Guest']], 'Holiday'),
    { track: { id: null, name: 'Local file', uri: 'spotify:local:x', artists: [], album: null } },
    savedItem('t4', 'Quiet Italy', [['ar4', 'Nobody']], 'Calm'),
  ];
  client.features.set('t1', { id: 't1', tempo: 80, danceability: 0.4, valence: 0.7 });
  client.features.set('t3', { id: 't3', tempo: 124, danceability: 0.8, valence: 0.9 });
  client.artists.set('ar1', { id: 'ar1', name: 'Domenico Modugno', genres: ['Italian Pop', 'canzone'] });
  client.artists.set('ar2', { id: 'ar2', name: 'Synth Person', genres: ['synthwave'] });
  client.artists.set('ar3', { id: 'ar3', name: 'Guest', genres: ['italian pop'] });
  return client;
}

describe('PlaylistPipeline', () => {
  it('loads the library page by page and drops entries without a track', async () => {
    const client = libraryClient();
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1', pageSize: 2 });

    const tracks = await pipeline.loadLibrary();

    expect(tracks.map(t => t.id)).toEqual(['t1', 't2', 't3', 't4']);
    expect(client.calls.savedTracks.map(c => c.offset)).toEqual([0, 2, 4, 6]);
  });

  it('filters by keyword without fetching features when no bound is set', async () => {
    const client = libraryClient();
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });

    const result = await pipeline.filterByKeyword({ keyword: 'ital' });

    expect(result.total).toBe(4);
    expect(result.tracks.map(t => t.id)).toEqual(['t1', 't3', 't4']);
    expect(client.calls.audioFeatures).toEqual([]);
  });

  it('applies numeric bounds using fetched features', async () => {
    const client = libraryClient();
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });

    const result = await pipeline.filterByKeyword({ keyword: 'ital', minTempo: 100 });

    // t1 is too slow; t4 has no features and stays
    expect(result.tracks.map(t => t.id)).toEqual(['t3', 't4']);
    expect(client.calls.audioFeatures).toEqual([['t1', 't2', 't3', 't4']]);
  });

  it('filters by genre using the union of artist genres', async () => {
    const client = libraryClient();
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });

    const any = await pipeline.filterByGenres({ genres: ['italian pop'], mode: 'any' });
    const all = await pipeline.filterByGenres({ genres: ['synthwave', 'Italian Pop'], mode: 'all' });

    expect(any.tracks.map(t => t.id)).toEqual(['t1', 't3']);
    expect(all.tracks.map(t => t.id)).toEqual(['t3']);
    expect(any.availableGenres).toEqual([
      { genre: 'italian pop', tracks: 2 },
      { genre: 'synthwave', tracks: 2 },
      { genre: 'canzone', tracks: 1 },
    ]);
  });

  it('builds a playlist whose order matches the filtered list', async () => {
    const client = libraryClient();
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });

    const { tracks } = await pipeline.filterByKeyword({ keyword: 'ital' });
    const playlist = await pipeline.createPlaylist('Italian Playlist (Auto)', tracks, false);

    expect(client.calls.created).toEqual([{ ownerId: 'user-1', name: 'Italian Playlist (Auto)', isPublic: false }]);
    await expect(client.getPlaylistTrackUris(playlist.id)).resolves.toEqual(tracks.map(t => t.uri));
  });

  it('reports how many tracks were fetched when enrichment fails', async () => {
    const client = libraryClient();
    client.failAudioFeatures = true;
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });

    const error = await pipeline.filterByKeyword({ keyword: 'ital', minValence: 0.5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineStageError);
    if (!(error instanceof PipelineStageError)) return;
    expect(error.stage).toBe('enrichment');
    expect(error.tracksFetched).toBe(4);
    expect(error.cause).toBeInstanceOf(TransportError);
  });

  it('aborts the whole fetch when a page fails', async () => {
    const client = libraryClient();
    client.failSavedTracksAtOffset = 2;
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1', pageSize: 2 });

    const error = await pipeline.loadLibrary().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineStageError);
    expect(error).toMatchObject({ stage: 'pagination', tracksFetched: 0 });
  });

  it('passes partial playlist failures through unchanged', async () => {
    const client = libraryClient();
    client.failAppendOnCall = 1;
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });
    const { tracks } = await pipeline.filterByKeyword({ keyword: 'ital' });

    const error = await pipeline.createPlaylist('Broken', tracks, true).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialPlaylistError);
    if (!(error instanceof PartialPlaylistError)) return;
    expect(error.playlistId).toBe('pl-1');
    expect(error.appendedCount).toBe(0);
    expect(error.totalUris).toBe(3);
  });

  it('wraps a failed playlist creation as a build-stage error', async () => {
    const client = libraryClient();
    client.failCreate = true;
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });
    const { tracks } = await pipeline.filterByKeyword({ keyword: 'ital' });

    const error = await pipeline.createPlaylist('Nope', tracks, false).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineStageError);
    expect(error).toMatchObject({ stage: 'build', tracksFetched: 4 });
  });

  it('reads the library from the service on every load', async () => {
    const client = libraryClient();
    const pipeline = new PlaylistPipeline({ client, userId: 'user-1' });

    await pipeline.loadLibrary();
    client.savedItems.push(savedItem('t5', 'Fresh Italian', [['ar4', 'Nobody']]));
    const tracks = await pipeline.loadLibrary();

    expect(tracks.map(t => t.id)).toEqual(['t1', 't2', 't3', 't4', 't5']);
    expect(client.calls.savedTracks).toHaveLength(4);
  });

  it('rejects page sizes the saved-tracks endpoint does not accept', () => {
    const client = libraryClient();

    expect(() => new PlaylistPipeline({ client, userId: 'user-1', pageSize: 51 })).toThrow(RangeError);
  });
});

import { AudioFeatures, Track } from '../types/music';
import { LibraryClient, RawArtist, RawAudioFeatures } from './providers/types';
import { logEvent, logWarning } from '../utils/logger';

// Ceilings imposed by the Web API per request; not tunable.
export const AUDIO_FEATURES_BATCH_LIMIT = 100;
export const ARTISTS_BATCH_LIMIT = 50;

export type BatchLookup<V> = (ids: ReadonlyArray<string>) => Promise<ReadonlyArray<V | null | undefined>>;

export function chunk<T>(items: ReadonlyArray<T>, size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Looks up `ids` in batches of at most `ceiling` and merges the answers
 * into one map. `keyOf` picks the id a result belongs to; null entries are
 * left out of the map, so absence is just a missing key.
 */
export async function enrich<V>(
  ids: Iterable<string>,
  lookup: BatchLookup<V>,
  ceiling: number,
  keyOf: (value: V) => string
): Promise<Map<string, V>> {
  const unique = Array.from(new Set(ids));
  const result = new Map<string, V>();

  for (const batch of chunk(unique, ceiling)) {
    const values = await lookup(batch);
    for (const value of values) {
      if (value === null || value === undefined) continue;
      result.set(keyOf(value), value);
    }
  }

  return result;
}

function toAudioFeatures(raw: RawAudioFeatures): AudioFeatures {
  return {
    id: raw.id,
    ...(typeof raw.tempo === 'number' ? { tempo: raw.tempo } : {}),
    ...(typeof raw.danceability === 'number' ? { danceability: raw.danceability } : {}),
    ...(typeof raw.valence === 'number' ? { valence: raw.valence } : {}),
  };
}

export async function enrichAudioFeatures(
  tracks: ReadonlyArray<Track>,
  client: LibraryClient
): Promise<Map<string, AudioFeatures>> {
  const raw = await enrich<RawAudioFeatures>(
    tracks.map(t => t.id),
    ids => client.getAudioFeatures(ids),
    AUDIO_FEATURES_BATCH_LIMIT,
    f => f.id
  );

  const features = new Map<string, AudioFeatures>();
  for (const [id, value] of raw) features.set(id, toAudioFeatures(value));

  const missing = new Set(tracks.map(t => t.id)).size - features.size;
  if (missing > 0) {
    // These tracks pass every numeric bound
    logWarning('audio_features_missing', { missing });
  }

  logEvent('audio_features_enriched', { tracks: tracks.length, withFeatures: features.size });
  return features;
}

/**
 * Maps every track to the union of its artists' genres, in order of first
 * appearance. Tracks whose artists carry no genres map to an empty list.
 */
export async function enrichTrackGenres(
  tracks: ReadonlyArray<Track>,
  client: LibraryClient
): Promise<Map<string, string[]>> {
  const artistIds: string[] = [];
  for (const track of tracks) {
    for (const artist of track.artists) {
      if (artist.id) artistIds.push(artist.id);
    }
  }

  const artists = await enrich<RawArtist>(
    artistIds,
    ids => client.getArtists(ids),
    ARTISTS_BATCH_LIMIT,
    a => a.id
  );

  const trackGenres = new Map<string, string[]>();
  for (const track of tracks) {
    const genres = new Set<string>();
    for (const ref of track.artists) {
      const artist = artists.get(ref.id);
      if (!artist) continue;
      for (const genre of artist.genres) genres.add(genre);
    }
    trackGenres.set(track.id, Array.from(genres));
  }

  logEvent('artist_genres_enriched', {
    tracks: tracks.length,
    artists: artists.size,
    tracksWithGenres: Array.from(trackGenres.values()).filter(g => g.length > 0).length,
  });
  return trackGenres;
}

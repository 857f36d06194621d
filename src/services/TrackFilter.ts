import { AudioFeatures, FilterCriteria, GenreCount, GenreCriteria, Track } from '../types/music';
import { joinArtistNames, normalizeText } from '../utils/tracks';

function normGenre(s: string): string {
  return s.trim().toLowerCase();
}

function matchesKeyword(track: Track, keyword: string): boolean {
  return normalizeText(track.name).includes(keyword)
    || normalizeText(joinArtistNames(track)).includes(keyword)
    || normalizeText(track.album.name).includes(keyword);
}

// A bound only applies when both the bound and the track's value are known.
function withinBounds(features: AudioFeatures | undefined, criteria: FilterCriteria): boolean {
  if (!features) return true;
  const { tempo, danceability, valence } = features;

  if (criteria.minTempo !== undefined && tempo !== undefined && tempo < criteria.minTempo) return false;
  if (criteria.maxTempo !== undefined && tempo !== undefined && tempo > criteria.maxTempo) return false;
  if (criteria.minDanceability !== undefined && danceability !== undefined && danceability < criteria.minDanceability) return false;
  if (criteria.minValence !== undefined && valence !== undefined && valence < criteria.minValence) return false;
  return true;
}

/**
 * Keeps tracks whose name, artists or album contain the keyword
 * (case-insensitive) and that pass the numeric bounds.
 *
 * An empty keyword matches nothing.
 */
export function filterByKeyword(
  tracks: ReadonlyArray<Track>,
  criteria: FilterCriteria,
  features: ReadonlyMap<string, AudioFeatures> = new Map()
): Track[] {
  const keyword = normalizeText(criteria.keyword);
  if (keyword.trim() === '') return [];

  return tracks.filter(track =>
    matchesKeyword(track, keyword) && withinBounds(features.get(track.id), criteria)
  );
}

/**
 * Keeps tracks whose genres intersect the selection (`any`) or contain all
 * of it (`all`). Tracks without genres are always dropped.
 *
 * With an empty selection `any` matches nothing and `all` matches every
 * track that has at least one genre.
 */
export function filterByGenres(
  tracks: ReadonlyArray<Track>,
  trackGenres: ReadonlyMap<string, ReadonlyArray<string>>,
  criteria: GenreCriteria
): Track[] {
  const selected = new Set(criteria.genres.map(normGenre).filter(g => g !== ''));

  return tracks.filter(track => {
    const genres = new Set((trackGenres.get(track.id) ?? []).map(normGenre));
    if (genres.size === 0) return false;

    if (criteria.mode === 'all') {
      for (const g of selected) {
        if (!genres.has(g)) return false;
      }
      return true;
    }

    for (const g of selected) {
      if (genres.has(g)) return true;
    }
    return false;
  });
}

/**
 * Genres present in the library with the number of tracks carrying each,
 * most common first (ties alphabetical).
 */
export function collectGenres(trackGenres: ReadonlyMap<string, ReadonlyArray<string>>): GenreCount[] {
  const counts = new Map<string, number>();
  for (const genres of trackGenres.values()) {
    for (const genre of new Set(genres.map(normGenre))) {
      if (!genre) continue;
      counts.set(genre, (counts.get(genre) ?? 0) + 1);
    }
  }
  return Array.from(counts, ([genre, tracks]) => ({ genre, tracks }))
    .sort((a, b) => b.tracks - a.tracks || a.genre.localeCompare(b.genre));
}

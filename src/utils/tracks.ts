import { Track } from '../types/music';
import { RawSavedItem } from '../services/providers/types';

export const PLAYLIST_URL_BASE = 'https://open.spotify.com/playlist';

export function normalizeText(s: string | null | undefined): string {
  return (s || '').toLowerCase();
}

export function joinArtistNames(track: Track): string {
  return track.artists.map(a => a.name).join(', ');
}

export function playlistUrl(playlistId: string): string {
  return `${PLAYLIST_URL_BASE}/${playlistId}`;
}

/**
 * Converts a saved-library entry to a Track. Entries without a track or
 * without a catalog id (removed items, local files) yield null.
 */
export function toTrack(item: RawSavedItem): Track | null {
  const t = item.track;
  if (!t || !t.id) return null;
  if (t.type && t.type !== 'track') return null; // skip episodes
  return {
    id: t.id,
    name: t.name,
    uri: t.uri,
    artists: t.artists.map(a => ({ id: a.id ?? '', name: a.name })),
    album: {
      name: t.album?.name ?? '',
      ...(t.album?.id ? { id: t.album.id } : {}),
    },
  };
}

export function capitalize(s: string): string {
  const trimmed = s.trim();
  if (!trimmed) return trimmed;
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

export function defaultPlaylistName(label: string): string {
  return `${capitalize(label)} Playlist (Auto)`;
}

import { GenreCount, PlaylistRef, Track } from '../types/music';
import { joinArtistNames } from './tracks';

export const PREVIEW_LIMIT = 50;

export const truncateText = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return `${text.substring(0, maxLength - 3)}...`;
};

export const formatTrackRow = (track: Track): string =>
  [
    truncateText(track.name, 40),
    truncateText(joinArtistNames(track), 40),
    truncateText(track.album.name, 40),
    track.uri,
  ].join(' | ');

/** Header plus one row per track, capped at `limit` rows. */
export const formatPreview = (tracks: ReadonlyArray<Track>, limit = PREVIEW_LIMIT): string[] => {
  const lines = ['name | artists | album | uri'];
  for (const track of tracks.slice(0, limit)) lines.push(formatTrackRow(track));
  if (tracks.length > limit) lines.push(`... and ${tracks.length - limit} more`);
  return lines;
};

export const formatGenreCounts = (genres: ReadonlyArray<GenreCount>, limit: number): string[] =>
  genres.slice(0, limit).map(g => `${g.genre} (${g.tracks})`);

export const formatPlaylistCreated = (playlist: PlaylistRef): string[] => [
  `Playlist created: ${playlist.name} (${playlist.trackCount} tracks, ${playlist.public ? 'public' : 'private'})`,
  `Open in Spotify: ${playlist.url}`,
];

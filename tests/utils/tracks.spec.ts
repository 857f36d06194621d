import { describe, expect, it } from 'vitest';
import { defaultPlaylistName, joinArtistNames, playlistUrl, toTrack } from '../../src/utils/tracks';
import { savedItem, track } from '../helpers/FakeLibraryClient';

describe('toTrack', () => {
  it('maps a saved item to a track', () => {
    expect(toTrack(savedItem('t1', 'Volare', [['ar1', 'Domenico Modugno']], 'Classics'))).toEqual({
      id: 't1',
      name: 'Volare',
      uri: 'spotify:track:t1',
      artists: [{ id: 'ar1', name: 'Domenico Modugno' }],
      album: { id: 'album-t1', name: 'Classics' },
    });
  });

  it('skips removed tracks, local files and episodes', () => {
    expect(toTrack({ track: null })).toBeNull();
    expect(toTrack({ track: { id: null, name: 'Local', uri: 'spotify:local:x', artists: [], album: null } })).toBeNull();
    expect(toTrack({ track: { id: 'e1', name: 'Episode', uri: 'spotify:episode:e1', type: 'episode', artists: [] } })).toBeNull();
  });

  it('tolerates a missing album and artist ids', () => {
    expect(toTrack({ track: { id: 't2', name: 'Loose', uri: 'spotify:track:t2', artists: [{ id: null, name: 'Anon' }] } })).toEqual({
      id: 't2',
      name: 'Loose',
      uri: 'spotify:track:t2',
      artists: [{ id: '', name: 'Anon' }],
      album: { name: '' },
    });
  });
});

describe('track helpers', () => {
  it('joins artist names', () => {
    expect(joinArtistNames(track('t1', 'Song', ['A', 'B']))).toBe('A, B');
  });

  it('builds the playlist url', () => {
    expect(playlistUrl('pl-1')).toBe('https://open.spotify.com/playlist/pl-1');
  });

  it('derives a default playlist name from the label', () => {
    expect(defaultPlaylistName('  iTALIAN ')).toBe('Italian Playlist (Auto)');
  });
});

import { z } from 'zod';
import { UserProfile } from '../../types/music';

// Boundary schemas: responses are parsed once here, typed structures afterwards.

export const RawArtistRefSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
});

export const RawTrackSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  uri: z.string(),
  type: z.string().optional(),
  is_local: z.boolean().optional(),
  artists: z.array(RawArtistRefSchema).default([]),
  album: z
    .object({
      id: z.string().nullable().optional(),
      name: z.string().default(''),
    })
    .nullable()
    .optional(),
});

export const RawSavedItemSchema = z.object({
  added_at: z.string().optional(),
  track: RawTrackSchema.nullable(),
});

export const RawSavedPageSchema = z.object({
  items: z.array(RawSavedItemSchema).default([]),
  total: z.number().optional(),
});

export const RawAudioFeaturesSchema = z.object({
  id: z.string(),
  tempo: z.number().nullable().optional(),
  danceability: z.number().nullable().optional(),
  valence: z.number().nullable().optional(),
});

export const RawArtistSchema = z.object({
  id: z.string(),
  name: z.string(),
  genres: z.array(z.string()).default([]),
});

export type RawTrack = z.infer<typeof RawTrackSchema>;
export type RawSavedItem = z.infer<typeof RawSavedItemSchema>;
export type RawAudioFeatures = z.infer<typeof RawAudioFeaturesSchema>;
export type RawArtist = z.infer<typeof RawArtistSchema>;

export interface SavedTracksPage {
  items: RawSavedItem[];
}

export interface CreatedPlaylist {
  id: string;
  name: string;
}

/**
 * Authenticated handle to the user's library. The pipeline only issues
 * requests through it and never touches its internals.
 */
export interface LibraryClient {
  getSavedTracks(offset: number, limit: number): Promise<SavedTracksPage>;
  /** Results line up with `ids`; null where the service has no data. */
  getAudioFeatures(ids: ReadonlyArray<string>): Promise<Array<RawAudioFeatures | null>>;
  getArtists(ids: ReadonlyArray<string>): Promise<Array<RawArtist | null>>;
  createPlaylist(ownerId: string, name: string, isPublic: boolean): Promise<CreatedPlaylist>;
  appendTracks(playlistId: string, uris: ReadonlyArray<string>): Promise<void>;
  currentUser(): Promise<UserProfile>;
  getPlaylistTrackUris(playlistId: string): Promise<string[]>;
}

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import {
  LibraryClient,
  SavedTracksPage,
  CreatedPlaylist,
  RawAudioFeatures,
  RawArtist,
  RawSavedPageSchema,
  RawAudioFeaturesSchema,
  RawArtistSchema,
} from './types';
import { PipelineStage, UserProfile } from '../../types/music';
import { TransportError } from '../../utils/errors';
import { fetchAll } from '../Paginator';
import { logDebug } from '../../utils/logger';

export const SPOTIFY_API_BASE_URL = 'https://api.spotify.com/v1';

const PLAYLIST_ITEMS_PAGE_SIZE = 100;

const AudioFeaturesResponseSchema = z.object({
  audio_features: z.array(RawAudioFeaturesSchema.nullable()),
});

const ArtistsResponseSchema = z.object({
  artists: z.array(RawArtistSchema.nullable()),
});

const CreatedPlaylistSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const SnapshotSchema = z.object({
  snapshot_id: z.string().optional(),
});

const CurrentUserSchema = z.object({
  id: z.string(),
  display_name: z.string().nullable().optional(),
});

const PlaylistItemsSchema = z.object({
  items: z.array(
    z.object({
      track: z.object({ uri: z.string() }).nullable(),
    })
  ).default([]),
});

const SpotifyErrorBodySchema = z.object({
  error: z.union([
    z.object({ status: z.number().optional(), message: z.string() }),
    z.string(),
  ]),
  error_description: z.string().optional(),
});

export interface SpotifyLibraryClientOptions {
  accessToken: string;
  timeoutMs?: number;
  baseURL?: string;
  adapter?: AxiosAdapter;
}

export function describeHttpError(error: unknown): { message: string; status?: number } {
  if (!axios.isAxiosError(error)) {
    return { message: error instanceof Error ? error.message : String(error) };
  }
  const status = error.response?.status;
  if (status === undefined) {
    return { message: error.code ? `${error.code}: ${error.message}` : error.message };
  }
  const body = SpotifyErrorBodySchema.safeParse(error.response?.data);
  let detail = error.message;
  if (body.success) {
    const e = body.data.error;
    detail = typeof e === 'string' ? body.data.error_description || e : e.message;
  }
  const retryAfter = error.response?.headers['retry-after'];
  const suffix = status === 429 && retryAfter ? ` (retry after ${retryAfter}s)` : '';
  return { message: `Spotify error ${status}: ${detail}${suffix}`, status };
}

/**
 * Spotify Web API implementation of {@link LibraryClient}, bound to one
 * user access token.
 */
export class SpotifyLibraryClient implements LibraryClient {
  private readonly http: AxiosInstance;

  constructor(opts: SpotifyLibraryClientOptions) {
    this.http = axios.create({
      baseURL: opts.baseURL ?? SPOTIFY_API_BASE_URL,
      timeout: opts.timeoutMs ?? 12000,
      headers: { Authorization: `Bearer ${opts.accessToken}` },
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
  }

  async getSavedTracks(offset: number, limit: number): Promise<SavedTracksPage> {
    const page = await this.request('pagination', { method: 'GET', url: '/me/tracks', params: { offset, limit } }, RawSavedPageSchema);
    logDebug('spotify_saved_tracks_page', { offset, limit, items: page.items.length });
    return { items: page.items };
  }

  async getAudioFeatures(ids: ReadonlyArray<string>): Promise<Array<RawAudioFeatures | null>> {
    const data = await this.request(
      'enrichment',
      { method: 'GET', url: '/audio-features', params: { ids: ids.join(',') } },
      AudioFeaturesResponseSchema
    );
    return data.audio_features;
  }

  async getArtists(ids: ReadonlyArray<string>): Promise<Array<RawArtist | null>> {
    const data = await this.request(
      'enrichment',
      { method: 'GET', url: '/artists', params: { ids: ids.join(',') } },
      ArtistsResponseSchema
    );
    return data.artists;
  }

  async createPlaylist(ownerId: string, name: string, isPublic: boolean): Promise<CreatedPlaylist> {
    return this.request(
      'build',
      { method: 'POST', url: `/users/${encodeURIComponent(ownerId)}/playlists`, data: { name, public: isPublic } },
      CreatedPlaylistSchema
    );
  }

  async appendTracks(playlistId: string, uris: ReadonlyArray<string>): Promise<void> {
    await this.request(
      'build',
      { method: 'POST', url: `/playlists/${encodeURIComponent(playlistId)}/tracks`, data: { uris } },
      SnapshotSchema
    );
  }

  async currentUser(): Promise<UserProfile> {
    const me = await this.request('auth', { method: 'GET', url: '/me' }, CurrentUserSchema);
    return {
      id: me.id,
      ...(me.display_name ? { displayName: me.display_name } : {}),
    };
  }

  async getPlaylistTrackUris(playlistId: string): Promise<string[]> {
    const items = await fetchAll(async (offset, limit) => {
      const page = await this.request(
        'build',
        {
          method: 'GET',
          url: `/playlists/${encodeURIComponent(playlistId)}/tracks`,
          params: { offset, limit, fields: 'items(track(uri))' },
        },
        PlaylistItemsSchema
      );
      return page.items;
    }, PLAYLIST_ITEMS_PAGE_SIZE);

    const uris: string[] = [];
    for (const item of items) {
      if (item.track) uris.push(item.track.uri);
    }
    return uris;
  }

  private async request<S extends z.ZodTypeAny>(
    stage: PipelineStage,
    config: AxiosRequestConfig,
    schema: S
  ): Promise<z.output<S>> {
    const endpoint = `${config.method ?? 'GET'} ${config.url ?? ''}`;
    let data: unknown;
    try {
      const resp = await this.http.request<unknown>(config);
      data = resp.data;
    } catch (error) {
      const { message, status } = describeHttpError(error);
      throw new TransportError(message, stage, {
        endpoint,
        cause: error,
        ...(status !== undefined ? { status } : {}),
      });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new TransportError(`Unexpected response from ${endpoint}: ${issues}`, stage, { endpoint });
    }
    return parsed.data;
  }
}

export default SpotifyLibraryClient;

import {
  AudioFeatures,
  FilterCriteria,
  GenreCount,
  GenreCriteria,
  PipelineStage,
  PlaylistRef,
  Track,
} from '../types/music';
import { LibraryClient } from './providers/types';
import { fetchAll, SAVED_TRACKS_PAGE_LIMIT } from './Paginator';
import { enrichAudioFeatures, enrichTrackGenres } from './BatchEnricher';
import { filterByKeyword, filterByGenres, collectGenres } from './TrackFilter';
import { buildPlaylist } from './PlaylistBuilder';
import { PartialPlaylistError, PipelineStageError } from '../utils/errors';
import { logEvent, logError } from '../utils/logger';
import { toTrack } from '../utils/tracks';

export interface PipelineContext {
  client: LibraryClient;
  userId: string;
  pageSize?: number;
}

export interface KeywordRunResult {
  total: number;
  tracks: Track[];
  features: ReadonlyMap<string, AudioFeatures>;
}

export interface GenreRunResult {
  total: number;
  tracks: Track[];
  trackGenres: ReadonlyMap<string, ReadonlyArray<string>>;
  availableGenres: GenreCount[];
}

function hasNumericBounds(criteria: FilterCriteria): boolean {
  return criteria.minTempo !== undefined
    || criteria.maxTempo !== undefined
    || criteria.minDanceability !== undefined
    || criteria.minValence !== undefined;
}

/**
 * One fetch → enrich → filter → build run for a single user. Every stage
 * runs sequentially; a failing stage aborts the run with a
 * {@link PipelineStageError} naming the stage and how many tracks had been
 * fetched by then.
 */
export class PlaylistPipeline {
  private readonly ctx: PipelineContext;
  private tracksFetched = 0;

  constructor(ctx: PipelineContext) {
    const pageSize = ctx.pageSize ?? SAVED_TRACKS_PAGE_LIMIT;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > SAVED_TRACKS_PAGE_LIMIT) {
      throw new RangeError(`pageSize must be between 1 and ${SAVED_TRACKS_PAGE_LIMIT}, got ${pageSize}`);
    }
    this.ctx = { ...ctx, pageSize };
  }

  async loadLibrary(): Promise<ReadonlyArray<Track>> {
    const { client, userId } = this.ctx;
    const items = await this.stage('pagination', () =>
      fetchAll(async (offset, limit) => (await client.getSavedTracks(offset, limit)).items, this.ctx.pageSize ?? SAVED_TRACKS_PAGE_LIMIT)
    );

    const tracks: Track[] = [];
    for (const item of items) {
      const track = toTrack(item);
      if (track) tracks.push(track);
    }
    this.tracksFetched = tracks.length;

    logEvent('library_loaded', { userId, savedItems: items.length, tracks: tracks.length });
    return tracks;
  }

  async filterByKeyword(criteria: FilterCriteria): Promise<KeywordRunResult> {
    const library = await this.loadLibrary();

    // Features only matter when a bound is set and the keyword can match
    let features: ReadonlyMap<string, AudioFeatures> = new Map();
    if (criteria.keyword.trim() !== '' && hasNumericBounds(criteria) && library.length > 0) {
      features = await this.stage('enrichment', () => enrichAudioFeatures(library, this.ctx.client));
    }

    const tracks = await this.stage('filtering', async () => filterByKeyword(library, criteria, features));
    logEvent('keyword_filter_applied', {
      keyword: criteria.keyword,
      total: library.length,
      matched: tracks.length,
    });
    return { total: library.length, tracks, features };
  }

  async filterByGenres(criteria: GenreCriteria): Promise<GenreRunResult> {
    const library = await this.loadLibrary();
    const trackGenres = library.length > 0
      ? await this.stage('enrichment', () => enrichTrackGenres(library, this.ctx.client))
      : new Map<string, string[]>();

    const tracks = await this.stage('filtering', async () => filterByGenres(library, trackGenres, criteria));
    logEvent('genre_filter_applied', {
      genres: criteria.genres,
      mode: criteria.mode,
      total: library.length,
      matched: tracks.length,
    });
    return { total: library.length, tracks, trackGenres, availableGenres: collectGenres(trackGenres) };
  }

  async createPlaylist(name: string, tracks: ReadonlyArray<Track>, isPublic: boolean): Promise<PlaylistRef> {
    const uris = tracks.map(t => t.uri);
    try {
      return await buildPlaylist(this.ctx.client, this.ctx.userId, name, uris, isPublic);
    } catch (error) {
      // Partial playlists are reported as they are; the caller decides what to tell the user
      if (error instanceof PartialPlaylistError) throw error;
      throw this.fail('build', error);
    }
  }

  private async stage<T>(stage: PipelineStage, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw this.fail(stage, error);
    }
  }

  private fail(stage: PipelineStage, error: unknown): PipelineStageError {
    logError('pipeline_stage_failed', error instanceof Error ? error : undefined, {
      stage,
      userId: this.ctx.userId,
      tracksFetched: this.tracksFetched,
    });
    return new PipelineStageError(stage, this.tracksFetched, error);
  }
}

export interface ArtistRef {
  readonly id: string;
  readonly name: string;
}

export interface AlbumRef {
  readonly id?: string;
  readonly name: string;
}

export interface Track {
  readonly id: string;
  readonly name: string;
  readonly artists: ReadonlyArray<ArtistRef>;
  readonly album: AlbumRef;
  readonly uri: string;
}

export interface Artist {
  readonly id: string;
  readonly name: string;
  readonly genres: ReadonlyArray<string>;
}

export interface AudioFeatures {
  readonly id: string;
  readonly tempo?: number;        // beats per minute
  readonly danceability?: number; // 0..1
  readonly valence?: number;      // 0..1
}

export interface FilterCriteria {
  readonly keyword: string;
  readonly minTempo?: number;
  readonly maxTempo?: number;
  readonly minDanceability?: number;
  readonly minValence?: number;
}

export type GenreMatchMode = 'any' | 'all';

export interface GenreCriteria {
  readonly genres: ReadonlyArray<string>;
  readonly mode: GenreMatchMode;
}

export interface GenreCount {
  genre: string;
  tracks: number;
}

export interface PlaylistRef {
  id: string;
  name: string;
  public: boolean;
  url: string;
  trackCount: number;
}

export interface UserProfile {
  id: string;
  displayName?: string;
}

export type PipelineStage = 'auth' | 'pagination' | 'enrichment' | 'filtering' | 'build';

export interface AppConfig {
  spotify: {
    clientId?: string;
    clientSecret?: string;
    redirectUri?: string;
    accessToken?: string;
    refreshToken?: string;
    timeoutMs: number;          // HTTP timeout for Spotify API
  };
  library: {
    pageSize: number;           // saved-tracks page size (API max 50)
  };
  logging: {
    level: string;
    toFile: boolean;
    maxSizeBytes?: number;
    maxFiles?: number;
  };
}

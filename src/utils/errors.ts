import { PipelineStage } from '../types/music';

export interface ErrorDetails {
  code: string;
  userMessage: string;
  metadata?: Record<string, unknown>;
}

/**
 * Base error for likeflow. Carries a stable code and a message
 * suitable for printing to the user.
 */
export class AppError extends Error {
  public readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.details = details;
  }

  get code(): string {
    return this.details.code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.details.code,
      metadata: this.details.metadata ?? {},
    };
  }
}

export class ConfigError extends AppError {
  public readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = []) {
    super(message, {
      code: 'CONFIG_ERROR',
      userMessage: `Configuration problem: ${message}`,
      metadata: { issues },
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A remote call failed (network, HTTP status, auth or unparseable payload).
 * Never retried here; the stage tells the caller where the run stopped.
 */
export class TransportError extends AppError {
  public readonly stage: PipelineStage;
  public readonly status: number | undefined;

  constructor(message: string, stage: PipelineStage, opts?: { status?: number; endpoint?: string; cause?: unknown }) {
    super(
      message,
      {
        code: opts?.status === 401 || opts?.status === 403 ? 'AUTH_ERROR' : 'TRANSPORT_ERROR',
        userMessage:
          opts?.status === 401
            ? 'Spotify rejected the access token. Run `likeflow auth` to get a new one.'
            : `Spotify request failed during ${stage}.`,
        metadata: { stage, status: opts?.status, endpoint: opts?.endpoint },
      },
      opts?.cause !== undefined ? { cause: opts.cause } : undefined
    );
    this.name = 'TransportError';
    this.stage = stage;
    this.status = opts?.status;
  }

  /** Copy of this error attributed to another stage. */
  withStage(stage: PipelineStage): TransportError {
    if (stage === this.stage) return this;
    return new TransportError(this.message, stage, {
      ...(this.status !== undefined ? { status: this.status } : {}),
      cause: this,
    });
  }
}

/**
 * Raised by the pipeline when a stage aborts; records how far the run got.
 */
export class PipelineStageError extends AppError {
  public readonly stage: PipelineStage;
  public readonly tracksFetched: number;

  constructor(stage: PipelineStage, tracksFetched: number, cause: unknown) {
    const reason = errorMessage(cause);
    super(
      `Pipeline failed during ${stage}: ${reason}`,
      {
        code: 'PIPELINE_STAGE_FAILED',
        userMessage:
          stage === 'pagination'
            ? `Could not read your saved tracks: ${reason}`
            : `Failed during ${stage} after fetching ${tracksFetched} tracks: ${reason}`,
        metadata: { stage, tracksFetched },
      },
      { cause }
    );
    this.name = 'PipelineStageError';
    this.stage = stage;
    this.tracksFetched = tracksFetched;
  }
}

/**
 * Playlist was created but not every chunk could be appended.
 * The playlist is left as it is: it holds exactly `appendedUris`.
 */
export class PartialPlaylistError extends AppError {
  public readonly playlistId: string;
  public readonly playlistName: string;
  public readonly appendedUris: ReadonlyArray<string>;
  public readonly totalUris: number;

  constructor(playlistId: string, playlistName: string, appendedUris: ReadonlyArray<string>, totalUris: number, cause: unknown) {
    super(
      `Playlist ${playlistId} is incomplete: appended ${appendedUris.length} of ${totalUris} tracks`,
      {
        code: 'PARTIAL_PLAYLIST',
        userMessage: `Playlist "${playlistName}" was created but only ${appendedUris.length} of ${totalUris} tracks were added.`,
        metadata: { playlistId, appendedCount: appendedUris.length, totalUris },
      },
      { cause }
    );
    this.name = 'PartialPlaylistError';
    this.playlistId = playlistId;
    this.playlistName = playlistName;
    this.appendedUris = appendedUris;
    this.totalUris = totalUris;
  }

  get appendedCount(): number {
    return this.appendedUris.length;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error taxonomy for the narrator.
 *
 * Only input, upstream and total-failure errors cross the pipeline boundary.
 * Chunk and cache failures are absorbed where they happen.
 */

export type NarratorErrorCode =
  | 'INVALID_VIDEO_URL'
  | 'TRANSCRIPT_UNAVAILABLE'
  | 'NO_AUDIO_PRODUCED'
  | 'INVALID_CONFIG'
  | 'ESTIMATOR_STATE';

export class NarratorError extends Error {
  public readonly code: NarratorErrorCode;

  constructor(code: NarratorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NarratorError';
    this.code = code;
  }
}

export class InvalidVideoUrlError extends NarratorError {
  public readonly input: string;

  constructor(input: string) {
    super('INVALID_VIDEO_URL', 'Invalid YouTube URL format');
    this.name = 'InvalidVideoUrlError';
    this.input = input;
  }
}

export type TranscriptUnavailableReason = 'disabled' | 'not-found' | 'unknown';

export class TranscriptUnavailableError extends NarratorError {
  public readonly videoId: string;
  public readonly reason: TranscriptUnavailableReason;

  constructor(videoId: string, reason: TranscriptUnavailableReason, cause?: unknown) {
    const message =
      reason === 'disabled'
        ? `Transcripts are disabled for video ${videoId}`
        : reason === 'not-found'
          ? `No transcript found for video ${videoId}`
          : 'Failed to fetch transcript';
    super('TRANSCRIPT_UNAVAILABLE', message, { cause });
    this.name = 'TranscriptUnavailableError';
    this.videoId = videoId;
    this.reason = reason;
  }
}

export class NoAudioProducedError extends NarratorError {
  public readonly chunkCount: number;

  constructor(chunkCount: number) {
    super('NO_AUDIO_PRODUCED', 'No audio was produced for this transcript');
    this.name = 'NoAudioProducedError';
    this.chunkCount = chunkCount;
  }
}

export class ConfigError extends NarratorError {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super('INVALID_CONFIG', `${variable}: ${message}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

export class EstimatorStateError extends NarratorError {
  constructor() {
    super('ESTIMATOR_STATE', 'TimeEstimator.update() called before start()');
    this.name = 'EstimatorStateError';
  }
}

export const isNarratorError = (error: unknown): error is NarratorError =>
  error instanceof NarratorError;

/** Best-effort message for logging an unknown thrown value. */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

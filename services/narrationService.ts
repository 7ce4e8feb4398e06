import type { Logger } from '../lib/logger';
import type { ProgressCallback, TranscriptFetcher, TranscriptSegment } from '../types';
import { encodeWav, pcmDurationSeconds } from './audioService';
import { extractVideoId } from './transcriptService';
import type { TranscriptPipeline } from './transcriptPipeline';

export interface NarrationDeps {
  fetchTranscript: TranscriptFetcher;
  pipeline: TranscriptPipeline;
  logger: Logger;
}

export interface Narration {
  videoId: string;
  segments: TranscriptSegment[];
  /** WAV file bytes. */
  wav: Uint8Array;
  durationSeconds: number;
  chunkCount: number;
  failedChunks: number[];
}

/**
 * URL in, WAV out. Throws InvalidVideoUrlError before any network call,
 * TranscriptUnavailableError before chunking, and NoAudioProducedError when
 * every chunk failed.
 */
export async function narrateVideo(
  url: string,
  voice: string,
  { fetchTranscript, pipeline, logger }: NarrationDeps,
  onProgress?: ProgressCallback
): Promise<Narration> {
  const videoId = extractVideoId(url);
  logger.info(`Fetching transcript for ${videoId}`);
  const segments = await fetchTranscript(videoId);

  const result = await pipeline.run(segments, voice, onProgress);
  if (result.status === 'error') throw result.error;

  return {
    videoId,
    segments,
    wav: encodeWav(result.audio),
    durationSeconds: pcmDurationSeconds(result.audio),
    chunkCount: result.chunkCount,
    failedChunks: result.failedChunks,
  };
}

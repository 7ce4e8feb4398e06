import type { NoAudioProducedError } from './lib/errors';

export interface TranscriptSegment {
  text: string;
  startOffset: number; // seconds into the video
  duration: number;
}

export interface Chunk {
  index: number; // position in the transcript, 0-based
  text: string;
}

export interface ChunkResult {
  index: number;
  audio: Uint8Array | null; // null when enhancement/synthesis degraded the chunk
}

export interface ProgressSnapshot {
  completed: number;
  total: number;
  percent: number;
  elapsedSeconds: number;
  remainingSeconds: number;
  message: string;
}

export type PipelineResult =
  | {
      status: 'ready';
      audio: Uint8Array; // raw PCM, chunks in transcript order
      chunkCount: number;
      failedChunks: number[];
    }
  | {
      status: 'error';
      error: NoAudioProducedError;
      chunkCount: number;
    };

export interface VoiceProfile {
  name: string;
  label: string;
  description: string;
}

// Capabilities implemented outside the pipeline.
export type TranscriptFetcher = (videoId: string) => Promise<TranscriptSegment[]>;
export type TextEnhancer = (text: string) => Promise<string>;
export type SpeechSynthesizer = (text: string, voice: string) => Promise<Uint8Array | null>;
export type ProgressCallback = (snapshot: ProgressSnapshot) => void;

import type { NarratorConfig } from '../config';
import { NoAudioProducedError, describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type {
  ChunkResult,
  PipelineResult,
  ProgressCallback,
  ProgressSnapshot,
  TranscriptSegment,
} from '../types';
import { ProgressStream } from '../utils/progressStream';
import { chunkText, toChunks } from '../utils/textChunker';
import { TimeEstimator, formatDuration } from '../utils/timeEstimator';
import { concatAudio } from './audioService';
import { processChunk, type ChunkCapabilities } from './chunkProcessor';
import { RequestScheduler } from './requestScheduler';
import { joinSegments } from './transcriptService';

export type PipelineConfig = Pick<NarratorConfig, 'maxChunkLength' | 'concurrency' | 'enhance'> &
  Partial<Pick<NarratorConfig, 'requestIntervalMs'>>;

export interface PipelineDeps extends ChunkCapabilities {
  logger: Logger;
  /** Clock for progress timing, in ms. */
  now?: () => number;
}

export interface PipelineStream {
  events: AsyncIterable<ProgressSnapshot>;
  result: Promise<PipelineResult>;
}

const progressMessage = (completed: number, total: number, percent: number, remaining: number) =>
  completed >= total
    ? `Processed ${completed}/${total} chunks (${percent}%)`
    : `Processed ${completed}/${total} chunks (${percent}%), about ${formatDuration(remaining)} remaining`;

/**
 * Splits a transcript into chunks, narrates them in parallel under a shared
 * scheduler and stitches the audio back together in transcript order.
 */
export class TranscriptPipeline {
  private readonly logger: Logger;

  constructor(private readonly config: PipelineConfig, private readonly deps: PipelineDeps) {
    this.logger = deps.logger.child('Pipeline');
  }

  async run(
    segments: TranscriptSegment[],
    voice: string,
    onProgress?: ProgressCallback
  ): Promise<PipelineResult> {
    const chunks = toChunks(chunkText(joinSegments(segments), this.config.maxChunkLength));
    const total = chunks.length;
    this.logger.info(`Narrating ${total} chunks with voice ${voice}`);

    const scheduler = new RequestScheduler({
      maxConcurrent: this.config.concurrency,
      minInterval: this.config.requestIntervalMs,
    });
    const estimator = new TimeEstimator({ now: this.deps.now });
    const collected = new Map<number, Uint8Array>();
    const failedChunks: number[] = [];
    let completed = 0;

    estimator.start();
    estimator.update(0);

    // Runs once per chunk, in completion order.
    const onChunkDone = ({ index, audio }: ChunkResult) => {
      completed++;
      if (audio) {
        collected.set(index, audio);
      } else {
        failedChunks.push(index);
      }

      const percent = (completed / total) * 100;
      const remaining = estimator.update(percent);
      const rounded = Math.round(percent);
      try {
        onProgress?.({
          completed,
          total,
          percent: rounded,
          elapsedSeconds: estimator.elapsedSeconds(),
          remainingSeconds: remaining,
          message: progressMessage(completed, total, rounded, remaining),
        });
      } catch (e) {
        this.logger.warn('Progress callback failed:', describeError(e));
      }
    };

    await Promise.all(
      chunks.map(chunk =>
        processChunk(chunk, voice, scheduler, this.deps, {
          enhance: this.config.enhance,
          logger: this.logger,
        }).then(onChunkDone)
      )
    );
    estimator.reset();

    if (collected.size === 0) {
      this.logger.error(`No audio produced for any of ${total} chunks`);
      return { status: 'error', error: new NoAudioProducedError(total), chunkCount: total };
    }

    const ordered = [...collected.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, audio]) => audio);
    failedChunks.sort((a, b) => a - b);

    if (failedChunks.length > 0) {
      this.logger.warn(`${failedChunks.length} of ${total} chunks produced no audio: ${failedChunks.join(', ')}`);
    }

    return {
      status: 'ready',
      audio: concatAudio(ordered),
      chunkCount: total,
      failedChunks,
    };
  }

  /**
   * Same as `run`, with progress delivered as an async stream the caller can
   * drain at its own pace. The stream ends once the run settles.
   */
  stream(segments: TranscriptSegment[], voice: string): PipelineStream {
    const events = new ProgressStream<ProgressSnapshot>();
    const result = this.run(segments, voice, snapshot => events.push(snapshot)).finally(() =>
      events.close()
    );
    return { events, result };
  }
}

export const runPipeline = (
  segments: TranscriptSegment[],
  voice: string,
  config: PipelineConfig,
  deps: PipelineDeps,
  onProgress?: ProgressCallback
): Promise<PipelineResult> => new TranscriptPipeline(config, deps).run(segments, voice, onProgress);

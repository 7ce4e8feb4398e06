import { describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { Chunk, ChunkResult, SpeechSynthesizer, TextEnhancer } from '../types';
import type { RequestScheduler } from './requestScheduler';

export interface ChunkCapabilities {
  enhance: TextEnhancer;
  synthesize: SpeechSynthesizer;
}

export interface ChunkProcessorOptions {
  /** Run the language-model rewrite before synthesis. */
  enhance: boolean;
  logger: Logger;
}

/**
 * Enhances then synthesizes one chunk while holding a scheduler slot.
 * Never rejects: a failed chunk resolves with `audio: null`.
 */
export async function processChunk(
  chunk: Chunk,
  voice: string,
  guard: RequestScheduler,
  capabilities: ChunkCapabilities,
  { enhance, logger }: ChunkProcessorOptions
): Promise<ChunkResult> {
  return guard.add(async () => {
    let text = chunk.text;

    if (enhance) {
      try {
        const enhanced = await capabilities.enhance(chunk.text);
        if (enhanced.trim()) text = enhanced;
      } catch (e) {
        logger.warn(`Enhancement failed for chunk ${chunk.index}, using original text:`, describeError(e));
      }
    }

    try {
      const audio = await capabilities.synthesize(text, voice);
      if (!audio || audio.length === 0) {
        logger.warn(`Synthesis produced no audio for chunk ${chunk.index}`);
        return { index: chunk.index, audio: null };
      }
      return { index: chunk.index, audio };
    } catch (e) {
      logger.warn(`Synthesis failed for chunk ${chunk.index}:`, describeError(e));
      return { index: chunk.index, audio: null };
    }
  });
}

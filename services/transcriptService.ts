import { InvalidVideoUrlError, TranscriptUnavailableError, describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { TranscriptFetcher, TranscriptSegment } from '../types';
import { createKey, type CacheStore } from './cacheService';

const VIDEO_ID_IN_URL = /(?:v=|\/)([0-9A-Za-z_-]{11})/;
const BARE_VIDEO_ID = /^[0-9A-Za-z_-]{11}$/;

/** Pulls the 11-character video id out of a watch, short or embed URL. */
export function extractVideoId(url: string): string {
  const input = url.trim();
  if (BARE_VIDEO_ID.test(input)) return input;
  const match = VIDEO_ID_IN_URL.exec(input);
  if (!match) throw new InvalidVideoUrlError(url);
  return match[1];
}

export const joinSegments = (segments: TranscriptSegment[]): string =>
  segments.map(s => s.text).join(' ');

const classifyFailure = (error: unknown): 'disabled' | 'not-found' | 'unknown' => {
  const message = describeError(error).toLowerCase();
  if (message.includes('disabled')) return 'disabled';
  if (message.includes('no transcript') || message.includes('not available')) return 'not-found';
  return 'unknown';
};

export const createYouTubeTranscriptFetcher = (logger: Logger): TranscriptFetcher =>
  async (videoId) => {
    try {
      // Loaded on first use so commands that never fetch don't pay for it.
      const { YoutubeTranscript } = await import('youtube-transcript');
      const items = await YoutubeTranscript.fetchTranscript(videoId);
      return items.map(item => ({
        text: item.text,
        startOffset: item.offset,
        duration: item.duration,
      }));
    } catch (e) {
      const reason = classifyFailure(e);
      logger.error(`Error fetching transcript for ${videoId}:`, describeError(e));
      throw new TranscriptUnavailableError(videoId, reason, e);
    }
  };

/**
 * Wraps a fetcher with a read-through cache keyed on the video id. Failed
 * fetches are never cached.
 */
export const createCachedTranscriptFetcher = (
  fetcher: TranscriptFetcher,
  cache: CacheStore,
  ttlSeconds: number,
  logger: Logger
): TranscriptFetcher =>
  async (videoId) => {
    const key = createKey('transcript', videoId);
    const cached = await cache.get<TranscriptSegment[]>(key);
    if (cached) {
      logger.debug(`Transcript cache hit for ${videoId}`);
      return cached;
    }

    const segments = await fetcher(videoId);
    await cache.set(key, segments, ttlSeconds);
    return segments;
  };

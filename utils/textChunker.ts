import type { Chunk } from '../types';

/**
 * Splits text into chunks of at most `maxLength` characters on word boundaries.
 *
 * Words are appended greedily. A single word longer than `maxLength` is kept
 * whole as its own chunk rather than cut mid-word.
 */
export const chunkText = (text: string, maxLength: number): string[] => {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }

  const words = text.split(/\s+/).filter(Boolean);
  const chunks: string[] = [];
  let current = '';

  for (const word of words) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= maxLength) {
      current += ' ' + word;
    } else {
      chunks.push(current);
      current = word;
    }
  }
  if (current) chunks.push(current);

  return chunks;
};

export const toChunks = (texts: string[]): Chunk[] =>
  texts.map((text, index) => ({ index, text }));

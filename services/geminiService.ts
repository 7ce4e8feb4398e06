import { GoogleGenAI, Modality } from '@google/genai';
import type { NarratorConfig } from '../config';
import { describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { SpeechSynthesizer, TextEnhancer } from '../types';

/** The part of the SDK client these capabilities call. */
export type GenAIModels = Pick<GoogleGenAI['models'], 'generateContent'>;

const ENHANCE_INSTRUCTION = `
You are preparing a video transcript to be read aloud.
Enhance this transcript text while maintaining its meaning:
- Fix punctuation, casing and obvious transcription errors.
- Remove filler words and repeated fragments.
- Do not add commentary, headings or Markdown. Return only the rewritten text.
`;

export const createGenAIClient = (config: Pick<NarratorConfig, 'apiKey'>): GoogleGenAI =>
  new GoogleGenAI({ apiKey: config.apiKey });

/**
 * Rewrites a transcript chunk for narration. Throws on API failure or an empty
 * reply; the chunk processor falls back to the original text.
 */
export const createTextEnhancer = (models: GenAIModels, model: string): TextEnhancer =>
  async (text) => {
    const response = await models.generateContent({
      model,
      contents: text,
      config: { systemInstruction: ENHANCE_INSTRUCTION },
    });
    const enhanced = response.text?.trim();
    if (!enhanced) throw new Error('Model returned empty text');
    return enhanced;
  };

/**
 * Synthesizes speech for one chunk. Resolves to raw 24kHz PCM, or null when the
 * request fails or comes back without audio.
 */
export const createSpeechSynthesizer = (
  models: GenAIModels,
  model: string,
  logger: Logger
): SpeechSynthesizer =>
  async (text, voice) => {
    try {
      const res = await models.generateContent({
        model,
        contents: [{ parts: [{ text }] }],
        config: {
          responseModalities: [Modality.AUDIO],
          speechConfig: {
            voiceConfig: { prebuiltVoiceConfig: { voiceName: voice } },
          },
        },
      });

      const base64 = res.candidates?.[0]?.content?.parts?.[0]?.inlineData?.data;
      if (!base64) {
        logger.error('TTS API error: empty audio response');
        return null;
      }
      return decode(base64);
    } catch (e) {
      logger.error('TTS API error:', describeError(e));
      return null;
    }
  };

function decode(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

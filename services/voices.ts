import type { VoiceProfile } from '../types';

// Prebuilt Gemini TTS voices offered to the user.
export const VOICE_PROFILES: readonly VoiceProfile[] = [
  { name: 'Fenrir', label: 'Fenrir', description: 'Deep, excitable narrator' },
  { name: 'Charon', label: 'Charon', description: 'Calm and informative' },
  { name: 'Kore', label: 'Kore', description: 'Firm and clear' },
  { name: 'Puck', label: 'Puck', description: 'Upbeat and lively' },
  { name: 'Zephyr', label: 'Zephyr', description: 'Bright and light' },
  { name: 'Aoede', label: 'Aoede', description: 'Breezy and relaxed' },
  { name: 'Leda', label: 'Leda', description: 'Youthful' },
  { name: 'Orus', label: 'Orus', description: 'Steady and firm' },
];

export const listVoices = (): readonly VoiceProfile[] => VOICE_PROFILES;

/** Canonical casing for a voice name, or undefined if it is not in the catalog. */
export const resolveVoice = (name: string): string | undefined =>
  VOICE_PROFILES.find(v => v.name.toLowerCase() === name.toLowerCase())?.name;

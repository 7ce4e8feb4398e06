import { ConfigError } from './lib/errors';
import { isLogLevel, type LogLevel } from './lib/logger';

export interface NarratorConfig {
  /** Gemini API key. Empty when not configured; the CLI refuses to narrate without it. */
  readonly apiKey: string;
  /** Redis connection string. The cache falls back to process memory when unset. */
  readonly redisUrl?: string;
  readonly maxChunkLength: number;
  readonly concurrency: number;
  /** Minimum spacing between upstream request starts, in ms. 0 disables it. */
  readonly requestIntervalMs: number;
  readonly cacheTtlSeconds: number;
  readonly enhance: boolean;
  readonly enhanceModel: string;
  readonly ttsModel: string;
  readonly defaultVoice: string;
  readonly logLevel: LogLevel;
}

export const MAX_CHUNK_LENGTH = 500;
export const CONCURRENT_TASKS = 5;
export const CACHE_TTL = 86400; // 24 hours

export const DEFAULT_CONFIG: NarratorConfig = {
  apiKey: '',
  maxChunkLength: MAX_CHUNK_LENGTH,
  concurrency: CONCURRENT_TASKS,
  requestIntervalMs: 0,
  cacheTtlSeconds: CACHE_TTL,
  enhance: true,
  enhanceModel: 'gemini-2.5-flash',
  ttsModel: 'gemini-2.5-flash-preview-tts',
  defaultVoice: 'Fenrir',
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

const readPositiveInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(name, `expected a positive integer, got "${raw}"`);
  }
  return value;
};

const readNonNegativeInt = (env: Env, name: string, fallback: number): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(name, `expected a non-negative integer, got "${raw}"`);
  }
  return value;
};

const readBoolean = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(name, `expected a boolean, got "${raw}"`);
};

const readString = (env: Env, name: string, fallback: string): string =>
  env[name]?.trim() || fallback;

/**
 * Builds the run configuration from environment variables.
 * Callers pass the result down explicitly; nothing here is cached.
 */
export function loadConfig(env: Env = process.env): NarratorConfig {
  const logLevel = readString(env, 'LOG_LEVEL', DEFAULT_CONFIG.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError('LOG_LEVEL', `unknown level "${logLevel}"`);
  }

  return {
    apiKey: env.GEMINI_API_KEY?.trim() || env.API_KEY?.trim() || '',
    redisUrl: env.REDIS_URL?.trim() || undefined,
    maxChunkLength: readPositiveInt(env, 'MAX_CHUNK_LENGTH', DEFAULT_CONFIG.maxChunkLength),
    concurrency: readPositiveInt(env, 'CONCURRENT_TASKS', DEFAULT_CONFIG.concurrency),
    requestIntervalMs: readNonNegativeInt(env, 'REQUEST_INTERVAL_MS', DEFAULT_CONFIG.requestIntervalMs),
    cacheTtlSeconds: readPositiveInt(env, 'CACHE_TTL', DEFAULT_CONFIG.cacheTtlSeconds),
    enhance: readBoolean(env, 'ENHANCE_TEXT', DEFAULT_CONFIG.enhance),
    enhanceModel: readString(env, 'ENHANCE_MODEL', DEFAULT_CONFIG.enhanceModel),
    ttsModel: readString(env, 'TTS_MODEL', DEFAULT_CONFIG.ttsModel),
    defaultVoice: readString(env, 'DEFAULT_VOICE', DEFAULT_CONFIG.defaultVoice),
    logLevel,
  };
}

// Transcript cache with optional Redis backing.
// When a Redis URL is configured, entries live in Redis with a native TTL.
// Otherwise a process-local Map is used (one run per invocation, so that is
// enough to dedupe fetches within a session).

import { createHash } from 'node:crypto';
import { createClient } from 'redis';
import type { NarratorConfig } from '../config';
import { describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';

export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  close?(): Promise<void>;
}

export interface CacheStore {
  get<T>(key: string): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

/** `prefix:md5(data)`; identical inputs always map to the same key. */
export const createKey = (prefix: string, data: string): string =>
  `${prefix}:${createHash('md5').update(data, 'utf8').digest('hex')}`;

type Entry = { value: string; expiresAt: number };

export class MemoryCacheBackend implements CacheBackend {
  private readonly map = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.map.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.map.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.map.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  get size(): number {
    return this.map.size;
  }
}

type RedisClient = ReturnType<typeof createClient>;

const CONNECT_TIMEOUT_MS = 2000;
const MAX_RECONNECT_ATTEMPTS = 3;

export class RedisCacheBackend implements CacheBackend {
  private client: RedisClient | null = null;
  private connecting: Promise<RedisClient> | null = null;

  constructor(private readonly url: string, private readonly logger: Logger) {}

  private async ensureClient(): Promise<RedisClient> {
    if (this.client?.isReady) return this.client;
    if (this.connecting) return this.connecting;

    // A client that lost its socket stays open while it reconnects.
    const stale = this.client;
    this.client = null;

    this.connecting = (async () => {
      if (stale?.isOpen) {
        this.logger.debug('Dropping Redis client that is no longer ready');
        await stale.disconnect().catch(() => undefined);
      }
      const client = createClient({
        url: this.url,
        socket: {
          connectTimeout: CONNECT_TIMEOUT_MS,
          reconnectStrategy: (retries: number) =>
            retries >= MAX_RECONNECT_ATTEMPTS
              ? new Error(`Redis unreachable after ${retries} attempts`)
              : Math.min(retries * 200, 1000),
        },
      });
      client.on('error', (err: unknown) => this.logger.debug('Redis client error:', describeError(err)));
      try {
        await client.connect();
      } catch (e) {
        // The next cache call gets a fresh client.
        await client.disconnect().catch(() => undefined);
        throw e;
      }
      this.client = client;
      return client;
    })();

    try {
      return await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  async get(key: string): Promise<string | null> {
    const client = await this.ensureClient();
    return client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = await this.ensureClient();
    await client.set(key, value, { EX: ttlSeconds });
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client?.isOpen) await client.quit();
  }
}

/**
 * Serializes values as JSON and absorbs every backend failure: a broken cache
 * only makes the run slower.
 */
export class FailSoftCacheStore implements CacheStore {
  constructor(private readonly backend: CacheBackend, private readonly logger: Logger) {}

  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = await this.backend.get(key);
      if (raw === null) return null;
      const value: T = JSON.parse(raw);
      return value;
    } catch (e) {
      this.logger.warn(`Cache get error for ${key}:`, describeError(e));
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      const serialized = JSON.stringify(value);
      if (serialized === undefined) throw new TypeError('value is not JSON-serializable');
      await this.backend.set(key, serialized, ttlSeconds);
    } catch (e) {
      this.logger.warn(`Cache set error for ${key}:`, describeError(e));
    }
  }

  async close(): Promise<void> {
    try {
      await this.backend.close?.();
    } catch (e) {
      this.logger.warn('Cache close error:', describeError(e));
    }
  }
}

export function createCacheStore(config: Pick<NarratorConfig, 'redisUrl'>, logger: Logger): CacheStore {
  const scoped = logger.child('Cache');
  const backend = config.redisUrl
    ? new RedisCacheBackend(config.redisUrl, scoped)
    : new MemoryCacheBackend();
  scoped.debug(config.redisUrl ? 'Using Redis backend' : 'Using in-memory backend');
  return new FailSoftCacheStore(backend, scoped);
}

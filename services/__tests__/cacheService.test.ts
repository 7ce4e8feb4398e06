import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createClient } from 'redis';
import {
    FailSoftCacheStore,
    MemoryCacheBackend,
    RedisCacheBackend,
    createCacheStore,
    createKey,
    type CacheBackend,
} from '../cacheService';
import type { Logger } from '../../lib/logger';

vi.mock('redis', () => ({
    createClient: vi.fn(),
}));

const createSpyLogger = (): Logger => {
    const logger: Logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: () => logger,
    };
    return logger;
};

const createFakeRedis = () => {
    const store = new Map<string, string>();
    const client = {
        isReady: false,
        isOpen: false,
        on: vi.fn(),
        connect: vi.fn(async () => {
            client.isReady = true;
            client.isOpen = true;
        }),
        disconnect: vi.fn(async () => {
            client.isReady = false;
            client.isOpen = false;
        }),
        quit: vi.fn(async () => {
            client.isReady = false;
            client.isOpen = false;
        }),
        get: vi.fn(async (key: string) => store.get(key) ?? null),
        set: vi.fn(async (key: string, value: string) => {
            store.set(key, value);
            return 'OK';
        }),
    };
    return client;
};

describe('createKey', () => {
    it('should prefix an md5 digest of the input', () => {
        expect(createKey('transcript', 'abc')).toBe('transcript:900150983cd24fb0d6963f7d28e17f72');
    });

    it('should map identical inputs to identical keys and distinct inputs apart', () => {
        expect(createKey('t', 'dQw4w9WgXcQ')).toBe(createKey('t', 'dQw4w9WgXcQ'));
        expect(createKey('t', 'dQw4w9WgXcQ')).not.toBe(createKey('t', 'dQw4w9WgXcR'));
    });
});

describe('FailSoftCacheStore', () => {
    let logger: Logger;

    beforeEach(() => {
        logger = createSpyLogger();
    });

    it('should round-trip structured values', async () => {
        const cache = new FailSoftCacheStore(new MemoryCacheBackend(), logger);
        const segments = [
            { text: 'Hello world', startOffset: 0, duration: 1.5 },
            { text: 'this is a test', startOffset: 1.5, duration: 2 },
        ];

        await cache.set('k', segments, 60);
        expect(await cache.get('k')).toEqual(segments);
    });

    it('should return null for a missing key', async () => {
        const cache = new FailSoftCacheStore(new MemoryCacheBackend(), logger);
        expect(await cache.get('missing')).toBeNull();
    });

    it('should expire entries passively after the TTL', async () => {
        let clock = 0;
        const backend = new MemoryCacheBackend(() => clock);
        const cache = new FailSoftCacheStore(backend, logger);

        await cache.set('k', 'v', 10);
        clock = 9999;
        expect(await cache.get('k')).toBe('v');
        clock = 10000;
        expect(await cache.get('k')).toBeNull();
        expect(backend.size).toBe(0);
    });

    it('should absorb backend failures on both operations', async () => {
        const broken: CacheBackend = {
            get: vi.fn().mockRejectedValue(new Error('connection lost')),
            set: vi.fn().mockRejectedValue(new Error('connection lost')),
        };
        const cache = new FailSoftCacheStore(broken, logger);

        await expect(cache.set('k', 'v', 10)).resolves.toBeUndefined();
        await expect(cache.get('k')).resolves.toBeNull();
        expect(logger.warn).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenCalledWith('Cache get error for k:', 'connection lost');
    });

    it('should skip values that cannot be serialized', async () => {
        const backend = new MemoryCacheBackend();
        const setSpy = vi.spyOn(backend, 'set');
        const cache = new FailSoftCacheStore(backend, logger);

        await cache.set('k', { big: 10n }, 10);

        expect(setSpy).not.toHaveBeenCalled();
        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(await cache.get('k')).toBeNull();
    });

    it('should treat a corrupt payload as a miss', async () => {
        const backend = new MemoryCacheBackend();
        await backend.set('k', '{not json', 10);
        const cache = new FailSoftCacheStore(backend, logger);

        expect(await cache.get('k')).toBeNull();
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });
});

describe('RedisCacheBackend', () => {
    let logger: Logger;

    beforeEach(() => {
        logger = createSpyLogger();
        vi.mocked(createClient).mockReset();
    });

    it('should connect lazily and store values with an expiry', async () => {
        const fake = createFakeRedis();
        vi.mocked(createClient).mockReturnValue(fake as unknown as ReturnType<typeof createClient>);
        const backend = new RedisCacheBackend('redis://cache.test:6379', logger);

        expect(createClient).not.toHaveBeenCalled();
        await backend.set('k', '"v"', 30);
        expect(await backend.get('k')).toBe('"v"');

        expect(createClient).toHaveBeenCalledTimes(1);
        expect(fake.connect).toHaveBeenCalledTimes(1);
        expect(fake.set).toHaveBeenCalledWith('k', '"v"', { EX: 30 });

        await backend.close();
        expect(fake.quit).toHaveBeenCalledTimes(1);
    });

    it('should disconnect a client that stopped being ready before replacing it', async () => {
        const first = createFakeRedis();
        const second = createFakeRedis();
        vi.mocked(createClient)
            .mockReturnValueOnce(first as unknown as ReturnType<typeof createClient>)
            .mockReturnValueOnce(second as unknown as ReturnType<typeof createClient>);
        const backend = new RedisCacheBackend('redis://cache.test:6379', logger);

        await backend.get('k');
        // Socket dropped: node-redis keeps the client open while it reconnects.
        first.isReady = false;
        await backend.get('k');
        await backend.close();

        expect(createClient).toHaveBeenCalledTimes(2);
        expect(first.disconnect).toHaveBeenCalledTimes(1);
        expect(first.isOpen).toBe(false);
        expect(second.quit).toHaveBeenCalledTimes(1);
        expect(second.isOpen).toBe(false);
    });

    it('should let the store degrade when Redis is unreachable', async () => {
        const fake = createFakeRedis();
        fake.connect.mockRejectedValue(new Error('ECONNREFUSED'));
        vi.mocked(createClient).mockReturnValue(fake as unknown as ReturnType<typeof createClient>);
        const cache = new FailSoftCacheStore(new RedisCacheBackend('redis://cache.test:6379', logger), logger);

        await expect(cache.set('k', 'v', 10)).resolves.toBeUndefined();
        await expect(cache.get('k')).resolves.toBeNull();

        // Each call retried the connection.
        expect(createClient).toHaveBeenCalledTimes(2);
        expect(fake.disconnect).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenCalledWith('Cache get error for k:', 'ECONNREFUSED');
    });
});

describe('createCacheStore', () => {
    it('should fall back to memory when no Redis URL is configured', async () => {
        vi.mocked(createClient).mockClear();
        const cache = createCacheStore({}, createSpyLogger());

        await cache.set('k', { ok: true }, 10);
        expect(await cache.get('k')).toEqual({ ok: true });
        expect(createClient).not.toHaveBeenCalled();
    });
});

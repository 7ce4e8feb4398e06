import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { main, type AppDeps } from '../cli';
import type { NarratorConfig } from '../config';
import { silentLogger } from '../lib/logger';
import { FailSoftCacheStore, MemoryCacheBackend } from '../services/cacheService';
import { TranscriptPipeline } from '../services/transcriptPipeline';
import type { SpeechSynthesizer, TranscriptFetcher } from '../types';

const ENV = { GEMINI_API_KEY: 'test-key', LOG_LEVEL: 'silent' };

const fakeDeps = (synthesize: SpeechSynthesizer, fetchTranscript: TranscriptFetcher) =>
    (config: NarratorConfig): AppDeps => ({
        cache: new FailSoftCacheStore(new MemoryCacheBackend(), silentLogger),
        fetchTranscript,
        pipeline: new TranscriptPipeline(config, { enhance: async t => t, synthesize, logger: silentLogger }),
        logger: silentLogger,
    });

type ConsoleSpy = MockInstance<typeof console.log>;

const printed = (spy: ConsoleSpy) => spy.mock.calls.map(args => args.join(' ')).join('\n');

describe('cli main', () => {
    let log: ConsoleSpy;
    let error: ConsoleSpy;
    let dir: string;

    beforeEach(async () => {
        log = vi.spyOn(console, 'log').mockImplementation(() => {});
        error = vi.spyOn(console, 'error').mockImplementation(() => {});
        dir = await mkdtemp(join(tmpdir(), 'narrator-cli-'));
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('should list the voice catalog', async () => {
        await expect(main(['voices'], {})).resolves.toBe(0);
        expect(log).toHaveBeenCalledTimes(8);
        expect(printed(log)).toContain('Fenrir');
    });

    it('should print usage and fail without a command', async () => {
        await expect(main([], ENV)).resolves.toBe(1);
        expect(printed(log)).toContain('Usage:');
    });

    it('should refuse to narrate without an API key', async () => {
        await expect(main(['narrate', 'https://youtu.be/dQw4w9WgXcQ'], {})).resolves.toBe(1);
        expect(printed(error)).toContain('GEMINI_API_KEY is not set');
    });

    it('should reject an unknown voice', async () => {
        await expect(main(['narrate', 'https://youtu.be/dQw4w9WgXcQ', '--voice', 'Nobody'], ENV)).resolves.toBe(1);
        expect(printed(error)).toContain('Unknown voice "Nobody"');
    });

    it('should report a malformed URL without fetching', async () => {
        const fetchTranscript = vi.fn<TranscriptFetcher>(async () => []);
        const makeDeps = fakeDeps(async () => new Uint8Array([1, 2]), fetchTranscript);

        await expect(main(['narrate', 'not a url'], ENV, makeDeps)).resolves.toBe(1);
        expect(printed(error)).toContain('Invalid YouTube URL format');
        expect(fetchTranscript).not.toHaveBeenCalled();
    });

    it('should write the narrated WAV file', async () => {
        const out = join(dir, 'out.wav');
        const synthesize = vi.fn<SpeechSynthesizer>(async () => new Uint8Array([1, 2, 3, 4]));
        const makeDeps = fakeDeps(synthesize, async () => [
            { text: 'Hello world', startOffset: 0, duration: 1 },
        ]);

        const code = await main(
            ['narrate', 'https://youtu.be/dQw4w9WgXcQ', '--voice', 'charon', '--out', out, '--no-enhance'],
            ENV,
            makeDeps
        );

        expect(code).toBe(0);
        expect(synthesize).toHaveBeenCalledWith('Hello world', 'Charon');
        const wav = await readFile(out);
        expect(wav.length).toBe(48);
        expect(wav.subarray(0, 4).toString('ascii')).toBe('RIFF');
        expect(printed(log)).toContain('Processed 1/1 chunks (100%)');
        expect(printed(log)).toContain(`Saved ${out}`);
    });

    it('should report total failure', async () => {
        const makeDeps = fakeDeps(async () => null, async () => [
            { text: 'Hello world', startOffset: 0, duration: 1 },
        ]);

        await expect(main(['narrate', 'dQw4w9WgXcQ', '--out', join(dir, 'x.wav')], ENV, makeDeps)).resolves.toBe(1);
        expect(printed(error)).toContain('No audio was produced for this transcript');
    });
});

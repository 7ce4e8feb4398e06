import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import chalk from 'chalk';
import { loadConfig, type NarratorConfig } from './config';
import { describeError, isNarratorError } from './lib/errors';
import { createLogger, type Logger } from './lib/logger';
import { createCacheStore, type CacheStore } from './services/cacheService';
import { createGenAIClient, createSpeechSynthesizer, createTextEnhancer } from './services/geminiService';
import { narrateVideo, type NarrationDeps } from './services/narrationService';
import { TranscriptPipeline } from './services/transcriptPipeline';
import { createCachedTranscriptFetcher, createYouTubeTranscriptFetcher } from './services/transcriptService';
import { listVoices, resolveVoice } from './services/voices';
import { formatDuration } from './utils/timeEstimator';

const USAGE = `Usage:
  narrate <youtube-url> [--voice <name>] [--out <file>] [--no-enhance]
  voices`;

export interface AppDeps extends NarrationDeps {
  cache: CacheStore;
}

export function createAppDeps(config: NarratorConfig, logger: Logger): AppDeps {
  const ai = createGenAIClient(config);
  const cache = createCacheStore(config, logger);
  const fetchTranscript = createCachedTranscriptFetcher(
    createYouTubeTranscriptFetcher(logger.child('Transcript')),
    cache,
    config.cacheTtlSeconds,
    logger.child('Transcript')
  );
  const pipeline = new TranscriptPipeline(config, {
    enhance: createTextEnhancer(ai.models, config.enhanceModel),
    synthesize: createSpeechSynthesizer(ai.models, config.ttsModel, logger.child('Gemini')),
    logger,
  });
  return { cache, fetchTranscript, pipeline, logger };
}

function printVoices(defaultVoice: string) {
  for (const voice of listVoices()) {
    const marker = voice.name === defaultVoice ? chalk.green(' (default)') : '';
    console.log(`${chalk.bold(voice.name.padEnd(8))} ${voice.description}${marker}`);
  }
}

const DEFAULT_OUT = 'transcript_audio.wav';

const parseCli = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      voice: { type: 'string', short: 'v' },
      out: { type: 'string', short: 'o' },
      'no-enhance': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

/**
 * Entry point. Returns the process exit code so it can be driven from tests.
 */
export async function main(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  makeDeps: (config: NarratorConfig, logger: Logger) => AppDeps = createAppDeps
): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (e) {
    console.error(chalk.red(describeError(e)));
    console.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, url] = positionals;
  const out = values.out ?? DEFAULT_OUT;

  if (values.help || !command) {
    console.log(USAGE);
    return command || values.help ? 0 : 1;
  }

  let config: NarratorConfig;
  try {
    config = loadConfig(env);
  } catch (e) {
    console.error(chalk.red(describeError(e)));
    return 1;
  }

  if (command === 'voices') {
    printVoices(config.defaultVoice);
    return 0;
  }

  if (command !== 'narrate') {
    console.error(chalk.red(`Unknown command "${command}"`));
    console.error(USAGE);
    return 1;
  }
  if (!url) {
    console.error(chalk.red('Please enter a YouTube video URL'));
    return 1;
  }
  if (!config.apiKey) {
    console.error(chalk.red('GEMINI_API_KEY is not set'));
    return 1;
  }

  const voice = resolveVoice(values.voice ?? config.defaultVoice);
  if (!voice) {
    console.error(chalk.red(`Unknown voice "${values.voice ?? config.defaultVoice}". Run "voices" to list them.`));
    return 1;
  }

  const runConfig: NarratorConfig = values['no-enhance'] ? { ...config, enhance: false } : config;
  const logger = createLogger(runConfig.logLevel);
  const deps = makeDeps(runConfig, logger);

  try {
    const narration = await narrateVideo(url, voice, deps, snapshot => {
      console.log(chalk.cyan(snapshot.message));
    });
    await writeFile(out, narration.wav);

    console.log(chalk.green(`Saved ${out} (${formatDuration(narration.durationSeconds)} of audio)`));
    if (narration.failedChunks.length > 0) {
      console.log(chalk.yellow(`${narration.failedChunks.length} of ${narration.chunkCount} chunks could not be narrated`));
    }
    return 0;
  } catch (e) {
    if (isNarratorError(e)) {
      console.error(chalk.red(e.message));
    } else {
      logger.error('Unexpected failure:', e);
      console.error(chalk.red(`An unexpected error occurred: ${describeError(e)}`));
    }
    return 1;
  } finally {
    await deps.cache.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}

import os from 'node:os';
import path from 'node:path';
import { AppConfig, SearchMode } from './types';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const optionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  forceBrowser?: boolean;
}

export const resolveConfig = (options: ResolveConfigOptions = {}): AppConfig => {
  const env = options.env ?? process.env;
  const isMac = (options.platform ?? process.platform) === 'darwin';
  const cseKey = optionalString(env.SPEECH_SEARCH_CSE_KEY);
  const cseId = optionalString(env.SPEECH_SEARCH_CSE_ID);
  const useBrowser =
    options.forceBrowser === true ||
    parseBoolOrDefault(env.SPEECH_SEARCH_USE_BROWSER, false) ||
    !cseKey ||
    !cseId;
  const searchMode: SearchMode = useBrowser ? 'browser' : 'speak';

  return {
    sampleRate: parseIntOrDefault(env.SPEECH_SEARCH_SAMPLE_RATE, 16000),
    chunkMs: parseIntOrDefault(env.SPEECH_SEARCH_CHUNK_MS, 100),
    languageCode: env.SPEECH_SEARCH_LANGUAGE ?? 'en-US',
    interimResults: parseBoolOrDefault(env.SPEECH_SEARCH_INTERIM_RESULTS, true),
    // 60s per-utterance service limit, three times over, plus margin.
    deadlineSecs: parseIntOrDefault(env.SPEECH_SEARCH_DEADLINE_SECS, 60 * 3 + 6),
    ffmpegBin: env.SPEECH_SEARCH_FFMPEG_BIN ?? 'ffmpeg',
    ffmpegFormat: env.SPEECH_SEARCH_FFMPEG_FORMAT ?? (isMac ? 'avfoundation' : 'pulse'),
    ffmpegInput: env.SPEECH_SEARCH_FFMPEG_INPUT ?? (isMac ? ':0' : 'default'),
    cseKey,
    cseId,
    resultCount: parseIntOrDefault(env.SPEECH_SEARCH_RESULT_COUNT, 10),
    searchMode,
    ttsBin: env.SPEECH_SEARCH_TTS_BIN ?? (isMac ? 'say' : 'espeak'),
    ttsTimeoutMs: parseIntOrDefault(env.SPEECH_SEARCH_TTS_TIMEOUT_MS, 60000),
    logDir: env.SPEECH_SEARCH_LOG_DIR ?? path.join(os.homedir(), '.speech-search', 'logs')
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (config.sampleRate < 8000 || config.sampleRate > 48000) {
    errors.push('SPEECH_SEARCH_SAMPLE_RATE must be between 8000 and 48000 hertz.');
  }

  if (config.chunkMs < 20 || config.chunkMs > 1000) {
    errors.push('SPEECH_SEARCH_CHUNK_MS must be between 20 and 1000 milliseconds.');
  }

  if (!config.languageCode.trim()) {
    errors.push('SPEECH_SEARCH_LANGUAGE must not be empty.');
  }

  if (config.deadlineSecs < 10 || config.deadlineSecs > 3600) {
    errors.push('SPEECH_SEARCH_DEADLINE_SECS must be between 10 and 3600 seconds.');
  }

  if (!config.ffmpegBin.trim()) {
    errors.push('SPEECH_SEARCH_FFMPEG_BIN must not be empty.');
  }

  if (!config.ffmpegFormat.trim()) {
    errors.push('SPEECH_SEARCH_FFMPEG_FORMAT must not be empty.');
  }

  if (!config.ffmpegInput.trim()) {
    errors.push('SPEECH_SEARCH_FFMPEG_INPUT must not be empty.');
  }

  if (config.resultCount < 1 || config.resultCount > 10) {
    errors.push('SPEECH_SEARCH_RESULT_COUNT must be between 1 and 10.');
  }

  if (!config.ttsBin.trim()) {
    errors.push('SPEECH_SEARCH_TTS_BIN must not be empty.');
  }

  if (config.ttsTimeoutMs < 1000 || config.ttsTimeoutMs > 600000) {
    errors.push('SPEECH_SEARCH_TTS_TIMEOUT_MS must be between 1000 and 600000 milliseconds.');
  }

  if (!config.logDir.trim()) {
    errors.push('SPEECH_SEARCH_LOG_DIR must not be empty.');
  }

  return errors;
};

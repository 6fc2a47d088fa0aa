#!/usr/bin/env node
import { parseCliArgs, USAGE } from './cli/args';
import { resolveConfig, validateConfig } from './config';
import { runStartupChecks } from './bootstrap/startupChecks';
import { ShutdownCoordinator } from './core/ShutdownCoordinator';
import { SpeechSearchSession } from './core/SpeechSearchSession';
import { describeError } from './errors';
import { StructuredLogger } from './logging/StructuredLogger';
import { FfmpegAudioSource } from './services/capture/FfmpegAudioSource';
import { GoogleSpeechTransport } from './services/recognition/GoogleSpeechTransport';
import { BrowserSearchProvider } from './services/search/BrowserSearchProvider';
import { CustomSearchClient } from './services/search/CustomSearchClient';
import { SearchProvider } from './services/search/SearchProvider';
import { CommandSpeechOutput } from './services/speech/CommandSpeechOutput';
import { AppConfig } from './types';

const FORCE_EXIT_INTERRUPTS = 3;

let logger: StructuredLogger | undefined;

const createSearchProvider = (config: AppConfig, appLogger: StructuredLogger): SearchProvider => {
  if (config.searchMode === 'speak' && config.cseKey && config.cseId) {
    return new CustomSearchClient({
      apiKey: config.cseKey,
      engineId: config.cseId,
      logger: appLogger
    });
  }

  return new BrowserSearchProvider(appLogger);
};

const main = async (): Promise<number> => {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  if (cli.unknown.length > 0) {
    process.stderr.write(`Unknown argument(s): ${cli.unknown.join(' ')}\n\n${USAGE}`);
    return 2;
  }

  const config = resolveConfig({ forceBrowser: cli.useBrowser });
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  logger = await StructuredLogger.create(config.logDir);
  logger.info('speech-search starting', {
    logPath: logger.getLogPath(),
    searchMode: config.searchMode,
    sampleRate: config.sampleRate,
    chunkMs: config.chunkMs
  });

  await runStartupChecks(config, logger);

  const transport = new GoogleSpeechTransport(logger);
  const coordinator = new ShutdownCoordinator(logger);
  const session = new SpeechSearchSession(
    {
      source: new FfmpegAudioSource({
        ffmpegBin: config.ffmpegBin,
        inputFormat: config.ffmpegFormat,
        inputDevice: config.ffmpegInput,
        sampleRate: config.sampleRate,
        chunkMs: config.chunkMs,
        logger
      }),
      transport,
      search: createSearchProvider(config, logger),
      speech: new CommandSpeechOutput({
        command: config.ttsBin,
        timeoutMs: config.ttsTimeoutMs,
        logger
      })
    },
    coordinator,
    logger,
    {
      sampleRate: config.sampleRate,
      languageCode: config.languageCode,
      interimResults: config.interimResults,
      deadlineMs: config.deadlineSecs * 1000,
      resultCount: config.resultCount
    }
  );

  session.on('stateChanged', (state) => {
    if (state.stage === 'listening') {
      process.stdout.write('[listening]\n');
      return;
    }

    if (state.stage === 'searching') {
      process.stdout.write(`Searching for: ${state.detail ?? ''}\n`);
      return;
    }

    if (state.stage === 'speaking') {
      process.stdout.write(`Saying: ${state.detail ?? ''}\n`);
    }
  });

  const onSignal = (): void => {
    const count = coordinator.interrupt();
    if (count >= FORCE_EXIT_INTERRUPTS) {
      process.stderr.write('\nForced exit.\n');
      process.exit(130);
    }
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const outcome = await session.run();
    if (outcome === 'exit-requested') {
      process.stdout.write('Exiting..\n');
    }
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await transport.close().catch((error: unknown) => {
      logger?.warn('Recognition client close failed', { detail: describeError(error) });
    });
  }
};

main()
  .then(async (code) => {
    await logger?.flush();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    const detail = describeError(error);
    if (logger) {
      logger.error('Fatal error', { detail });
      await logger.flush();
    } else {
      process.stderr.write(`${detail}\n`);
    }
    process.exit(1);
  });

import { StructuredLogger } from '../logging/StructuredLogger';
import { runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

export type CommandRunner = (command: string, args: string[]) => Promise<unknown>;

const defaultRunner: CommandRunner = (command, args) => runCommand(command, args, { timeoutMs: 8000 });

const commandExists = async (command: string, run: CommandRunner): Promise<boolean> => {
  const lookup = process.platform === 'win32' ? 'where' : 'which';

  try {
    await run(lookup, [command]);
    return true;
  } catch {
    return false;
  }
};

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger,
  run: CommandRunner = defaultRunner
): Promise<void> => {
  logger.info('Running startup checks');

  try {
    await run(config.ffmpegBin, ['-version']);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(
      `ffmpeg is not runnable at '${config.ffmpegBin}'. Install ffmpeg or set SPEECH_SEARCH_FFMPEG_BIN. (${detail})`
    );
  }

  if (config.searchMode === 'speak') {
    if (!(await commandExists(config.ttsBin, run))) {
      logger.warn('Speech command not found on PATH; results will not be read aloud', {
        command: config.ttsBin
      });
    }
    logger.info('Search results will be read aloud', { resultCount: config.resultCount });
  } else {
    logger.info('Search results will open in the default browser', {
      reason: config.cseKey && config.cseId ? 'requested' : 'search credentials not configured'
    });
  }

  logger.info('Startup checks completed successfully');
};

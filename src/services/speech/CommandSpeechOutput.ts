import { StructuredLogger } from '../../logging/StructuredLogger';
import { runCommand } from '../process/runCommand';

export interface SpeechOutput {
  /** Resolves after the text has been played back. */
  speak(text: string): Promise<void>;
}

export interface CommandSpeechOutputOptions {
  command: string;
  args?: string[];
  timeoutMs: number;
  logger?: StructuredLogger;
}

/** Speaks through a local TTS command such as `say` or `espeak`. */
export class CommandSpeechOutput implements SpeechOutput {
  public constructor(private readonly options: CommandSpeechOutputOptions) {}

  public async speak(text: string): Promise<void> {
    const spoken = text.replace(/\s+/g, ' ').trim();
    if (!spoken) {
      return;
    }

    const startedAt = Date.now();
    await runCommand(this.options.command, [...(this.options.args ?? []), spoken], {
      timeoutMs: this.options.timeoutMs
    });

    this.options.logger?.debug('Speech playback finished', {
      command: this.options.command,
      textLength: spoken.length,
      elapsedMs: Date.now() - startedAt
    });
  }
}

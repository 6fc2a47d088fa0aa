import { describeError, RecognitionServerError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { StopSignal } from '../pipeline/StopSignal';
import { STATUS_OK } from '../services/recognition/responseSchema';
import { SearchProvider } from '../services/search/SearchProvider';
import { SpeechOutput } from '../services/speech/CommandSpeechOutput';
import { DispatcherState, RecognizeResponse, SessionStateChange } from '../types';
import { SessionState } from './SessionState';

const EXIT_PATTERN = /\b(exit|quit)\b/i;
const NEXT_PATTERN = /\bnext\b/i;

export type DispatchAction = 'ignored' | 'exit' | 'next' | 'search' | 'unchanged';

export type DispatchOutcome = 'exit-requested' | 'exhausted';

export interface ResponseDispatcherDependencies {
  search: SearchProvider;
  speech: SpeechOutput;
}

export interface ResponseDispatcherOptions {
  resultCount: number;
  onStage?: (change: SessionStateChange) => void;
}

const anyTranscriptMatches = (message: RecognizeResponse, pattern: RegExp): boolean =>
  message.results.some((result) =>
    result.alternatives.some((alternative) => pattern.test(alternative.transcript))
  );

/**
 * Applies voice commands to inbound recognition messages, in arrival order:
 * a server error fails the session, "exit"/"quit" ends it, "next" steps
 * through the current results, and any other new transcript runs a search.
 */
export class ResponseDispatcher {
  private state: DispatcherState = 'listening';
  private messageCount = 0;

  public constructor(
    private readonly deps: ResponseDispatcherDependencies,
    private readonly session: SessionState,
    private readonly stop: StopSignal,
    private readonly options: ResponseDispatcherOptions = { resultCount: 10 },
    private readonly logger?: StructuredLogger
  ) {}

  public getState(): DispatcherState {
    return this.state;
  }

  public async run(responses: AsyncIterable<RecognizeResponse>): Promise<DispatchOutcome> {
    for await (const message of responses) {
      const action = await this.handle(message);
      if (action === 'exit') {
        break;
      }
    }

    this.logger?.info('Response dispatch finished', {
      state: this.state,
      messages: this.messageCount
    });

    return this.state === 'exit-requested' ? 'exit-requested' : 'exhausted';
  }

  public async handle(message: RecognizeResponse): Promise<DispatchAction> {
    if (this.state === 'exit-requested') {
      return 'ignored';
    }

    this.messageCount += 1;

    if (message.error && message.error.code !== STATUS_OK) {
      throw new RecognitionServerError(message.error.code, message.error.message);
    }

    if (message.results.length === 0) {
      return 'ignored';
    }

    if (anyTranscriptMatches(message, EXIT_PATTERN)) {
      this.state = 'exit-requested';
      this.stop.set();
      this.logger?.info('Exit requested by voice command');
      return 'exit';
    }

    if (anyTranscriptMatches(message, NEXT_PATTERN)) {
      const index = this.session.advance();
      this.logger?.info('Next result requested', {
        index,
        available: this.session.getResults().length
      });
      await this.speakCurrent();
      return 'next';
    }

    const top = message.results[0]?.alternatives[0];
    if (!top) {
      return 'ignored';
    }

    const transcript = top.transcript;
    if (transcript === this.session.getLastQuery()) {
      return 'unchanged';
    }

    this.session.setLastQuery(transcript);
    this.options.onStage?.({ stage: 'searching', detail: transcript });

    const results = await this.deps.search.search(transcript, this.options.resultCount);
    if (this.deps.search.mode === 'speak') {
      this.session.replaceResults(results);
    } else {
      this.session.resetIndex();
    }

    if (transcript.length > 0) {
      await this.speakCurrent();
    }

    this.options.onStage?.({ stage: 'listening' });
    return 'search';
  }

  private async speakCurrent(): Promise<void> {
    if (this.deps.search.mode !== 'speak') {
      return;
    }

    const entry = this.session.current();
    if (!entry || !entry.snippet) {
      return;
    }

    this.options.onStage?.({ stage: 'speaking', detail: entry.snippet });

    try {
      await this.deps.speech.speak(entry.snippet);
    } catch (error) {
      this.logger?.warn('Speech output failed', {
        index: this.session.getIndex(),
        detail: describeError(error)
      });
    } finally {
      this.options.onStage?.({ stage: 'listening' });
    }
  }
}

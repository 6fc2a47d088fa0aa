import { EventEmitter } from 'node:events';
import { describeError, RecognitionCancelledError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { AudioDrain } from '../pipeline/AudioDrain';
import { CaptureBuffer } from '../pipeline/CaptureBuffer';
import { CaptureLoop, CaptureSummary } from '../pipeline/CaptureLoop';
import { encodeRequests } from '../pipeline/RequestEncoder';
import { AudioSource } from '../services/capture/AudioSource';
import { RecognitionStream, RecognitionTransport } from '../services/recognition/RecognitionTransport';
import { SearchProvider } from '../services/search/SearchProvider';
import { SpeechOutput } from '../services/speech/CommandSpeechOutput';
import { SessionOutcome, SessionStateChange } from '../types';
import { ResponseDispatcher } from './ResponseDispatcher';
import { SessionState } from './SessionState';
import { ShutdownCoordinator } from './ShutdownCoordinator';

export interface SpeechSearchOptions {
  sampleRate: number;
  languageCode: string;
  interimResults: boolean;
  deadlineMs: number;
  resultCount: number;
  /** How long shutdown waits for capture before closing the device under it. */
  captureGraceMs?: number;
}

const DEFAULT_CAPTURE_GRACE_MS = 2000;

const DEFAULT_SESSION_OPTIONS: SpeechSearchOptions = {
  sampleRate: 16000,
  languageCode: 'en-US',
  interimResults: true,
  deadlineMs: (60 * 3 + 6) * 1000,
  resultCount: 10
};

export interface SpeechSearchDependencies {
  source: AudioSource;
  transport: RecognitionTransport;
  search: SearchProvider;
  speech: SpeechOutput;
}

export declare interface SpeechSearchSession {
  on(event: 'stateChanged', listener: (state: SessionStateChange) => void): this;
  on(event: 'captureFinished', listener: (summary: CaptureSummary) => void): this;
}

/**
 * One listen-and-search run. Opens the microphone, runs the capture task and
 * the recognition stream side by side, and on every exit path stops capture,
 * cancels the stream, waits for both tasks and closes the device.
 */
export class SpeechSearchSession extends EventEmitter {
  private state: SessionStateChange = { stage: 'idle' };
  private started = false;
  private readonly sessionState = new SessionState();

  public constructor(
    private readonly deps: SpeechSearchDependencies,
    private readonly coordinator: ShutdownCoordinator,
    private readonly logger?: StructuredLogger,
    private readonly options: SpeechSearchOptions = DEFAULT_SESSION_OPTIONS
  ) {
    super();
  }

  public getState(): SessionStateChange {
    return this.state;
  }

  public async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error('Session has already run');
    }

    this.started = true;

    try {
      const outcome = await this.runPipeline();
      this.setState({ stage: 'stopped', detail: outcome });
      this.logger?.info('Session finished', { outcome, lastQuery: this.sessionState.getLastQuery() });
      return outcome;
    } catch (error) {
      this.setState({ stage: 'error', detail: describeError(error) });
      throw error;
    }
  }

  private async runPipeline(): Promise<SessionOutcome> {
    const stop = this.coordinator.stopSignal;
    const buffer = new CaptureBuffer();
    let closing: Promise<void> | undefined;
    const closeSource = (): Promise<void> => {
      closing ??= this.deps.source.close();
      return closing;
    };

    try {
      const info = await this.deps.source.open();
      const capture = new CaptureLoop(this.deps.source, buffer, stop, this.logger);
      const captureDone = capture.start();
      let stream: RecognitionStream | undefined;

      try {
        const requests = encodeRequests(new AudioDrain(buffer), {
          sampleRate: info.sampleRate,
          languageCode: this.options.languageCode,
          interimResults: this.options.interimResults
        });
        stream = this.deps.transport.streamingRecognize(requests, {
          deadlineMs: this.options.deadlineMs
        });

        return await this.consume(stream);
      } finally {
        this.setState({ stage: 'stopping' });
        this.coordinator.requestStop();
        const summary = await this.joinCapture(captureDone, closeSource);
        this.emit('captureFinished', summary);
        await stream?.finished();
        this.logger?.info('Capture finished', { ...summary });
      }
    } finally {
      await closeSource();
    }
  }

  /**
   * Waits for the capture task to see the stop flag. A read that is still
   * blocked after the grace period is released by closing the device.
   */
  private async joinCapture(
    captureDone: Promise<CaptureSummary>,
    closeSource: () => Promise<void>
  ): Promise<CaptureSummary> {
    const graceMs = this.options.captureGraceMs ?? DEFAULT_CAPTURE_GRACE_MS;
    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });

    try {
      const first = await Promise.race([captureDone, graceElapsed]);
      if (first !== 'timeout') {
        return first;
      }
    } finally {
      clearTimeout(timer);
    }

    this.logger?.warn('Capture did not stop in time; closing the audio device', { graceMs });
    await closeSource();
    return captureDone;
  }

  private async consume(stream: RecognitionStream): Promise<SessionOutcome> {
    const detach = this.coordinator.attachStream(stream);
    const dispatcher = new ResponseDispatcher(
      { search: this.deps.search, speech: this.deps.speech },
      this.sessionState,
      this.coordinator.stopSignal,
      {
        resultCount: this.options.resultCount,
        onStage: (change) => this.setState(change)
      },
      this.logger
    );

    this.setState({ stage: 'listening' });

    try {
      return await dispatcher.run(stream);
    } catch (error) {
      if (error instanceof RecognitionCancelledError) {
        this.logger?.info('Recognition stream cancelled', {
          interrupted: this.coordinator.wasInterrupted()
        });
        return 'interrupted';
      }

      throw error;
    } finally {
      this.coordinator.cancelStream();
      detach();
    }
  }

  private setState(next: SessionStateChange): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.debug('State changed', {
      stage: next.stage,
      detail: next.detail
    });
  }
}

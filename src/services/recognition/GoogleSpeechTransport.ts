import { once } from 'node:events';
import { Duplex } from 'node:stream';
import { v1 } from '@google-cloud/speech';
import {
  describeError,
  RecognitionCancelledError,
  RecognitionTransportError
} from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { RecognizeRequest, RecognizeResponse } from '../../types';
import { parseRecognizeResponse } from './responseSchema';
import {
  RecognitionStream,
  RecognitionTransport,
  StreamingRecognizeOptions
} from './RecognitionTransport';

const GRPC_CANCELLED = 1;
const GRPC_DEADLINE_EXCEEDED = 4;

export type CancellableDuplex = Duplex & { cancel(): void };

/** The slice of the generated Speech v1 client this transport drives. */
export interface StreamingSpeechClient {
  _streamingRecognize(options?: { timeout?: number }): CancellableDuplex;
  close(): Promise<void>;
}

const readStatusCode = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }

  return undefined;
};

class GoogleSpeechStream implements RecognitionStream {
  private cancelled = false;
  private readonly pumpAbort = new AbortController();
  private readonly pumpDone: Promise<void>;

  public constructor(
    private readonly call: CancellableDuplex,
    requests: AsyncIterable<RecognizeRequest>,
    private readonly logger?: StructuredLogger
  ) {
    this.pumpDone = this.pumpRequests(requests);
  }

  public cancel(): void {
    if (this.cancelled) {
      return;
    }

    this.cancelled = true;
    this.pumpAbort.abort();
    this.call.cancel();
  }

  public finished(): Promise<void> {
    return this.pumpDone;
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<RecognizeResponse, void, undefined> {
    try {
      for await (const payload of this.call) {
        yield parseRecognizeResponse(payload);
      }
    } catch (error) {
      throw this.translateError(error);
    }

    if (this.cancelled) {
      throw new RecognitionCancelledError();
    }
  }

  private translateError(error: unknown): Error {
    if (this.cancelled) {
      return new RecognitionCancelledError();
    }

    if (error instanceof RecognitionTransportError) {
      return error;
    }

    const code = readStatusCode(error);
    if (code === GRPC_CANCELLED) {
      return new RecognitionCancelledError();
    }

    if (code === GRPC_DEADLINE_EXCEEDED) {
      return new RecognitionTransportError('Recognition stream deadline exceeded', code);
    }

    return new RecognitionTransportError(`Recognition stream failed: ${describeError(error)}`, code);
  }

  private async pumpRequests(requests: AsyncIterable<RecognizeRequest>): Promise<void> {
    let sent = 0;

    try {
      for await (const request of requests) {
        if (this.cancelled || this.call.writableEnded) {
          break;
        }

        sent += 1;
        if (!this.call.write(request)) {
          await once(this.call, 'drain', { signal: this.pumpAbort.signal });
        }
      }

      if (!this.cancelled && !this.call.writableEnded) {
        this.call.end();
      }

      this.logger?.debug('Recognition request stream finished', { sent });
    } catch (error) {
      if (this.cancelled) {
        return;
      }

      this.logger?.warn('Recognition request stream failed; cancelling call', {
        sent,
        detail: describeError(error)
      });
      this.cancel();
    }
  }
}

export class GoogleSpeechTransport implements RecognitionTransport {
  private client: StreamingSpeechClient | undefined;

  public constructor(
    private readonly logger?: StructuredLogger,
    client?: StreamingSpeechClient
  ) {
    this.client = client;
  }

  public streamingRecognize(
    requests: AsyncIterable<RecognizeRequest>,
    options: StreamingRecognizeOptions
  ): RecognitionStream {
    this.client ??= new v1.SpeechClient();
    const call = this.client._streamingRecognize({ timeout: options.deadlineMs });

    this.logger?.info('Recognition stream opened', { deadlineMs: options.deadlineMs });
    return new GoogleSpeechStream(call, requests, this.logger);
  }

  public async close(): Promise<void> {
    const current = this.client;
    this.client = undefined;
    await current?.close();
  }
}

import { RecognizeRequest, RecognizeResponse } from '../../types';

export interface StreamingRecognizeOptions {
  deadlineMs: number;
}

/**
 * One in-flight bidirectional recognition call. Iteration ends when the
 * server closes the stream; after `cancel` it throws RecognitionCancelledError.
 */
export interface RecognitionStream extends AsyncIterable<RecognizeResponse> {
  cancel(): void;
  /** Settles once the outbound side has stopped pulling requests. Never rejects. */
  finished(): Promise<void>;
}

export interface RecognitionTransport {
  streamingRecognize(
    requests: AsyncIterable<RecognizeRequest>,
    options: StreamingRecognizeOptions
  ): RecognitionStream;
  close?: () => Promise<void>;
}

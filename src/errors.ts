export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class RecognitionServerError extends Error {
  public override readonly name = 'RecognitionServerError';

  public constructor(
    readonly code: number,
    readonly serverMessage: string
  ) {
    super(`Server error: ${serverMessage || `status ${code}`}`);
  }
}

export class RecognitionCancelledError extends Error {
  public override readonly name = 'RecognitionCancelledError';

  public constructor(message = 'Recognition stream cancelled') {
    super(message);
  }
}

export class RecognitionTransportError extends Error {
  public override readonly name = 'RecognitionTransportError';

  public constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
  }
}

export class SearchProviderError extends Error {
  public override readonly name = 'SearchProviderError';

  public constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
  }
}

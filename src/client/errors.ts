export type UpstreamErrorKind = 'not-found' | 'rate-limited' | 'transport' | 'parse' | 'unavailable';

// Failures raised by the fetch layer. Callers propagate them unchanged.
export class UpstreamError extends Error {
  constructor(
    readonly kind: UpstreamErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export class NotFoundError extends UpstreamError {
  constructor(message: string) {
    super('not-found', message);
    this.name = 'NotFoundError';
  }
}

export class RateLimitedError extends UpstreamError {
  constructor() {
    super(
      'rate-limited',
      'Rate limited. Set SOCORRO_API_TOKEN_PATH to a file holding an API token that has no permissions attached to it'
    );
    this.name = 'RateLimitedError';
  }
}

export class TransportError extends UpstreamError {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super('transport', message);
    this.name = 'TransportError';
  }
}

export const PREVIEW_LENGTH = 200;

export class ParseError extends UpstreamError {
  readonly preview: string;

  constructor(reason: string, body: string) {
    const preview = body.slice(0, PREVIEW_LENGTH);
    super('parse', `Failed to parse response: ${reason}: ${preview}`);
    this.name = 'ParseError';
    this.preview = preview;
  }
}

export class UnavailableError extends UpstreamError {
  constructor(message: string) {
    super('unavailable', message);
    this.name = 'UnavailableError';
  }
}

// Invalid command-line input, reported before any request is made
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

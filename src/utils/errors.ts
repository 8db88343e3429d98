export type ExtractionErrorKind = 'authentication' | 'upstream' | 'schema';

export abstract class ExtractionError extends Error {
  abstract readonly kind: ExtractionErrorKind;
  /** Model text received before the failure, for display next to the error. */
  rawText = '';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or rejected API key. The user has to fix configuration. */
export class AuthenticationError extends ExtractionError {
  readonly kind = 'authentication';
}

/** The model call failed: network, rate limit, timeout or a malformed response. */
export class UpstreamError extends ExtractionError {
  readonly kind = 'upstream';
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** The model emitted a value of the wrong type for the email schema. */
export class SchemaViolationError extends ExtractionError {
  readonly kind = 'schema';
  readonly path?: string;

  constructor(message: string, options?: { cause?: unknown; path?: string }) {
    super(message, options);
    this.path = options?.path;
  }
}

const kindLabels: Record<ExtractionErrorKind, string> = {
  authentication: 'Authentication error',
  upstream: 'Upstream error',
  schema: 'Schema violation',
};

export const describeExtractionError = (error: ExtractionError): string => kindLabels[error.kind];

// DOMException is not an Error subclass in every environment, so match on name.
export const isAbortError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';

// Anything that is not already classified is treated as a failed model call.
export const toExtractionError = (error: unknown): ExtractionError => {
  if (error instanceof ExtractionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(message || 'The model call failed', { cause: error });
};

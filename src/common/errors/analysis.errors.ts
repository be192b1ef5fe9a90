export type AnalysisErrorKind =
  | 'ConfigurationError'
  | 'NetworkError'
  | 'ServiceError'
  | 'DecodeError';

/**
 * Base class for every failure raised while analyzing an image.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Required configuration is missing. Raised before any network call.
 */
export class ConfigurationError extends AnalysisError {
  readonly kind = 'ConfigurationError' as const;
}

/**
 * Timeout or connection failure while talking to the inference service.
 */
export class NetworkError extends AnalysisError {
  readonly kind = 'NetworkError' as const;

  constructor(
    message: string,
    public readonly isTimeout = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The inference service answered with a non-success status or an
 * unusable body.
 */
export class ServiceError extends AnalysisError {
  readonly kind = 'ServiceError' as const;

  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DecodeError extends AnalysisError {
  readonly kind = 'DecodeError' as const;
}

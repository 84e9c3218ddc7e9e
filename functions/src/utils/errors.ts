export type CampusSyncErrorCode =
  | 'UPSTREAM_UNAVAILABLE'
  | 'MALFORMED_UPSTREAM_DATA'
  | 'STORE_WRITE_FAILURE'
  | 'NOTIFICATION_DISPATCH_FAILURE'
  | 'CONFIG_INVALID';

export class CampusSyncError extends Error {
  readonly code: CampusSyncErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: CampusSyncErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }
}

/** Network or HTTP failure reaching a provider. */
export class UpstreamUnavailableError extends CampusSyncError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'UPSTREAM_UNAVAILABLE', details, options);
  }
}

/** A record lacks the field its stable identity is built from. */
export class MalformedUpstreamDataError extends CampusSyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_UPSTREAM_DATA', details);
  }
}

export class StoreWriteFailureError extends CampusSyncError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'STORE_WRITE_FAILURE', details, options);
  }
}

export class NotificationDispatchFailureError extends CampusSyncError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'NOTIFICATION_DISPATCH_FAILURE', details, options);
  }
}

export class ConfigError extends CampusSyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof CampusSyncError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}

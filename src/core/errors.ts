export type NotiErrorCode =
  | 'NO_CONFIG'
  | 'INVALID_CONFIG'
  | 'CONFIG_CONFLICT'
  | 'NO_MESSAGE'
  | 'STREAM_AND_MESSAGE'
  | 'FORMAT_ERROR'
  | 'USAGE';

/**
 * Base error for everything the CLI reports to the user before or around
 * dispatch. Per-destination send failures are not errors; they are carried
 * in the dispatch report as {@link SendError} values.
 */
export class NotiError extends Error {
  readonly code: NotiErrorCode;

  constructor(message: string, code: NotiErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends NotiError {
  constructor(message: string, code: 'NO_CONFIG' | 'INVALID_CONFIG' | 'CONFIG_CONFLICT' = 'INVALID_CONFIG') {
    super(message, code);
  }
}

/** A custom format that has nothing to send */
export class FormatError extends NotiError {
  constructor(message: string) {
    super(message, 'FORMAT_ERROR');
  }
}

export type SendError =
  | { kind: 'timeout' }
  | { kind: 'desktop_unavailable'; reason: string }
  | { kind: 'http_status'; status: number }
  | { kind: 'transport'; reason: string };

export function describeSendError(error: SendError): string {
  switch (error.kind) {
    case 'timeout':
      return 'request timed out';
    case 'desktop_unavailable':
      return `desktop notifications unavailable: ${error.reason}`;
    case 'http_status':
      return `HTTP ${error.status}`;
    case 'transport':
      return error.reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error classes raised by sdstatus.
 *
 * Per-site probe failures are not errors: they are recorded as data on a
 * ProbeFailure outcome. The classes here cover the transport boundary and
 * the fatal conditions that stop a command.
 */

export type SdStatusErrorCode =
  | 'DirectoryUnavailable'
  | 'DirectoryMalformed'
  | 'ScanFileInvalid'
  | 'DescriptorFileInvalid'
  | 'ConfigInvalid';

/**
 * Base class for fatal errors reported to the user
 */
export class SdStatusError extends Error {
  readonly code: SdStatusErrorCode;

  constructor(code: SdStatusErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SdStatusError';
    this.code = code;
  }
}

export type DirectoryErrorKind = 'DirectoryUnavailable' | 'DirectoryMalformed';

export class DirectoryError extends SdStatusError {
  readonly kind: DirectoryErrorKind;

  constructor(kind: DirectoryErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = 'DirectoryError';
    this.kind = kind;
  }
}

export class ScanFileError extends SdStatusError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('ScanFileInvalid', `${filePath}: ${message}`, options);
    this.name = 'ScanFileError';
    this.filePath = filePath;
  }
}

export class DescriptorFileError extends SdStatusError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('DescriptorFileInvalid', `${filePath}: ${message}`, options);
    this.name = 'DescriptorFileError';
    this.filePath = filePath;
  }
}

export class ConfigError extends SdStatusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigInvalid', message, options);
    this.name = 'ConfigError';
  }
}

export type TransportErrorKind = 'Unreachable' | 'Timeout';

/**
 * Raised by a Transport when no HTTP response was received
 */
export class TransportError extends Error {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

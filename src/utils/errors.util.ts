export enum ConversionErrorKind {
  ParseError = 'ParseError',
  NotWireless = 'NotWireless',
  MissingKeys = 'MissingKeys',
  MissingSSID = 'MissingSSID',
  Unsupported = 'Unsupported',
  PermissionDenied = 'PermissionDenied',
  FileExists = 'FileExists',
  OSError = 'OSError'
}

const MESSAGES: Record<ConversionErrorKind, string> = {
  [ConversionErrorKind.ParseError]: 'Unable to parse profile',
  [ConversionErrorKind.NotWireless]: 'Not a wireless profile',
  [ConversionErrorKind.MissingKeys]: 'Key information missing',
  [ConversionErrorKind.MissingSSID]: 'SSID missing',
  [ConversionErrorKind.Unsupported]: 'Unsupported security type',
  [ConversionErrorKind.PermissionDenied]: 'Unable to open file',
  [ConversionErrorKind.FileExists]: 'File exists, refusing to overwrite',
  [ConversionErrorKind.OSError]: 'Unknown error'
};

export interface SystemError extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

/**
 * Checks whether a caught value is an error raised by a Node system call
 */
export function isSystemError(error: unknown): error is SystemError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Failure of a single profile conversion.
 * The kind is closed; system errors are mapped onto it where the I/O happens.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly detail?: string;

  constructor(kind: ConversionErrorKind, detail?: string) {
    super(detail ? `${MESSAGES[kind]}: ${detail}` : MESSAGES[kind]);
    this.name = 'ConversionError';
    this.kind = kind;
    this.detail = detail;
  }

  /**
   * Wraps a failure that happened while writing an already created file
   */
  static fromWriteError(error: unknown): ConversionError {
    if (error instanceof ConversionError) {
      return error;
    }
    return new ConversionError(
      ConversionErrorKind.OSError,
      error instanceof Error ? error.message : String(error)
    );
  }

  /**
   * Maps an error thrown by fs onto a conversion error kind
   * @param error Value caught around a file system call
   * @returns PermissionDenied, FileExists or OSError
   */
  static fromSystemError(error: unknown): ConversionError {
    if (error instanceof ConversionError) {
      return error;
    }
    if (!isSystemError(error)) {
      return ConversionError.fromWriteError(error);
    }

    switch (error.code) {
      case 'EACCES':
      case 'EPERM':
        return new ConversionError(ConversionErrorKind.PermissionDenied);
      case 'EEXIST':
        return new ConversionError(ConversionErrorKind.FileExists);
      default:
        return new ConversionError(ConversionErrorKind.OSError, error.message);
    }
  }
}

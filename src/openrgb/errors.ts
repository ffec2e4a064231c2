/**
 * OpenRGB-specific error classes for better error handling and debugging
 */

export class OpenRGBError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'OpenRGBError';
  }
}

export class OpenRGBConnectionError extends OpenRGBError {
  constructor(
    message: string,
    public readonly address?: string,
    public readonly port?: number,
    options?: ErrorOptions,
  ) {
    super(message, 'CONNECTION_ERROR', options);
    this.name = 'OpenRGBConnectionError';
  }
}

export class OpenRGBProtocolError extends OpenRGBError {
  constructor(
    message: string,
    public readonly packetType?: number,
    code: string = 'PROTOCOL_ERROR',
  ) {
    super(message, code);
    this.name = 'OpenRGBProtocolError';
  }
}

export class OpenRGBParseError extends OpenRGBProtocolError {
  constructor(
    message: string,
    public readonly offset?: number,
    public readonly bufferSize?: number,
  ) {
    super(message, undefined, 'PARSE_ERROR');
    this.name = 'OpenRGBParseError';
  }
}

/**
 * Raised before anything is sent when an operation needs a newer protocol
 * version than the one negotiated for the connection.
 */
export class OpenRGBUnsupportedOperationError extends OpenRGBError {
  constructor(
    public readonly operation: string,
    public readonly requiredVersion: number,
    public readonly currentVersion: number,
  ) {
    super(
      `${operation} requires protocol version ${requiredVersion}, negotiated version is ${currentVersion}`,
      'UNSUPPORTED_OPERATION',
    );
    this.name = 'OpenRGBUnsupportedOperationError';
  }
}

export class OpenRGBTimeoutError extends OpenRGBError {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
  ) {
    super(message, 'TIMEOUT_ERROR');
    this.name = 'OpenRGBTimeoutError';
  }
}

/**
 * A codec wrote a different number of bytes than it announced. This is a
 * bug in the codec, never a consequence of bad input.
 */
export class OpenRGBInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OpenRGBInvariantError';
  }
}

/**
 * Type guard to check if an error is an OpenRGB-specific error
 */
export function isOpenRGBError(error: unknown): error is OpenRGBError {
  return error instanceof OpenRGBError;
}

/**
 * Creates a user-friendly error message from any error
 */
export function formatErrorMessage(error: unknown): string {
  if (isOpenRGBError(error)) {
    return `OpenRGB ${error.code || 'ERROR'}: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

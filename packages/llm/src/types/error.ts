export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class AbortError extends SDKError {}

export type TransportErrorKind =
  | 'timeout'
  | 'dns'
  | 'tls_handshake'
  | 'tls'
  | 'connection_refused'
  | 'io'
  | 'unknown';

/**
 * The request never produced an HTTP response, or the connection broke
 * while the body was being read.
 */
export class TransportError extends SDKError {
  readonly kind: TransportErrorKind;

  constructor(message: string, kind: TransportErrorKind, cause?: Error) {
    super(message, cause);
    this.kind = kind;
  }
}

/** The server answered with a non-2xx status. */
export class ProtocolError extends SDKError {
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, statusCode: number, body: string) {
    super(message);
    this.statusCode = statusCode;
    this.body = body;
  }
}

/** Tool-call fragments could not be assembled into complete calls. */
export class StreamCorruptionError extends SDKError {}

export class ToolExecutionError extends SDKError {
  readonly toolName: string;

  constructor(message: string, toolName: string, cause?: Error) {
    super(message, cause);
    this.toolName = toolName;
  }
}

import { z } from 'zod';
import {
  AbortError,
  ProtocolError,
  SDKError,
  TransportError,
} from '../types/error.js';
import type { ErrorEvent } from '../types/stream.js';

export const AUTHENTICATION_FAILED_MESSAGE = 'Authentication failed. Please check your API key.';
export const NOT_FOUND_MESSAGE = 'Model not found or invalid endpoint.';
export const RATE_LIMITED_MESSAGE = 'Rate limit exceeded. Please try again later.';

export const TIMEOUT_MESSAGE =
  'Connection timed out. Please check your internet connection and try again.';
export const DNS_FAILURE_MESSAGE =
  'Cannot resolve server address. Please check your Base URL and internet connection.';
export const TLS_HANDSHAKE_MESSAGE =
  "SSL/TLS handshake failed. The server's certificate may be invalid or untrusted.";
export const CONNECTION_REFUSED_MESSAGE =
  'Connection refused. Please verify the server address and port.';

export type StatusMessages = Readonly<Partial<Record<number, string>>>;

const FIXED_STATUS_MESSAGES: StatusMessages = {
  401: AUTHENTICATION_FAILED_MESSAGE,
  404: NOT_FOUND_MESSAGE,
  429: RATE_LIMITED_MESSAGE,
};

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  /** Per-endpoint replacements for the fixed status messages. */
  readonly statusMessages?: StatusMessages;
};

const errorBodySchema = z.object({
  error: z
    .object({
      message: z.string().nullish(),
    })
    .nullish(),
});

/**
 * Pulls `error.message` out of an OpenAI-style error body.
 * Returns null when the body is not JSON or carries no usable message.
 */
export function extractErrorMessage(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  const result = errorBodySchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }

  const message = result.data.error?.message?.trim();
  return message ? message : null;
}

/**
 * Maps a non-2xx response to a ProtocolError.
 * 401, 404 and 429 always produce fixed messages, whatever the body says;
 * every other status is described by the body's error message when it has one.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProtocolError {
  const { statusCode, body, statusMessages } = options;

  const fixed = statusMessages?.[statusCode] ?? FIXED_STATUS_MESSAGES[statusCode];
  if (fixed !== undefined) {
    return new ProtocolError(fixed, statusCode, body);
  }

  const message = extractErrorMessage(body) ?? `API error: ${statusCode}`;
  return new ProtocolError(message, statusCode, body);
}

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const DNS_CODES: ReadonlySet<string> = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NONAME']);

const TLS_HANDSHAKE_CODES: ReadonlySet<string> = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'ERR_TLS_HANDSHAKE_TIMEOUT',
]);

/**
 * Walks the `cause` chain (undici wraps socket errors in `TypeError: fetch failed`)
 * and returns the first system error code found.
 */
export function findErrorCode(err: unknown): string | null {
  let current: unknown = err;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }
  return null;
}

function rootMessage(err: Error): string {
  let current: Error = err;
  for (let depth = 0; depth < 8 && current.cause instanceof Error; depth++) {
    current = current.cause;
  }
  return current.message.trim();
}

function isIoCode(code: string): boolean {
  return /^E[A-Z]+$/.test(code) || code.startsWith('UND_ERR_');
}

function isFetchFailure(err: Error): boolean {
  return err.name === 'TypeError' && (err.message === 'fetch failed' || err.message === 'terminated');
}

/**
 * Classifies a failure raised while talking to the server into the transport taxonomy.
 */
export function classifyTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) {
    return err;
  }

  if (!(err instanceof Error)) {
    const text = String(err).trim();
    return new TransportError(
      text ? `Error: ${text}` : `Unexpected error (${typeof err}). Please try again.`,
      'unknown',
    );
  }

  const code = findErrorCode(err);

  if (err.name === 'TimeoutError' || (code !== null && TIMEOUT_CODES.has(code))) {
    return new TransportError(TIMEOUT_MESSAGE, 'timeout', err);
  }

  if (code !== null && DNS_CODES.has(code)) {
    return new TransportError(DNS_FAILURE_MESSAGE, 'dns', err);
  }

  if (code !== null && TLS_HANDSHAKE_CODES.has(code)) {
    return new TransportError(TLS_HANDSHAKE_MESSAGE, 'tls_handshake', err);
  }

  if (code !== null && (code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_') || code === 'EPROTO')) {
    const detail = rootMessage(err);
    return new TransportError(`SSL/TLS error: ${detail || 'Secure connection failed'}`, 'tls', err);
  }

  if (code === 'ECONNREFUSED') {
    return new TransportError(CONNECTION_REFUSED_MESSAGE, 'connection_refused', err);
  }

  if ((code !== null && isIoCode(code)) || isFetchFailure(err)) {
    const detail = rootMessage(err);
    return new TransportError(`Network error: ${detail || 'Connection failed'}`, 'io', err);
  }

  const message = err.message.trim();
  return new TransportError(
    message ? `Error: ${message}` : `Unexpected error (${err.name}). Please try again.`,
    'unknown',
    err,
  );
}

/**
 * Converts anything thrown below the client boundary into the ERROR event
 * handed to callers.
 */
export function toErrorEvent(err: unknown): ErrorEvent {
  if (err instanceof ProtocolError) {
    return { type: 'ERROR', message: err.message, statusCode: err.statusCode };
  }

  if (err instanceof AbortError) {
    return { type: 'ERROR', message: 'Request was cancelled.', statusCode: null };
  }

  if (err instanceof SDKError) {
    return { type: 'ERROR', message: err.message, statusCode: null };
  }

  return { type: 'ERROR', message: classifyTransportError(err).message, statusCode: null };
}

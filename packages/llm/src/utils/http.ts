import { AbortError, SDKError, TransportError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import {
  TIMEOUT_MESSAGE,
  classifyTransportError,
  mapHttpError,
  type StatusMessages,
} from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
  readonly statusMessages?: StatusMessages;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly text: string;
};

/**
 * Performs a request and reads the whole body as text.
 * The `requestMs` timeout covers the body as well as the headers.
 * Non-2xx responses throw a ProtocolError; socket failures a TransportError.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  return performFetch(options, options.timeout?.requestMs, async (response) => {
    const text = await response.text();
    if (!response.ok) {
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        statusMessages: options.statusMessages,
      });
    }
    return { response, text };
  });
}

/**
 * Opens a streaming request and returns the raw Response once headers arrive.
 * The `connectMs` timeout stops applying at that point; the caller's signal
 * stays linked to the body so aborting it tears the connection down.
 */
export async function fetchStream(options: FetchOptions): Promise<globalThis.Response> {
  return performFetch(options, options.timeout?.connectMs, async (response) => {
    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        statusMessages: options.statusMessages,
      });
    }
    return response;
  });
}

async function performFetch<T>(
  options: FetchOptions,
  timeoutMs: number | undefined,
  consume: (response: globalThis.Response) => Promise<T>,
): Promise<T> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    signal: externalSignal,
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  const linkedSignal = linkSignals(externalSignal, timeoutController.signal);

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeoutMs) {
    timeoutId = setTimeout(() => {
      timeoutController.abort();
    }, timeoutMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    try {
      const response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: linkedSignal,
      });
      return await consume(response);
    } catch (err) {
      if (externalSignal?.aborted) {
        throw new AbortError('Fetch was aborted', err instanceof Error ? err : undefined);
      }
      if (timeoutController.signal.aborted) {
        throw new TransportError(TIMEOUT_MESSAGE, 'timeout', err instanceof Error ? err : undefined);
      }
      if (err instanceof SDKError) {
        throw err;
      }
      throw classifyTransportError(err);
    }
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Links two abort signals so that either one being aborted aborts the result.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): AbortSignal {
  if (!externalSignal) {
    return targetSignal;
  }

  const controller = new AbortController();

  externalSignal.addEventListener('abort', () => controller.abort(), { once: true });
  targetSignal.addEventListener('abort', () => controller.abort(), { once: true });

  return controller.signal;
}

import { TransportError } from '../types/error.js';
import { TIMEOUT_MESSAGE, classifyTransportError } from './error-mapping.js';

/** One `data: ` line of the stream, prefix removed. */
export type SSEEvent = {
  readonly data: string;
};

export type SSEStreamOptions = {
  /** Abort the stream when no complete line arrives for this long. */
  readonly readTimeoutMs?: number;
};

export const DATA_PREFIX = 'data: ';

const LINE_BREAK = /\r\n|\n|\r/;

/**
 * Splits decoded text into lines. A trailing partial line is carried into the
 * next chunk and flushed when the body ends.
 */
export function createLineSplitter(): TransformStream<string, string> {
  let carry = '';
  return new TransformStream<string, string>({
    transform(chunk, controller) {
      const lines = (carry + chunk).split(LINE_BREAK);
      carry = lines.pop() ?? '';
      for (const line of lines) {
        controller.enqueue(line);
      }
    },
    flush(controller) {
      if (carry) {
        controller.enqueue(carry);
      }
    },
  });
}

type ReadOutcome<T> =
  | { readonly kind: 'value'; readonly result: ReadableStreamReadResult<T> }
  | { readonly kind: 'error'; readonly error: unknown }
  | { readonly kind: 'timeout' };

async function readNext<T>(
  reader: ReadableStreamDefaultReader<T>,
  timeoutMs: number | undefined,
): Promise<ReadOutcome<T>> {
  const read = reader.read().then(
    (result): ReadOutcome<T> => ({ kind: 'value', result }),
    (error: unknown): ReadOutcome<T> => ({ kind: 'error', error }),
  );

  if (!timeoutMs) {
    return read;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<ReadOutcome<T>>((resolve) => {
    timeoutId = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  try {
    return await Promise.race([read, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Creates an async iterable of `data: ` payloads from a Response body.
 * Every line is handled on its own as soon as it ends: other lines (blank
 * separators, comments, `event:` and `id:` fields) are dropped, and
 * consecutive data lines are never joined.
 *
 * Leaving the loop early (break, return, or a thrown error in the consumer)
 * cancels the body, which releases the underlying connection.
 */
export async function* createSSEStream(
  response: globalThis.Response,
  options: SSEStreamOptions = {},
): AsyncGenerator<SSEEvent> {
  const body = response.body;
  if (!body) {
    throw new TransportError('Network error: Response body is empty', 'io');
  }

  const reader = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(createLineSplitter())
    .getReader();

  let streamClosed = false;

  try {
    while (true) {
      const outcome = await readNext(reader, options.readTimeoutMs);

      if (outcome.kind === 'timeout') {
        throw new TransportError(TIMEOUT_MESSAGE, 'timeout');
      }

      if (outcome.kind === 'error') {
        streamClosed = true;
        throw classifyTransportError(outcome.error);
      }

      if (outcome.result.done) {
        streamClosed = true;
        return;
      }

      const line = outcome.result.value;
      if (line.startsWith(DATA_PREFIX)) {
        yield { data: line.slice(DATA_PREFIX.length) };
      }
    }
  } finally {
    if (!streamClosed) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

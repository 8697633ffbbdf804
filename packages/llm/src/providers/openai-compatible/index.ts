import type {
  ApiResult,
  ErrorEvent,
  ProviderConfig,
  StreamEvent,
  TimeoutConfig,
} from '../../types/index.js';
import { AbortError, DEFAULT_TIMEOUT, failure, success } from '../../types/index.js';
import { fetchStream, fetchWithTimeout } from '../../utils/http.js';
import { createSSEStream } from '../../utils/sse.js';
import { toErrorEvent } from '../../utils/error-mapping.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import {
  translateConnectionTest,
  translateModelsRequest,
  translateRequest,
  type ChatRequest,
} from './request.js';
import { translateCompletionText, translateModelList } from './response.js';
import { translateStream } from './stream.js';

export const CONNECTION_SUCCESS_TEXT = 'Connection successful!';
export const MODELS_NOT_FOUND_MESSAGE = 'Models endpoint not found.';

/** Anything that can run one streaming chat round. */
export interface ChatStreamer {
  streamChat(request: ChatRequest): AsyncIterable<StreamEvent>;
}

export type OpenAICompatibleClientOptions = {
  readonly timeout?: TimeoutConfig;
  readonly logger?: Logger;
};

function isCancellation(err: unknown, signal: AbortSignal | undefined): boolean {
  return err instanceof AbortError || signal?.aborted === true;
}

export class OpenAICompatibleClient implements ChatStreamer {
  private readonly timeout: TimeoutConfig;
  private readonly logger: Logger;

  constructor(options: OpenAICompatibleClientOptions = {}) {
    this.timeout = { ...DEFAULT_TIMEOUT, ...options.timeout };
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Streams one chat completion. Yields CONTENT and REASONING deltas as they
   * arrive and ends with DONE, with the complete TOOL_CALL_REQUESTED events
   * of a `tool_calls` finish, or with a single ERROR.
   * Aborting `request.signal` ends the stream silently.
   */
  async *streamChat(request: ChatRequest): AsyncGenerator<StreamEvent> {
    const { url, headers, body } = translateRequest(request, true);
    const timeout = { ...this.timeout, ...request.timeout };

    this.logger({
      domain: 'chat',
      action: 'request',
      model: request.config.model,
      messageCount: request.messages.length,
      streaming: true,
    });

    let response: globalThis.Response;
    try {
      response = await fetchStream({
        url,
        method: 'POST',
        headers,
        body,
        timeout,
        signal: request.signal,
      });
    } catch (err) {
      if (isCancellation(err, request.signal)) {
        return;
      }
      yield this.reportError(err);
      return;
    }

    try {
      const sseStream = createSSEStream(response, { readTimeoutMs: timeout.streamReadMs });
      yield* translateStream(sseStream);
    } catch (err) {
      if (isCancellation(err, request.signal)) {
        return;
      }
      yield this.reportError(err);
    }
  }

  async testConnection(config: ProviderConfig, signal?: AbortSignal): Promise<ApiResult<string>> {
    const { url, headers, body } = translateConnectionTest(config);

    try {
      const { text } = await fetchWithTimeout({
        url,
        method: 'POST',
        headers,
        body,
        timeout: this.timeout,
        signal,
      });
      return success(translateCompletionText(text) ?? CONNECTION_SUCCESS_TEXT);
    } catch (err) {
      const event = this.reportError(err);
      return failure(event.message, event.statusCode);
    }
  }

  async listModels(
    config: ProviderConfig,
    signal?: AbortSignal,
  ): Promise<ApiResult<ReadonlyArray<string>>> {
    const { url, headers } = translateModelsRequest(config);

    let text: string;
    try {
      ({ text } = await fetchWithTimeout({
        url,
        method: 'GET',
        headers,
        timeout: this.timeout,
        signal,
        statusMessages: { 404: MODELS_NOT_FOUND_MESSAGE },
      }));
    } catch (err) {
      const event = this.reportError(err);
      return failure(event.message, event.statusCode);
    }

    try {
      return success(translateModelList(text));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return failure(`Failed to parse models response: ${reason}`);
    }
  }

  private reportError(err: unknown): ErrorEvent {
    const event = toErrorEvent(err);
    this.logger({
      domain: 'chat',
      action: 'error',
      error: event.message,
      statusCode: event.statusCode,
    });
    return event;
  }
}

export {
  translateRequest,
  translateMessage,
  translateConnectionTest,
  translateModelsRequest,
  type ChatRequest,
} from './request.js';
export { translateStream } from './stream.js';
export { translateCompletionText, translateModelList } from './response.js';
export { parsePayload, type ParsedPayload, type ChatCompletionChunk, type ToolCallDeltaChunk } from './chunk.js';
export {
  ToolCallAggregator,
  NO_TOOL_CALLS_MESSAGE,
  INCOMPLETE_TOOL_CALLS_MESSAGE,
  type ToolCallFinalization,
} from './tool-calls.js';

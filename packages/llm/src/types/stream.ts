import type { ToolCall } from './message.js';

export type ContentEvent = {
  readonly type: 'CONTENT';
  readonly text: string;
};

export type ReasoningEvent = {
  readonly type: 'REASONING';
  readonly text: string;
};

/**
 * Terminal failure for the current call. `statusCode` carries the HTTP status
 * when the server answered with a non-2xx response, and is null otherwise.
 */
export type ErrorEvent = {
  readonly type: 'ERROR';
  readonly message: string;
  readonly statusCode: number | null;
};

export type ToolCallRequestedEvent = {
  readonly type: 'TOOL_CALL_REQUESTED';
  readonly toolCall: ToolCall;
};

export type WebSearchStartedEvent = {
  readonly type: 'WEB_SEARCH_STARTED';
  readonly query: string;
};

export type DoneEvent = {
  readonly type: 'DONE';
};

export type StreamEvent =
  | ContentEvent
  | ReasoningEvent
  | ErrorEvent
  | ToolCallRequestedEvent
  | WebSearchStartedEvent
  | DoneEvent;

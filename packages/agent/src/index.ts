// @chatwire/agent — bounded web-search tool loop on top of @chatwire/llm

export * from './types/index.js';
export { createEventChannel, type EventChannel } from './session/events.js';
export { MAX_TOOL_ROUNDS, runToolLoop } from './session/loop.js';
export { streamConversation, type LoopContext } from './session/session.js';
export { executeToolCall, type DispatchContext, type ToolCallOutcome } from './tools/dispatch.js';
export {
  WEB_SEARCH_TOOL,
  WEB_SEARCH_TOOL_NAME,
  MAX_QUERY_LENGTH,
  parseSearchQuery,
  truncateQuery,
} from './tools/web-search.js';
export { WebSearchClient, type WebSearchClientOptions } from './search/client.js';
export { NO_RESULTS, formatResults, type SearchResult } from './search/format.js';
export { searchHttpErrorMessage } from './search/request.js';

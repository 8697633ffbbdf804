import { toolMessage, type Logger, type StreamEvent, type ToolCall, type ToolMessage } from '@chatwire/llm';
import type { WebSearchOptions } from '../types/index.js';
import { WEB_SEARCH_TOOL_NAME, parseSearchQuery, truncateQuery } from './web-search.js';

export type DispatchContext = {
  readonly turnId: string;
  readonly webSearch: WebSearchOptions | undefined;
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly emit: (event: StreamEvent) => void;
};

export type ToolCallOutcome =
  | { readonly kind: 'result'; readonly message: ToolMessage }
  | { readonly kind: 'error'; readonly message: string }
  | { readonly kind: 'cancelled' };

/**
 * Executes one tool call.
 *
 * - web_search: emits WEB_SEARCH_STARTED and runs the search adapter
 * - any other name: answers with an "Unknown tool" tool message
 *
 * A result that arrives after cancellation is discarded.
 */
export async function executeToolCall(
  call: ToolCall,
  context: DispatchContext,
): Promise<ToolCallOutcome> {
  const { webSearch } = context;

  if (call.name !== WEB_SEARCH_TOOL_NAME || !webSearch) {
    return { kind: 'result', message: toolMessage(call.id, `Unknown tool: ${call.name}`) };
  }

  const query = truncateQuery(parseSearchQuery(call.arguments));
  context.emit({ type: 'WEB_SEARCH_STARTED', query });
  context.logger({
    domain: 'chat',
    action: 'tool_call',
    turnId: context.turnId,
    tool: call.name,
    status: 'started',
  });

  const startedAt = Date.now();
  let result: string;
  try {
    result = await webSearch.adapter.search(
      query,
      webSearch.config.apiKey,
      webSearch.config.provider,
      context.signal,
    );
  } catch (error) {
    if (context.signal.aborted) {
      return { kind: 'cancelled' };
    }
    const reason = error instanceof Error ? error.message : String(error);
    context.logger({
      domain: 'chat',
      action: 'tool_call',
      turnId: context.turnId,
      tool: call.name,
      status: 'error',
      durationMs: Date.now() - startedAt,
    });
    return { kind: 'error', message: `Web search failed: ${reason}` };
  }

  if (context.signal.aborted) {
    return { kind: 'cancelled' };
  }

  context.logger({
    domain: 'chat',
    action: 'tool_call',
    turnId: context.turnId,
    tool: call.name,
    status: 'completed',
    durationMs: Date.now() - startedAt,
  });
  return { kind: 'result', message: toolMessage(call.id, result) };
}

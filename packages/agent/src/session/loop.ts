import { assistantMessage } from '@chatwire/llm';
import type { ChatMessage, ToolCall } from '@chatwire/llm';
import type { LoopContext } from './session.js';
import { executeToolCall } from '../tools/dispatch.js';
import { WEB_SEARCH_TOOL } from '../tools/web-search.js';

export const MAX_TOOL_ROUNDS = 5;

type RoundOutcome =
  | { readonly kind: 'completed'; readonly text: string; readonly toolCalls: ReadonlyArray<ToolCall> }
  | { readonly kind: 'failed' }
  | { readonly kind: 'cancelled' };

type ToolRoundOutcome = 'completed' | 'failed' | 'cancelled';

/**
 * Drives one conversation turn: streams a round, runs the requested tool
 * calls, and resubmits until the model answers without tool calls or
 * MAX_TOOL_ROUNDS rounds have run. Ends with exactly one DONE, unless a
 * round or a tool call failed (the ERROR is the last event) or the turn
 * was cancelled (nothing more is emitted).
 */
export async function runToolLoop(context: LoopContext): Promise<void> {
  const startedAt = Date.now();

  for (let round = 1; round <= MAX_TOOL_ROUNDS; round++) {
    if (context.signal.aborted) {
      return;
    }

    context.logger({ domain: 'chat', action: 'round_start', turnId: context.turnId, round });

    const outcome = await streamRound(context);
    if (outcome.kind !== 'completed') {
      return;
    }

    if (outcome.toolCalls.length === 0) {
      context.logger({
        domain: 'chat',
        action: 'response',
        turnId: context.turnId,
        rounds: round,
        durationMs: Date.now() - startedAt,
      });
      context.emit({ type: 'DONE' });
      return;
    }

    context.messages.push(assistantMessage(outcome.text || undefined, outcome.toolCalls));

    const toolOutcome = await executeToolCalls(context, outcome.toolCalls);
    if (toolOutcome !== 'completed') {
      return;
    }
  }

  context.logger({ domain: 'chat', action: 'max_rounds', turnId: context.turnId, rounds: MAX_TOOL_ROUNDS });
  context.emit({ type: 'DONE' });
}

async function streamRound(context: LoopContext): Promise<RoundOutcome> {
  const tools = context.webSearch ? [WEB_SEARCH_TOOL] : undefined;
  // The client reads the list while serialising; later appends must not leak into this round
  const messages: ReadonlyArray<ChatMessage> = [...context.messages];

  let text = '';
  const toolCalls: Array<ToolCall> = [];
  let failed = false;

  for await (const event of context.client.streamChat({
    config: context.config,
    messages,
    ...(tools && { tools, toolChoice: 'auto' as const }),
    signal: context.signal,
  })) {
    if (context.signal.aborted) {
      break;
    }

    switch (event.type) {
      case 'CONTENT':
        text += event.text;
        context.emit(event);
        break;
      case 'REASONING':
        context.emit(event);
        break;
      case 'ERROR':
        failed = true;
        context.emit(event);
        break;
      case 'TOOL_CALL_REQUESTED':
        toolCalls.push(event.toolCall);
        break;
      case 'WEB_SEARCH_STARTED':
      case 'DONE':
        break;
    }
  }

  if (context.signal.aborted) {
    return { kind: 'cancelled' };
  }
  if (failed) {
    return { kind: 'failed' };
  }
  return { kind: 'completed', text, toolCalls };
}

async function executeToolCalls(
  context: LoopContext,
  toolCalls: ReadonlyArray<ToolCall>,
): Promise<ToolRoundOutcome> {
  for (const toolCall of toolCalls) {
    if (context.signal.aborted) {
      return 'cancelled';
    }

    const outcome = await executeToolCall(toolCall, context);

    if (outcome.kind === 'cancelled') {
      return 'cancelled';
    }

    if (outcome.kind === 'error') {
      context.emit({ type: 'ERROR', message: outcome.message, statusCode: null });
      return 'failed';
    }

    context.messages.push(outcome.message);
  }

  return 'completed';
}

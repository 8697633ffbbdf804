import type { SSEEvent } from '../../utils/sse.js';
import type { StreamEvent } from '../../types/index.js';
import { parsePayload } from './chunk.js';
import { ToolCallAggregator } from './tool-calls.js';

export const TOOL_CALLS_FINISH_REASON = 'tool_calls';

/**
 * Turns SSE events into StreamEvents. Content and reasoning deltas are
 * forwarded as they arrive; tool-call fragments are held until the
 * `tool_calls` finish reason, then emitted as complete calls.
 *
 * Returning stops iteration of `sseStream`, which closes the connection.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
): AsyncGenerator<StreamEvent> {
  const toolCalls = new ToolCallAggregator();

  try {
    for await (const event of sseStream) {
      const payload = parsePayload(event.data);

      if (payload.kind === 'SKIP') {
        continue;
      }

      if (payload.kind === 'DONE') {
        yield { type: 'DONE' };
        return;
      }

      // Only the first choice is consulted
      const choice = payload.chunk.choices?.[0];
      if (!choice) {
        continue;
      }

      const delta = choice.delta;

      if (delta?.content) {
        yield { type: 'CONTENT', text: delta.content };
      }

      if (delta?.reasoning_content) {
        yield { type: 'REASONING', text: delta.reasoning_content };
      }

      for (const toolCallDelta of delta?.tool_calls ?? []) {
        toolCalls.add(toolCallDelta);
      }

      const finishReason = choice.finish_reason;
      if (!finishReason || finishReason === 'null') {
        continue;
      }

      if (finishReason === TOOL_CALLS_FINISH_REASON) {
        const { toolCalls: completed, error } = toolCalls.finalize();
        for (const toolCall of completed) {
          yield { type: 'TOOL_CALL_REQUESTED', toolCall };
        }
        if (error) {
          yield { type: 'ERROR', message: error.message, statusCode: null };
        }
        return;
      }

      yield { type: 'DONE' };
      return;
    }

    // Body ended without [DONE] or a finish reason
    yield { type: 'DONE' };
  } finally {
    toolCalls.clear();
  }
}

import type { ToolCall } from '../../types/message.js';
import { StreamCorruptionError } from '../../types/error.js';
import type { ToolCallDeltaChunk } from './chunk.js';

export const NO_TOOL_CALLS_MESSAGE = 'Received tool_calls finish but no tool calls were accumulated';
export const INCOMPLETE_TOOL_CALLS_MESSAGE = 'One or more tool calls in the stream were incomplete';

export type ToolCallFinalization = {
  readonly toolCalls: ReadonlyArray<ToolCall>;
  readonly error: StreamCorruptionError | null;
};

/**
 * Reassembles streamed tool calls. Fragments are keyed by the protocol's
 * integer index, because the id may arrive after the name or the arguments.
 * One instance belongs to exactly one streaming call.
 */
export class ToolCallAggregator {
  private readonly indices = new Set<number>();
  private readonly ids = new Map<number, string>();
  private readonly names = new Map<number, string>();
  private readonly argumentParts = new Map<number, Array<string>>();

  get size(): number {
    return this.indices.size;
  }

  add(delta: ToolCallDeltaChunk): void {
    const index = delta.index ?? 0;
    this.indices.add(index);

    if (delta.id) {
      this.ids.set(index, delta.id);
    }

    const name = delta.function?.name;
    if (name) {
      this.names.set(index, name);
    }

    const fragment = delta.function?.arguments;
    if (fragment) {
      const parts = this.argumentParts.get(index);
      if (parts) {
        parts.push(fragment);
      } else {
        this.argumentParts.set(index, [fragment]);
      }
    }
  }

  /**
   * Emits every complete call in ascending index order. Calls missing an id
   * or a name are dropped and reported through a single corruption error.
   * The aggregator is empty afterwards.
   */
  finalize(): ToolCallFinalization {
    if (this.indices.size === 0) {
      return { toolCalls: [], error: new StreamCorruptionError(NO_TOOL_CALLS_MESSAGE) };
    }

    const toolCalls: Array<ToolCall> = [];
    let incomplete = false;

    for (const index of [...this.indices].sort((a, b) => a - b)) {
      const id = this.ids.get(index);
      const name = this.names.get(index);
      if (!id || !name) {
        incomplete = true;
        continue;
      }
      const args = this.argumentParts.get(index)?.join('') ?? '';
      toolCalls.push({ id, name, arguments: args || '{}' });
    }

    this.clear();

    return {
      toolCalls,
      error: incomplete ? new StreamCorruptionError(INCOMPLETE_TOOL_CALLS_MESSAGE) : null,
    };
  }

  clear(): void {
    this.indices.clear();
    this.ids.clear();
    this.names.clear();
    this.argumentParts.clear();
  }
}

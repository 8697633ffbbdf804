import { nanoid } from 'nanoid';
import { silentLogger, toErrorEvent } from '@chatwire/llm';
import type {
  ChatMessage,
  ChatStreamer,
  Logger,
  ProviderConfig,
  StreamEvent,
} from '@chatwire/llm';
import type { Conversation, ConversationOptions, WebSearchOptions } from '../types/index.js';
import { createEventChannel } from './events.js';
import { runToolLoop } from './loop.js';

export type LoopContext = {
  readonly turnId: string;
  readonly client: ChatStreamer;
  readonly config: ProviderConfig;
  readonly messages: Array<ChatMessage>;
  readonly webSearch: WebSearchOptions | undefined;
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly emit: (event: StreamEvent) => void;
};

/**
 * Starts one conversation turn in the background and returns its event
 * stream. Aborting `options.signal`, calling `cancel()` or leaving the
 * `for await` loop early all cancel the turn: the in-flight request is torn
 * down, no further search starts and the event stream ends.
 */
export function streamConversation(options: ConversationOptions): Conversation {
  const turnId = nanoid();
  const abortController = new AbortController();
  const channel = createEventChannel<StreamEvent>(() => abortController.abort());
  const messages: Array<ChatMessage> = [...options.messages];

  const externalSignal = options.signal;
  const onExternalAbort = (): void => channel.cancel();
  if (externalSignal?.aborted) {
    channel.cancel();
  } else {
    externalSignal?.addEventListener('abort', onExternalAbort, { once: true });
  }
  const detach = (): void => externalSignal?.removeEventListener('abort', onExternalAbort);

  const context: LoopContext = {
    turnId,
    client: options.client,
    config: options.config,
    messages,
    webSearch: options.webSearch,
    signal: abortController.signal,
    logger: options.logger ?? silentLogger,
    emit: channel.emit,
  };

  void runToolLoop(context).then(
    () => {
      detach();
      channel.complete();
    },
    (error: unknown) => {
      detach();
      channel.emit(toErrorEvent(error));
      channel.complete();
    },
  );

  return {
    turnId,
    events: channel.iterator,
    cancel: channel.cancel,
    messages: () => [...messages],
  };
}

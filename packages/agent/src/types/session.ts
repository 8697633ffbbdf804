import type {
  ChatMessage,
  ChatStreamer,
  Logger,
  ProviderConfig,
  StreamEvent,
} from '@chatwire/llm';
import type { WebSearchOptions } from './search.js';

export type ConversationOptions = {
  readonly client: ChatStreamer;
  readonly config: ProviderConfig;
  /** Prior messages of the conversation, oldest first. */
  readonly messages: ReadonlyArray<ChatMessage>;
  /** Enables the web_search tool. */
  readonly webSearch?: WebSearchOptions;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
};

export type Conversation = {
  readonly turnId: string;
  /** Single-consumer. Leaving the loop early cancels the turn. */
  readonly events: () => AsyncIterable<StreamEvent>;
  readonly cancel: () => void;
  /** The running message list: the prior messages plus every tool exchange so far. */
  readonly messages: () => ReadonlyArray<ChatMessage>;
};

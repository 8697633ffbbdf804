export type { SearchAdapter, WebSearchOptions } from './search.js';
export type { ConversationOptions, Conversation } from './session.js';

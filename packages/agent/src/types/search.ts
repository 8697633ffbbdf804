import type { WebSearchConfig } from '@chatwire/llm';

/**
 * Runs one web search and returns the formatted result text.
 * Failures are thrown; the loop reports them as a single ERROR event.
 */
export interface SearchAdapter {
  /** Unknown provider names fall back to Brave. */
  search(query: string, apiKey: string, provider: string, signal?: AbortSignal): Promise<string>;
}

export type WebSearchOptions = {
  readonly config: WebSearchConfig;
  readonly adapter: SearchAdapter;
};

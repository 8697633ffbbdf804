import { silentLogger, type Logger } from '@chatwire/llm';
import type { SearchAdapter } from '../types/index.js';
import { truncateQuery } from '../tools/web-search.js';
import { searchBrave } from './brave.js';
import { searchTavily } from './tavily.js';
import { searchSynthetic } from './synthetic.js';

export type WebSearchClientOptions = {
  readonly logger?: Logger;
};

/** Search adapter backed by the Brave, Tavily and Synthetic HTTP APIs. */
export class WebSearchClient implements SearchAdapter {
  private readonly logger: Logger;

  constructor(options: WebSearchClientOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: string, apiKey: string, provider: string, signal?: AbortSignal): Promise<string> {
    const trimmedQuery = truncateQuery(query);
    this.logger({ domain: 'search', action: 'request', provider, queryLength: trimmedQuery.length });

    try {
      switch (provider) {
        case 'tavily':
          return await searchTavily(trimmedQuery, apiKey, signal);
        case 'synthetic':
          return await searchSynthetic(trimmedQuery, apiKey, signal);
        default:
          return await searchBrave(trimmedQuery, apiKey, signal);
      }
    } catch (error) {
      this.logger({
        domain: 'search',
        action: 'error',
        provider,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

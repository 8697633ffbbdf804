export type TimeoutConfig = {
  /** Time allowed until response headers arrive. */
  readonly connectMs?: number;
  /** Time allowed for a complete non-streaming exchange, body included. */
  readonly requestMs?: number;
  /** Longest silence tolerated between two reads of a streaming body. */
  readonly streamReadMs?: number;
};

export const DEFAULT_TIMEOUT: TimeoutConfig = {
  connectMs: 30_000,
  requestMs: 60_000,
  streamReadMs: 60_000,
};

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL = 'gpt-4';

export type ProviderConfig = {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly systemPrompt?: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly name?: string;
};

export type WebSearchProvider = 'brave' | 'tavily' | 'synthetic';

export type WebSearchConfig = {
  readonly provider: WebSearchProvider;
  readonly apiKey: string;
};

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

export function isConfigured(config: Readonly<ProviderConfig>): boolean {
  return (
    config.baseUrl.trim() !== '' &&
    config.apiKey.trim() !== '' &&
    config.model.trim() !== ''
  );
}

import { z } from 'zod';
import type { ProviderConfig, WebSearchConfig } from '../types/config.js';
import { ConfigurationError, DEFAULT_BASE_URL, DEFAULT_MODEL } from '../types/index.js';

export const ENV_PREFIX = 'CHATWIRE_';

const EnvSchema = z.object({
  CHATWIRE_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  CHATWIRE_API_KEY: z.string().min(1),
  CHATWIRE_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  CHATWIRE_SYSTEM_PROMPT: z.string().optional(),
  CHATWIRE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  CHATWIRE_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  CHATWIRE_SEARCH_PROVIDER: z.enum(['brave', 'tavily', 'synthetic']).default('brave'),
  CHATWIRE_SEARCH_API_KEY: z.string().min(1).optional(),
});

export type EnvConfig = {
  readonly provider: ProviderConfig;
  /** Null when no search API key is set, which disables the web_search tool. */
  readonly webSearch: WebSearchConfig | null;
};

/**
 * Builds the active provider and web search settings from environment variables.
 * Blank variables count as unset.
 */
export function loadConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): EnvConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const names = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigurationError(`Invalid configuration: ${names.join(', ')}`);
  }

  const parsed = result.data;

  return {
    provider: {
      baseUrl: parsed.CHATWIRE_BASE_URL,
      apiKey: parsed.CHATWIRE_API_KEY,
      model: parsed.CHATWIRE_MODEL,
      temperature: parsed.CHATWIRE_TEMPERATURE,
      ...(parsed.CHATWIRE_SYSTEM_PROMPT !== undefined && { systemPrompt: parsed.CHATWIRE_SYSTEM_PROMPT }),
      ...(parsed.CHATWIRE_MAX_TOKENS !== undefined && { maxTokens: parsed.CHATWIRE_MAX_TOKENS }),
    },
    webSearch: parsed.CHATWIRE_SEARCH_API_KEY
      ? { provider: parsed.CHATWIRE_SEARCH_PROVIDER, apiKey: parsed.CHATWIRE_SEARCH_API_KEY }
      : null,
  };
}

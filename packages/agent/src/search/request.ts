import type { z } from 'zod';
import { ProtocolError, ToolExecutionError, fetchWithTimeout } from '@chatwire/llm';
import type { FetchOptions, TimeoutConfig } from '@chatwire/llm';

export const SEARCH_TIMEOUT: TimeoutConfig = {
  requestMs: 30_000,
};

export function searchHttpErrorMessage(statusCode: number): string {
  switch (statusCode) {
    case 401:
      return 'Invalid API key (HTTP 401)';
    case 403:
      return 'Access forbidden (HTTP 403)';
    case 429:
      return 'Rate limit exceeded, try again later (HTTP 429)';
    default:
      return `HTTP error ${statusCode}`;
  }
}

/**
 * Sends one search request and returns the body text.
 * Non-2xx responses throw a ToolExecutionError prefixed with the provider label;
 * transport failures keep their own messages.
 */
export async function fetchSearch(label: string, options: FetchOptions): Promise<string> {
  try {
    const { text } = await fetchWithTimeout({ timeout: SEARCH_TIMEOUT, ...options });
    return text;
  } catch (error) {
    if (error instanceof ProtocolError) {
      throw new ToolExecutionError(`${label}: ${searchHttpErrorMessage(error.statusCode)}`, label, error);
    }
    throw error;
  }
}

/**
 * Parses a search response body. Returns null for an empty body.
 */
export function parseSearchBody<T>(
  label: string,
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | null {
  if (body === '') {
    return null;
  }

  try {
    return schema.parse(JSON.parse(body));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolExecutionError(
      `Failed to parse ${label} results: ${reason}`,
      label,
      error instanceof Error ? error : undefined,
    );
  }
}

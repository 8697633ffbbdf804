import { z } from 'zod';
import type { ToolDefinition } from '@chatwire/llm';

export const WEB_SEARCH_TOOL_NAME = 'web_search';
export const MAX_QUERY_LENGTH = 400;

export const WEB_SEARCH_TOOL: ToolDefinition = {
  name: WEB_SEARCH_TOOL_NAME,
  description:
    'Search the web for current information. Use this for recent events, ' +
    'facts you are unsure about, or anything that may have changed after your training data.',
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: `The search query (max ${MAX_QUERY_LENGTH} characters)`,
      },
    },
    required: ['query'],
  },
};

const searchArgumentsSchema = z.object({
  query: z.string(),
});

/**
 * Takes the `query` string out of a web_search call's JSON arguments.
 * Arguments that are not such an object, or carry a blank query, are used
 * verbatim as the query.
 */
export function parseSearchQuery(rawArguments: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArguments);
  } catch {
    return rawArguments;
  }

  const result = searchArgumentsSchema.safeParse(parsed);
  if (result.success && result.data.query.trim() !== '') {
    return result.data.query;
  }
  return rawArguments;
}

export function truncateQuery(query: string): string {
  return query.slice(0, MAX_QUERY_LENGTH);
}

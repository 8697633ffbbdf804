import { z } from 'zod';
import { formatResults } from './format.js';
import { fetchSearch, parseSearchBody } from './request.js';

export const TAVILY_LABEL = 'Tavily';
export const TAVILY_ENDPOINT = 'https://api.tavily.com/search';

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        published_date: z.string().nullish(),
      }),
    )
    .nullish(),
});

export async function searchTavily(query: string, apiKey: string, signal?: AbortSignal): Promise<string> {
  const body = await fetchSearch(TAVILY_LABEL, {
    url: TAVILY_ENDPOINT,
    method: 'POST',
    body: {
      api_key: apiKey,
      query,
      search_depth: 'basic',
      max_results: 5,
    },
    signal,
  });

  const parsed = parseSearchBody(TAVILY_LABEL, body, tavilyResponseSchema);
  return formatResults(
    parsed?.results?.map((result) => ({
      title: result.title,
      url: result.url,
      snippet: result.content,
      published: result.published_date,
    })),
  );
}

import { z } from 'zod';
import { formatResults } from './format.js';
import { fetchSearch, parseSearchBody } from './request.js';

export const BRAVE_LABEL = 'Brave Search';
export const BRAVE_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

const braveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().nullish(),
            url: z.string().nullish(),
            description: z.string().nullish(),
            page_age: z.string().nullish(),
          }),
        )
        .nullish(),
    })
    .nullish(),
});

export async function searchBrave(query: string, apiKey: string, signal?: AbortSignal): Promise<string> {
  const url = new URL(BRAVE_ENDPOINT);
  url.searchParams.set('q', query);
  url.searchParams.set('count', '5');

  const body = await fetchSearch(BRAVE_LABEL, {
    url: url.toString(),
    method: 'GET',
    headers: {
      'X-Subscription-Token': apiKey,
      Accept: 'application/json',
    },
    signal,
  });

  const parsed = parseSearchBody(BRAVE_LABEL, body, braveResponseSchema);
  return formatResults(
    parsed?.web?.results?.map((result) => ({
      title: result.title,
      url: result.url,
      snippet: result.description,
      published: result.page_age,
    })),
  );
}

import { z } from 'zod';
import { formatResults } from './format.js';
import { fetchSearch, parseSearchBody } from './request.js';

export const SYNTHETIC_LABEL = 'Synthetic Search';
export const SYNTHETIC_ENDPOINT = 'https://api.synthetic.new/v2/search';

const syntheticResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string().nullish(),
        title: z.string().nullish(),
        text: z.string().nullish(),
        published: z.string().nullish(),
      }),
    )
    .nullish(),
});

export async function searchSynthetic(query: string, apiKey: string, signal?: AbortSignal): Promise<string> {
  const body = await fetchSearch(SYNTHETIC_LABEL, {
    url: SYNTHETIC_ENDPOINT,
    method: 'POST',
    headers: {
      Authorization: `Bearer ${apiKey}`,
    },
    body: { query },
    signal,
  });

  const parsed = parseSearchBody(SYNTHETIC_LABEL, body, syntheticResponseSchema);
  return formatResults(
    parsed?.results?.map((result) => ({
      title: result.title,
      url: result.url,
      snippet: result.text,
      published: result.published,
    })),
  );
}

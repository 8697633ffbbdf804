export const NO_RESULTS = 'No results found';

export type SearchResult = {
  readonly title?: string | null;
  readonly url?: string | null;
  readonly snippet?: string | null;
  readonly published?: string | null;
};

/**
 * Renders results as numbered entries separated by blank lines:
 *
 *     1. Title
 *        URL: https://example.com
 *        Snippet text
 *        Published: 2024-05-01
 */
export function formatResults(results: ReadonlyArray<SearchResult> | null | undefined): string {
  if (!results || results.length === 0) {
    return NO_RESULTS;
  }

  const entries = results.map((result, i) => {
    const lines = [`${i + 1}. ${result.title ?? 'No title'}`, `   URL: ${result.url ?? 'No URL'}`];
    if (result.snippet && result.snippet.trim() !== '') {
      lines.push(`   ${result.snippet}`);
    }
    if (result.published && result.published.trim() !== '') {
      lines.push(`   Published: ${result.published}`);
    }
    return lines.join('\n');
  });

  return entries.join('\n\n').trim();
}

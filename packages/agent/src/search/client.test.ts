import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ToolExecutionError, type LogEvent } from '@chatwire/llm';
import { WebSearchClient } from './client.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: object, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function lastRequest(): { url: string; init: RequestInit | undefined } {
  const call = fetchMock.mock.calls.at(-1);
  return { url: String(call?.[0]), init: call?.[1] };
}

describe('WebSearchClient', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  describe('brave', () => {
    it('should send a GET with the subscription token and format results', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          web: {
            results: [
              {
                title: 'Node.js 20',
                url: 'https://example.com/node',
                description: 'LTS release',
                page_age: '2023-10-24',
              },
            ],
          },
        }),
      );

      const text = await new WebSearchClient().search('node lts', 'test-search-key', 'brave');

      expect(text).toBe('1. Node.js 20\n   URL: https://example.com/node\n   LTS release\n   Published: 2023-10-24');
      const { url, init } = lastRequest();
      expect(url).toBe('https://api.search.brave.com/res/v1/web/search?q=node+lts&count=5');
      expect(init?.method).toBe('GET');
      expect(init?.headers).toMatchObject({
        'X-Subscription-Token': 'test-search-key',
        Accept: 'application/json',
      });
    });

    it('should fall back to Brave for unknown provider names', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ web: { results: [] } }));

      const text = await new WebSearchClient().search('x', 'test-search-key', 'duckduckgo');

      expect(text).toBe('No results found');
      expect(lastRequest().url.startsWith('https://api.search.brave.com/')).toBe(true);
    });

    it('should return no results when the web section is missing', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ query: { original: 'x' } }));

      expect(await new WebSearchClient().search('x', 'test-search-key', 'brave')).toBe('No results found');
    });

    it('should map 401 to an invalid key error', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 401));

      const promise = new WebSearchClient().search('x', 'test-search-key', 'brave');

      await expect(promise).rejects.toBeInstanceOf(ToolExecutionError);
      await expect(promise).rejects.toThrow('Brave Search: Invalid API key (HTTP 401)');
    });
  });

  describe('tavily', () => {
    it('should post the key and query in the body', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          results: [
            { title: 'A', url: 'https://a.example', content: 'alpha', published_date: null },
            { title: 'B', url: 'https://b.example', content: '' },
          ],
        }),
      );

      const text = await new WebSearchClient().search('letters', 'test-search-key', 'tavily');

      expect(text).toBe('1. A\n   URL: https://a.example\n   alpha\n\n2. B\n   URL: https://b.example');
      const { url, init } = lastRequest();
      expect(url).toBe('https://api.tavily.com/search');
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({
        api_key: 'test-search-key',
        query: 'letters',
        search_depth: 'basic',
        max_results: 5,
      });
    });

    it('should map 429 to a rate limit error', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 429));

      await expect(new WebSearchClient().search('x', 'test-search-key', 'tavily')).rejects.toThrow(
        'Tavily: Rate limit exceeded, try again later (HTTP 429)',
      );
    });

    it('should report unparseable bodies', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(new WebSearchClient().search('x', 'test-search-key', 'tavily')).rejects.toThrow(
        /^Failed to parse Tavily results: /,
      );
    });
  });

  describe('synthetic', () => {
    it('should post the query with bearer auth', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          results: [{ url: 'https://s.example', title: 'S', text: 'snippet', published: '2024-01-02' }],
        }),
      );

      const text = await new WebSearchClient().search('s', 'test-search-key', 'synthetic');

      expect(text).toBe('1. S\n   URL: https://s.example\n   snippet\n   Published: 2024-01-02');
      const { url, init } = lastRequest();
      expect(url).toBe('https://api.synthetic.new/v2/search');
      expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-search-key' });
      expect(JSON.parse(String(init?.body))).toEqual({ query: 's' });
    });

    it('should map 403 and other statuses', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 403));
      await expect(new WebSearchClient().search('x', 'test-search-key', 'synthetic')).rejects.toThrow(
        'Synthetic Search: Access forbidden (HTTP 403)',
      );

      fetchMock.mockResolvedValueOnce(jsonResponse({}, 502));
      await expect(new WebSearchClient().search('x', 'test-search-key', 'synthetic')).rejects.toThrow(
        'Synthetic Search: HTTP error 502',
      );
    });

    it('should return no results for an empty body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 200 }));

      expect(await new WebSearchClient().search('x', 'test-search-key', 'synthetic')).toBe('No results found');
    });
  });

  it('should truncate the query to 400 characters', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: [] }));

    await new WebSearchClient().search('z'.repeat(500), 'test-search-key', 'synthetic');

    expect(JSON.parse(String(lastRequest().init?.body))).toEqual({ query: 'z'.repeat(400) });
  });

  it('should log requests and failures', async () => {
    const logged: LogEvent[] = [];
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 401));

    await expect(
      new WebSearchClient({ logger: (event) => logged.push(event) }).search('abc', 'test-search-key', 'tavily'),
    ).rejects.toThrow();

    expect(logged).toEqual([
      { domain: 'search', action: 'request', provider: 'tavily', queryLength: 3 },
      { domain: 'search', action: 'error', provider: 'tavily', error: 'Tavily: Invalid API key (HTTP 401)' },
    ]);
  });
});

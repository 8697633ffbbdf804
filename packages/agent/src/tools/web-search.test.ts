import { describe, it, expect } from 'vitest';
import { WEB_SEARCH_TOOL, parseSearchQuery, truncateQuery } from './web-search.js';

describe('web_search tool', () => {
  it('should declare a required string query', () => {
    expect(WEB_SEARCH_TOOL.name).toBe('web_search');
    expect(WEB_SEARCH_TOOL.parameters).toEqual({
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The search query (max 400 characters)' },
      },
      required: ['query'],
    });
  });

  describe('parseSearchQuery', () => {
    it('should read the query field', () => {
      expect(parseSearchQuery('{"query":"rust release date"}')).toBe('rust release date');
    });

    it('should ignore extra fields', () => {
      expect(parseSearchQuery('{"query":"x","count":3}')).toBe('x');
    });

    it('should fall back to the raw string when it is not JSON', () => {
      expect(parseSearchQuery('weather in Oslo')).toBe('weather in Oslo');
    });

    it('should fall back to the raw string when the query is blank', () => {
      expect(parseSearchQuery('{"query":"  "}')).toBe('{"query":"  "}');
    });

    it('should fall back to the raw string when the query is not a string', () => {
      expect(parseSearchQuery('{"query":42}')).toBe('{"query":42}');
      expect(parseSearchQuery('["query"]')).toBe('["query"]');
    });
  });

  describe('truncateQuery', () => {
    it('should keep short queries', () => {
      expect(truncateQuery('short')).toBe('short');
    });

    it('should cut queries to 400 characters', () => {
      expect(truncateQuery('a'.repeat(401))).toHaveLength(400);
    });
  });
});

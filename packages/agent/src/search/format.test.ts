import { describe, it, expect } from 'vitest';
import { formatResults, NO_RESULTS } from './format.js';

describe('formatResults', () => {
  it('should return the no-results text for missing or empty lists', () => {
    expect(formatResults(null)).toBe(NO_RESULTS);
    expect(formatResults(undefined)).toBe(NO_RESULTS);
    expect(formatResults([])).toBe('No results found');
  });

  it('should number entries and separate them with blank lines', () => {
    const text = formatResults([
      {
        title: 'Release notes',
        url: 'https://example.com/notes',
        snippet: 'What changed in 2.0',
        published: '2024-05-01',
      },
      { title: 'Changelog', url: 'https://example.com/changelog' },
    ]);

    expect(text).toBe(
      [
        '1. Release notes',
        '   URL: https://example.com/notes',
        '   What changed in 2.0',
        '   Published: 2024-05-01',
        '',
        '2. Changelog',
        '   URL: https://example.com/changelog',
      ].join('\n'),
    );
  });

  it('should fill in missing titles and URLs and skip blank optional lines', () => {
    const text = formatResults([{ title: null, url: null, snippet: '  ', published: '' }]);

    expect(text).toBe('1. No title\n   URL: No URL');
  });
});

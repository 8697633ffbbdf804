import { describe, it, expect } from 'vitest';
import { isConfigured, normalizeBaseUrl, type ProviderConfig } from './config.js';

const config: ProviderConfig = {
  baseUrl: 'https://api.example.com/v1',
  apiKey: 'test-key',
  model: 'test-model',
};

describe('isConfigured', () => {
  it('should be true when base URL, key and model are set', () => {
    expect(isConfigured(config)).toBe(true);
  });

  it('should be false when any required field is blank', () => {
    expect(isConfigured({ ...config, baseUrl: '' })).toBe(false);
    expect(isConfigured({ ...config, apiKey: '' })).toBe(false);
    expect(isConfigured({ ...config, model: '' })).toBe(false);
  });

  it('should treat whitespace-only fields as blank', () => {
    expect(isConfigured({ ...config, baseUrl: '   ' })).toBe(false);
    expect(isConfigured({ ...config, apiKey: '\t' })).toBe(false);
    expect(isConfigured({ ...config, model: ' \n ' })).toBe(false);
  });
});

describe('normalizeBaseUrl', () => {
  it('should strip trailing slashes', () => {
    expect(normalizeBaseUrl('https://api.example.com/v1///')).toBe('https://api.example.com/v1');
    expect(normalizeBaseUrl('https://api.example.com/v1')).toBe('https://api.example.com/v1');
  });
});

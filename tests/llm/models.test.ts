import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EXTRACTION_MODEL,
  DEFAULT_OLLAMA_BASE_URL,
  createCompletionCapability,
  loadLlmSettings,
} from '@bidsignal/llm';

describe('loadLlmSettings', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadLlmSettings({})).toEqual({
      provider: 'ollama',
      baseUrl: DEFAULT_OLLAMA_BASE_URL,
      model: DEFAULT_EXTRACTION_MODEL,
      temperature: 0.1,
      maxTokens: 2048,
      timeout: 120000,
    });
  });

  it('reads and normalizes overrides', () => {
    const settings = loadLlmSettings({
      AWARDS_LLM_PROVIDER: ' NONE ',
      OLLAMA_BASE_URL: 'http://gpu-box:11434',
      AWARDS_LLM_TIMEOUT_MS: '5000',
    });
    expect(settings.provider).toBe('none');
    expect(settings.baseUrl).toBe('http://gpu-box:11434');
    expect(settings.timeout).toBe(5000);
  });

  it('replaces invalid values with defaults', () => {
    const settings = loadLlmSettings({
      AWARDS_LLM_PROVIDER: 'openai',
      OLLAMA_BASE_URL: 'not a url',
      AWARDS_LLM_TEMPERATURE: 'hot',
      AWARDS_LLM_MAX_TOKENS: '-5',
    });
    expect(settings.provider).toBe('ollama');
    expect(settings.baseUrl).toBe(DEFAULT_OLLAMA_BASE_URL);
    expect(settings.temperature).toBe(0.1);
    expect(settings.maxTokens).toBe(2048);
  });
});

describe('createCompletionCapability', () => {
  it('returns null when the provider is disabled', () => {
    expect(createCompletionCapability(loadLlmSettings({ AWARDS_LLM_PROVIDER: 'none' }))).toBeNull();
  });

  it('exposes chat and generate conventions for ollama', () => {
    const capability = createCompletionCapability(loadLlmSettings({}));
    expect(typeof capability?.chat).toBe('function');
    expect(typeof capability?.generate).toBe('function');
    expect(capability?.invoke).toBeUndefined();
  });
});

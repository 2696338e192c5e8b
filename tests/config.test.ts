import { describe, expect, it } from 'vitest';

import { loadConfig, requireCloudApiKey } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      logLevel: 'info',
      local: { url: 'http://localhost:11434', model: 'mistral' },
      cloud: {
        apiKey: undefined,
        baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai/',
        model: 'gemini-1.5-flash',
      },
      generation: { timeoutMs: 60_000, maxAttempts: 1 },
      resumeMaxChars: 4000,
      maxUploadBytes: 5 * 1024 * 1024,
      corsOrigins: ['http://localhost:8501', 'http://127.0.0.1:8501'],
    });
  });

  it('reads numeric and string overrides', () => {
    const config = loadConfig({
      PORT: '9100',
      LOG_LEVEL: 'DEBUG',
      OLLAMA_MODEL: 'llama3',
      GENERATION_MAX_ATTEMPTS: '3',
    });

    expect(config.port).toBe(9100);
    expect(config.logLevel).toBe('debug');
    expect(config.local.model).toBe('llama3');
    expect(config.generation.maxAttempts).toBe(3);
  });

  it('prefers CLOUD_API_KEY and falls back to GEMINI_API_KEY', () => {
    expect(loadConfig({ CLOUD_API_KEY: 'test-key', GEMINI_API_KEY: 'other-key' }).cloud.apiKey).toBe('test-key');
    expect(loadConfig({ GEMINI_API_KEY: ' test-key ' }).cloud.apiKey).toBe('test-key');
    expect(loadConfig({ CLOUD_API_KEY: '   ' }).cloud.apiKey).toBeUndefined();
  });

  it('splits the allowed origins list', () => {
    const config = loadConfig({ CORS_ALLOWED_ORIGINS: 'https://a.test, https://b.test,' });

    expect(config.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
  });

  it('rejects invalid values with every offending key', () => {
    const attempt = () => loadConfig({ PORT: '-1', LOG_LEVEL: 'loud' });

    expect(attempt).toThrow(ConfigurationError);
    expect(attempt).toThrow(/^Invalid configuration: PORT: .+; LOG_LEVEL: LOG_LEVEL must be one of debug, info, warn, error$/);
  });
});

describe('requireCloudApiKey', () => {
  it('returns the configured key', () => {
    expect(requireCloudApiKey(loadConfig({ CLOUD_API_KEY: 'test-key' }))).toBe('test-key');
  });

  it('throws a configuration error without a key', () => {
    expect(() => requireCloudApiKey(loadConfig({}))).toThrow(
      'Cloud model API key not configured. Set CLOUD_API_KEY (or GEMINI_API_KEY) to enable resume-based questions.',
    );
  });
});

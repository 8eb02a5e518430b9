// ============================================================
// Tests for src/config/env.ts
// ============================================================

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config/env';

describe('loadConfig', () => {
  it('should default to claude-sonnet with the Anthropic key', () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: 'test-secret' })).toEqual({
      providerId: 'claude-sonnet',
      apiKey: 'test-secret',
      model: undefined,
      maxTokens: 4000,
      temperature: 0.2,
    });
  });

  it('should read provider, model and numeric settings', () => {
    const config = loadConfig({
      OBJECT_FORGE_PROVIDER: 'gpt-4o-mini',
      OBJECT_FORGE_MODEL: 'gpt-4o-mini-2024-07-18',
      OBJECT_FORGE_MAX_TOKENS: '2048',
      OBJECT_FORGE_TEMPERATURE: '0.7',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(config).toEqual({
      providerId: 'gpt-4o-mini',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini-2024-07-18',
      maxTokens: 2048,
      temperature: 0.7,
    });
  });

  it('should fall back to GOOGLE_API_KEY for Gemini', () => {
    const config = loadConfig({ OBJECT_FORGE_PROVIDER: 'gemini-flash', GOOGLE_API_KEY: 'test-secret' });
    expect(config.apiKey).toBe('test-secret');
  });

  it('should prefer GEMINI_API_KEY over GOOGLE_API_KEY', () => {
    const config = loadConfig({
      OBJECT_FORGE_PROVIDER: 'gemini-pro',
      GEMINI_API_KEY: 'gemini-key',
      GOOGLE_API_KEY: 'google-key',
    });
    expect(config.apiKey).toBe('gemini-key');
  });

  it('should ignore blank values', () => {
    const config = loadConfig({ OBJECT_FORGE_PROVIDER: '  ', OBJECT_FORGE_MODEL: '', ANTHROPIC_API_KEY: 'k' });
    expect(config.providerId).toBe('claude-sonnet');
    expect(config.model).toBeUndefined();
  });

  it('should reject an unknown provider', () => {
    try {
      loadConfig({ OBJECT_FORGE_PROVIDER: 'llama', ANTHROPIC_API_KEY: 'k' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).code).toBe('UNKNOWN_PROVIDER');
    }
  });

  it('should name the missing key variable', () => {
    expect(() => loadConfig({ OBJECT_FORGE_PROVIDER: 'gemini-flash' })).toThrow(
      'Provider "gemini-flash" needs an API key in GEMINI_API_KEY or GOOGLE_API_KEY',
    );
  });

  it('should not accept a key of another provider family', () => {
    expect(() => loadConfig({ OBJECT_FORGE_PROVIDER: 'gpt-4o', ANTHROPIC_API_KEY: 'k' })).toThrow(ConfigError);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ ANTHROPIC_API_KEY: 'k', OBJECT_FORGE_MAX_TOKENS: '1.5' })).toThrow(
      'OBJECT_FORGE_MAX_TOKENS="1.5" must be a non-negative integer',
    );
    expect(() => loadConfig({ ANTHROPIC_API_KEY: 'k', OBJECT_FORGE_TEMPERATURE: 'hot' })).toThrow(
      'OBJECT_FORGE_TEMPERATURE="hot" must be a non-negative number',
    );
  });
});

import { describe, expect, it } from 'vitest';
import { buildConfig } from '../../server/config/config';
import { ConfigSchema, getPublicConfig, isAdvancedConfigured } from '../config';

describe('isAdvancedConfigured', () => {
  it('needs both the switch and an API key', () => {
    expect(isAdvancedConfigured(buildConfig({}))).toBe(false);
    expect(isAdvancedConfigured(buildConfig({ GEMINI_API_KEY: 'test-secret' }))).toBe(true);
    expect(isAdvancedConfigured(buildConfig({ GEMINI_API_KEY: 'test-secret', ADVANCED_CATEGORIZER_ENABLED: 'off' }))).toBe(
      false,
    );
  });
});

describe('getPublicConfig', () => {
  it('exposes no secrets', () => {
    const config = buildConfig({ GEMINI_API_KEY: 'test-secret', DATABASE_URL: 'postgres://user:test-secret@db/articles' });

    expect(getPublicConfig(config)).toEqual({
      advancedCategorizer: { enabled: true, model: 'gemini-2.5-flash' },
      persistence: 'postgres',
      extraction: { minTextLength: 100 },
    });
  });
});

describe('ConfigSchema', () => {
  it('requires a database url in postgres mode', () => {
    const config = buildConfig({});
    const result = ConfigSchema.safeParse({ ...config, persistence: { ...config.persistence, mode: 'postgres' } });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]).toMatchObject({
      path: ['persistence', 'databaseUrl'],
      message: 'DATABASE_URL is required when PERSISTENCE_MODE=postgres',
    });
  });
});

import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const dataDir = path.resolve(env.DATA_DIR || path.join(process.cwd(), 'data'));
  const databaseUrl = env.DATABASE_URL?.trim() || undefined;

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
    },
    ingestion: {
      maxConcurrency: numberFromEnv(env.INGESTION_MAX_CONCURRENCY, 4),
    },
    extraction: {
      fetchTimeoutMs: numberFromEnv(env.EXTRACTION_FETCH_TIMEOUT_MS, 30_000),
      minTextLength: numberFromEnv(env.EXTRACTION_MIN_TEXT_LENGTH, 100),
      userAgent:
        env.EXTRACTION_USER_AGENT?.trim() ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
    },
    categorization: {
      catalogPath: path.resolve(env.CATEGORY_CATALOG_PATH || path.join(dataDir, 'categories.json')),
      taxonomyPath: path.resolve(env.ADVANCED_TAXONOMY_PATH || path.join(dataDir, 'advanced-taxonomy.json')),
    },
    advanced: {
      enabled: booleanFromEnv(env.ADVANCED_CATEGORIZER_ENABLED, true),
      apiKey: env.GEMINI_API_KEY?.trim() || undefined,
      model: env.GEMINI_MODEL?.trim() || 'gemini-2.5-flash',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.2),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 1024),
      timeoutMs: numberFromEnv(env.ADVANCED_TIMEOUT_MS, 20_000),
      requestsPerMinute: Math.max(1, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10)),
      maxAttempts: Math.max(1, Math.min(5, numberFromEnv(env.ADVANCED_MAX_ATTEMPTS, 2))),
    },
    persistence: {
      mode: (env.PERSISTENCE_MODE || (databaseUrl ? 'postgres' : 'memory')).trim().toLowerCase(),
      databaseUrl,
      poolSize: numberFromEnv(env.DATABASE_POOL_SIZE, 10),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};

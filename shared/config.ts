import { z } from 'zod';

export const ConfigSchema = z
  .object({
    environment: z.enum(['development', 'test', 'production']),
    server: z.object({
      port: z.number().int().positive().max(65535),
    }),
    ingestion: z.object({
      maxConcurrency: z.number().int().positive(),
    }),
    extraction: z.object({
      fetchTimeoutMs: z.number().int().positive(),
      minTextLength: z.number().int().nonnegative(),
      userAgent: z.string().min(1),
    }),
    categorization: z.object({
      catalogPath: z.string().min(1),
      taxonomyPath: z.string().min(1),
    }),
    advanced: z.object({
      enabled: z.boolean(),
      apiKey: z.string().optional(),
      model: z.string().min(1),
      temperature: z.number().min(0).max(2),
      maxOutputTokens: z.number().int().positive(),
      timeoutMs: z.number().int().positive(),
      requestsPerMinute: z.number().int().positive(),
      maxAttempts: z.number().int().positive().max(5),
    }),
    persistence: z.object({
      mode: z.enum(['postgres', 'memory']),
      databaseUrl: z.string().optional(),
      poolSize: z.number().int().positive(),
    }),
    observability: z.object({
      logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    }),
  })
  .superRefine((value, ctx) => {
    if (value.persistence.mode === 'postgres' && !value.persistence.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['persistence', 'databaseUrl'],
        message: 'DATABASE_URL is required when PERSISTENCE_MODE=postgres',
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = AppConfig['observability']['logLevel'];

export interface PublicConfig {
  advancedCategorizer: {
    enabled: boolean;
    model: string;
  };
  persistence: AppConfig['persistence']['mode'];
  extraction: {
    minTextLength: number;
  };
}

/** True when the advanced categorizer has everything it needs to call out. */
export const isAdvancedConfigured = (config: AppConfig): boolean =>
  config.advanced.enabled && Boolean(config.advanced.apiKey);

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  advancedCategorizer: {
    enabled: isAdvancedConfigured(config),
    model: config.advanced.model,
  },
  persistence: config.persistence.mode,
  extraction: {
    minTextLength: config.extraction.minTextLength,
  },
});

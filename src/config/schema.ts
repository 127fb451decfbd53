import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(v => v === 'true' || v === '1');

export const envSchema = z
  .object({
    API_PORT: z.coerce.number().default(3000),
    API_KEY: z.string().min(1),

    SEARCH_PROVIDER: z.enum(['connect', 'gateway']).default('connect'),

    AWS_REGION: z.string().optional(),
    CONNECT_INSTANCE_ID: z.string().optional(),
    CONNECT_HYDRATE_ATTRIBUTES: booleanFlag,

    GATEWAY_URL: z.string().url().optional(),
    GATEWAY_API_KEY: z.string().optional(),

    SEARCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
    SEARCH_DEADLINE_MS: z.coerce.number().int().positive().default(30_000),
    SEARCH_MAX_PAGES: z.coerce.number().int().positive().default(50),
    SEARCH_MAX_RESULTS: z.coerce.number().int().positive().default(1000),
    SEARCH_PAGE_SIZE: z.coerce.number().int().positive().default(100),
    SEARCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    SEARCH_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(250),
    SEARCH_LOOKBACK_HOURS: z.coerce.number().positive().default(24),

    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.SEARCH_PROVIDER === 'connect' && !env.CONNECT_INSTANCE_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CONNECT_INSTANCE_ID'],
        message: 'Required when SEARCH_PROVIDER is connect',
      });
    }
    if (env.SEARCH_PROVIDER === 'gateway') {
      for (const key of ['GATEWAY_URL', 'GATEWAY_API_KEY'] as const) {
        if (!env[key]) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Required when SEARCH_PROVIDER is gateway' });
        }
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

export function toConfig(env: Env) {
  return {
    apiPort: env.API_PORT,
    apiKey: env.API_KEY,
    provider: env.SEARCH_PROVIDER,
    connect: {
      region: env.AWS_REGION,
      instanceId: env.CONNECT_INSTANCE_ID ?? '',
      hydrateAttributes: env.CONNECT_HYDRATE_ATTRIBUTES,
    },
    gateway: {
      url: env.GATEWAY_URL ?? '',
      apiKey: env.GATEWAY_API_KEY ?? '',
    },
    search: {
      concurrency: env.SEARCH_CONCURRENCY,
      deadlineMs: env.SEARCH_DEADLINE_MS,
      maxPages: env.SEARCH_MAX_PAGES,
      maxResults: env.SEARCH_MAX_RESULTS,
      pageSize: env.SEARCH_PAGE_SIZE,
      maxAttempts: env.SEARCH_MAX_ATTEMPTS,
      baseDelayMs: env.SEARCH_RETRY_BASE_MS,
      defaultLookbackMs: env.SEARCH_LOOKBACK_HOURS * 60 * 60 * 1000,
    },
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
  } as const;
}

export type AppConfig = ReturnType<typeof toConfig>;

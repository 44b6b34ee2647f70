import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.string().default('development'),
  CORS_ORIGIN: z.string().default('*'),

  SUPABASE_URL: z.string().default(''),
  SUPABASE_SERVICE_ROLE_KEY: z.string().default(''),
  SUPABASE_ANON_KEY: z.string().default(''),

  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  AI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(512),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  CHAT_CONTEXT_WINDOW: z.coerce.number().int().positive().default(20),
  CHAT_SUMMARY_THRESHOLD: z.coerce.number().int().positive().default(10),

  RATE_LIMIT_ENABLED: booleanFlag.default('true'),
  REQUEST_LOG: booleanFlag.default('true'),
});

export interface AIConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly maxRetries: number;
  readonly temperature: number;
  readonly maxOutputTokens: number;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly ai: AIConfig;
  readonly supabase: {
    readonly url: string;
    readonly serviceRoleKey: string;
    readonly anonKey: string;
  };
  readonly server: {
    readonly port: number;
    readonly nodeEnv: string;
    readonly corsOrigin: string;
  };
  readonly chat: {
    readonly contextWindow: number;
    readonly summaryThreshold: number;
  };
  readonly rateLimit: {
    readonly enabled: boolean;
  };
  readonly logging: {
    readonly requestLog: boolean;
  };
}

function freeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      freeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Builds the process configuration from environment variables.
 *
 * Values that are present but malformed (a non-numeric `PORT`, say) fail
 * fast with a `ZodError`. Missing credentials are not an error here; see
 * `missingCredentials`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const config: AppConfig = {
    ai: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      maxRetries: parsed.AI_MAX_RETRIES,
      temperature: parsed.AI_TEMPERATURE,
      maxOutputTokens: parsed.AI_MAX_OUTPUT_TOKENS,
      timeoutMs: parsed.AI_TIMEOUT_MS,
    },
    supabase: {
      url: parsed.SUPABASE_URL,
      serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY,
      anonKey: parsed.SUPABASE_ANON_KEY,
    },
    server: {
      port: parsed.PORT,
      nodeEnv: parsed.NODE_ENV,
      corsOrigin: parsed.CORS_ORIGIN,
    },
    chat: {
      contextWindow: parsed.CHAT_CONTEXT_WINDOW,
      summaryThreshold: parsed.CHAT_SUMMARY_THRESHOLD,
    },
    rateLimit: {
      enabled: parsed.RATE_LIMIT_ENABLED,
    },
    logging: {
      requestLog: parsed.REQUEST_LOG,
    },
  };

  return freeze(config);
}

export function missingCredentials(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.ai.apiKey) missing.push('OPENAI_API_KEY');
  if (!config.supabase.url) missing.push('SUPABASE_URL');
  if (!config.supabase.serviceRoleKey) missing.push('SUPABASE_SERVICE_ROLE_KEY');
  if (!config.supabase.anonKey) missing.push('SUPABASE_ANON_KEY');
  return missing;
}

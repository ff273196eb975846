import dotenv from 'dotenv';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),

  // Gemini. The key may also come from the user on each analyze request.
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-flash-latest'),

  DATABASE_PATH: z.string().min(1).default('data/orders.db'),

  // SMTP submission (STARTTLS)
  SMTP_HOST: z.string().min(1).default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().min(1).optional(),
  SMTP_PASSWORD: z.string().min(1).optional(),
  EMAIL_FROM: z.string().min(1).optional(),

  ADMIN_PASSWORD: z.string().min(1).optional(),

  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  ANALYSIS_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  ANALYSIS_MAX_WAIT_MS: z.coerce.number().int().positive().default(120_000),
  RATE_LIMIT_RETRY_MS: z.coerce.number().int().nonnegative().default(10_000),
  PAYMENT_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),

  // Prices in INR
  UNLOCK_PRICE: z.coerce.number().int().positive().default(99),
  ORDER_PRICE: z.coerce.number().int().positive().default(499),
});

export interface AppConfig {
  port: number;
  gemini: {
    apiKey?: string;
    model: string;
  };
  databasePath: string;
  smtp: {
    host: string;
    port: number;
    user?: string;
    password?: string;
    from?: string;
  };
  adminPassword?: string;
  uploadMaxBytes: number;
  analysis: {
    pollIntervalMs: number;
    maxWaitMs: number;
    rateLimitRetryMs: number;
  };
  payment: {
    delayMs: number;
  };
  sessionIdleTtlMs: number;
  pricing: {
    unlock: number;
    order: number;
  };
}

type Env = Record<string, string | undefined>;

// Empty strings in .env files mean "unset".
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return cleaned;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    console.error('Invalid environment:', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables (see logs).');
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    gemini: { apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL },
    databasePath: e.DATABASE_PATH,
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      user: e.SMTP_USER,
      password: e.SMTP_PASSWORD,
      from: e.EMAIL_FROM ?? e.SMTP_USER,
    },
    adminPassword: e.ADMIN_PASSWORD,
    uploadMaxBytes: e.UPLOAD_MAX_BYTES,
    analysis: {
      pollIntervalMs: e.ANALYSIS_POLL_INTERVAL_MS,
      maxWaitMs: e.ANALYSIS_MAX_WAIT_MS,
      rateLimitRetryMs: e.RATE_LIMIT_RETRY_MS,
    },
    payment: { delayMs: e.PAYMENT_DELAY_MS },
    sessionIdleTtlMs: e.SESSION_IDLE_TTL_MS,
    pricing: { unlock: e.UNLOCK_PRICE, order: e.ORDER_PRICE },
  };
}

export function loadEnvFile(): void {
  dotenv.config({ quiet: true });
}

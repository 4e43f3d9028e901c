import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toOptionalNumber = () =>
  z.preprocess((v) => (v === undefined || v === '' ? undefined : Number(v)), z.number()).optional();

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
  STORE_DRIVER: z.enum(['redis', 'memory']).default('redis'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL_INTENT: z.string().default('gpt-4o-mini'),
  OPENAI_MODEL_AGENT: z.string().default('gpt-4o-mini'),
  OPENAI_TEMPERATURE: toOptionalNumber(),
  OPENAI_TIMEOUT_MS: toNumber(8000),

  WHATSAPP_VERIFY_TOKEN: z.string().optional(),
  WHATSAPP_PHONE_NUMBER_ID: z.string().optional(),
  WHATSAPP_ACCESS_TOKEN: z.string().optional(),
  WHATSAPP_APP_SECRET: z.string().optional(),
  INSTAGRAM_VERIFY_TOKEN: z.string().optional(),
  INSTAGRAM_ACCESS_TOKEN: z.string().optional(),
  INSTAGRAM_APP_SECRET: z.string().optional(),
  TIKTOK_ACCESS_TOKEN: z.string().optional(),
  TIKTOK_APP_SECRET: z.string().optional(),
  TIKTOK_SEND_URL: z.string().optional(),

  TIMEZONE: z.string().default('Asia/Riyadh'),
  DEFAULT_LOCALE: z.enum(['ar', 'en']).default('ar'),

  RATE_LIMIT_PER_MINUTE: toNumber(10),
  RATE_LIMIT_WINDOW_SEC: toNumber(60),
  DEDUP_TTL_SEC: toNumber(86400),
  DEDUP_MAX_ENTRIES: toNumber(10000),

  SESSION_TIMEOUT_MINUTES: toNumber(30),
  BOOKING_MAX_FIELD_ATTEMPTS: toNumber(3),
  CONVERSATION_MEMORY_TURNS: toNumber(10),

  CLASSIFIER_MIN_CONFIDENCE: toNumber(0.6),
  FUZZY_MATCH_THRESHOLD: toNumber(0.72),

  REFERENCE_DATA_PATH: z.string().default('data/reference.json'),
  REFERENCE_REFRESH_MINUTES: toNumber(60),

  QUEUE_CONCURRENCY: toNumber(5),
  QUEUE_MAX_ATTEMPTS: toNumber(3),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();

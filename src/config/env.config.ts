import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toPositiveInt = (fallback: number) =>
  z.preprocess(
    (v) => (v === undefined || v === '' ? fallback : Number(v)),
    z.number().int().positive(),
  );

const toList = (fallback: string[]) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    return String(v)
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }, z.array(z.string()));

const toOptionalString = () =>
  z.preprocess((v) => (v === undefined || v === '' ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  RESTAURANT_NAME: z.string().default('Harbor Table'),
  PHONE_NUMBER: toOptionalString(),
  TIMEZONE: z.string().default('UTC'),

  TIME_SLOTS: toList(['17:00', '18:00', '19:00', '20:00', '21:00']),
  MAX_PER_SLOT: toPositiveInt(5),
  MAX_PARTY_SIZE: toPositiveInt(20),
  CONFIRMATION_MAX_ATTEMPTS: toPositiveInt(10),

  SESSION_TTL_MINUTES: toPositiveInt(30),
  SESSION_SWEEP_INTERVAL_SECONDS: toPositiveInt(60),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(env);
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

export const config: Readonly<AppConfig> = parseConfig(process.env);

import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  // HTTP
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
  // Comma-separated; empty allows any origin
  corsOrigins: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),

  // Storage
  databasePath: z.string().optional(), // defaults to data/fitlistic.db beside the project

  // Auth
  sessionTtlHours: z.coerce.number().int().positive().default(168),
  bcryptRounds: z.coerce.number().int().min(4).max(15).default(10),
  sessionCleanupCron: z.string().default('0 * * * *'),

  // Entries
  moodOncePerDay: booleanFlag.default('true'),

  // Anthropic (AI coach)
  anthropicApiKey: z.string().min(1).optional(),
  llmTextModel: z.string().optional(),

  // App
  timezone: z.string().default('UTC'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    corsOrigins: env('CORS_ORIGINS'),
    databasePath: env('DATABASE_PATH'),
    sessionTtlHours: env('SESSION_TTL_HOURS'),
    bcryptRounds: env('BCRYPT_ROUNDS'),
    sessionCleanupCron: env('SESSION_CLEANUP_CRON'),
    moodOncePerDay: env('MOOD_ONCE_PER_DAY'),
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmTextModel: env('LLM_TEXT_MODEL'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Configuration validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

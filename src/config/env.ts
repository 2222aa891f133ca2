import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Report grammar
  RETURN_ROW_PREFIX: z.string().min(1).default('FL'),

  // Priority scoring (score = sum of weight x metric)
  PRIORITY_WEIGHT_DAYS_SINCE_RETURN: z.coerce.number().nonnegative().default(0.4),
  PRIORITY_WEIGHT_COUNTING_DELAY: z.coerce.number().nonnegative().default(0.3),
  PRIORITY_WEIGHT_VALIDATION_DELAY: z.coerce.number().nonnegative().default(0.2),
  PRIORITY_WEIGHT_OPEN_TABLETS: z.coerce.number().nonnegative().default(0.1),
  // CSV of LABEL:minScore, ascending
  PRIORITY_LEVELS: z.string().optional().default('LOW:0,MEDIUM:10,HIGH:20,CRITICAL:35'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = parsed.data;

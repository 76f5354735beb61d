import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('debug'),
  SOURCE_LANG: z.string().default('zh-cn'),
  TARGET_LANG: z.string().default('en'),
  SEARCH_BASE_URL: z.string().url().default('https://www.google.com/search'),
  LOOKUP_DELAY_MS: z.string().default('500').transform(Number),
  // 0 keeps retrying until a fresh browser session answers
  SESSION_RETRY_LIMIT: z.string().default('0').transform(Number),
  DEEPL_AUTH_KEY: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);

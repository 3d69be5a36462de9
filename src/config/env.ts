import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  LLM_PROVIDER: z.enum(['gemini', 'openai']).default('gemini'),
  LLM_MODEL: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  MAX_COST_LIMIT: z.string().default('0.10').transform(Number).pipe(z.number().min(0)),
  STAGE_TIMEOUT_MS: z.string().default('120000').transform(Number).pipe(z.number().int().positive()),
  RETENTION_SECONDS: z.string().default('604800').transform(Number).pipe(z.number().int().positive()),
  WORKER_CONCURRENCY: z.string().default('2').transform(Number).pipe(z.number().int().min(1).max(16)),
  OUTPUT_DIR: z.string().default('./output'),
  TRANSCRIPT_LANGUAGE: z.string().default('en'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = parseEnv(process.env);

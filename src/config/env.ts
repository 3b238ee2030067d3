import { config } from 'dotenv';
import { z } from 'zod';

config();

const booleanString = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),

  PARSER_STRATEGY: z.enum(['layout', 'plain']).default('layout'),
  PARSER_DEVICE: z.enum(['auto', 'cpu', 'gpu']).default('auto'),
  PARSER_THREADS: z.string().default('8').transform(Number),

  CHUNK_TOKEN_BUDGET: z.string().default('1536').transform(Number),
  CHUNK_SIMILARITY_THRESHOLD: z.string().default('0.75').transform(Number),
  CHUNK_DOUBLE_PASS_MERGE: booleanString('true'),
  CHARS_PER_TOKEN: z.string().default('4').transform(Number),

  EMBEDDING_PROVIDER: z.enum(['openai']).default('openai'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.string().default('1536').transform(Number),
  RERANKER_URL: z.string().url().optional(),
  RERANKER_MODEL: z.string().default('BAAI/bge-reranker-v2-m3'),
  JUDGMENT_MODEL: z.string().default('gemini-2.5-flash'),
  STANCE_WEIGHTING: z.enum(['mean', 'token_weighted']).default('mean'),

  VECTOR_STORE: z.enum(['memory', 'postgres']).default('memory'),
  COLLECTION_NAME: z.string().min(1).default('policy_documents'),
  OVERFETCH_FACTOR: z.string().default('3').transform(Number),
  TOP_K_DEFAULT: z.string().default('5').transform(Number),

  MODEL_TIMEOUT_MS: z.string().default('30000').transform(Number),
  MODEL_MAX_ATTEMPTS: z.string().default('3').transform(Number),
  MODEL_RETRY_BASE_MS: z.string().default('1000').transform(Number),
  MODEL_CONCURRENCY: z.string().default('4').transform(Number),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('stance'),
  DB_PASSWORD: z.string().default('stance_dev_pass'),
  DB_NAME: z.string().default('stance_search'),
  DB_POOL_MAX: z.string().transform(Number).optional(),

  REDIS_URL: z.string().optional(),
  EMBEDDING_CACHE_TTL: z.string().default('604800').transform(Number),
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),

  DOCUMENTS_DIR: z.string().default('./data/documents'),
  FILE_SERVER_URL: z.string().optional(),
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

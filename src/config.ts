/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Configuration schema with validation and defaults.
 */
export const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),

  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2', 'mssql']).default('sqlite3'),
  DATABASE_PATH: z.string().optional(),
  DATABASE_URL: z.string().optional(),

  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),

  // Pipeline limits
  MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(500),
  DEFAULT_LIMIT: z.coerce.number().int().positive().default(100),
  MAX_LIMIT: z.coerce.number().int().positive().default(1000),
  MAX_CORRECTIONS: z.coerce.number().int().min(0).default(2),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCHEMA_MAX_TABLES: z.coerce.number().int().positive().default(8),
  SCHEMA_INCLUDE_TYPES: booleanFlag,

  // Cache Configuration
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  SIMILARITY_STRATEGY: z.enum(['token', 'embedding']).default('token'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  SEMANTIC_MAX_CANDIDATES: z.coerce.number().int().positive().default(200),
  CACHE_TTL_SEMANTIC: z.coerce.number().int().positive().default(1800),
  CACHE_TTL_PLAN: z.coerce.number().int().positive().default(86400),
  CACHE_TTL_GENERIC: z.coerce.number().int().positive().default(3600),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),

  // Optional Redis-backed cache store
  REDIS_URL: z
    .string()
    .url()
    .optional()
    .describe('Connection string for the shared cache store (e.g. redis://localhost:6379)'),
  REDIS_KEY_PREFIX: z.string().default('querywright:'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    console.error('Configuration validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  return result.data;
}

const CLIENT_ALIASES: Record<string, string> = {
  postgres: 'pg',
  postgresql: 'pg',
  mysql: 'mysql2',
  sqlite: 'better-sqlite3',
  sqlite3: 'better-sqlite3',
  sqlserver: 'mssql',
};

/**
 * Normalize a Knex client name, accepting the common aliases.
 */
export function normalizeClient(client: string): { client: string; aliased: boolean } {
  const lower = client.toLowerCase();
  const mapped = CLIENT_ALIASES[lower];
  return mapped ? { client: mapped, aliased: true } : { client: lower, aliased: false };
}

/**
 * Build a Knex config for the configured database type.
 */
export function buildKnexConfig(cfg: Config): Knex.Config {
  switch (cfg.DATABASE_TYPE) {
    case 'sqlite3':
      if (!cfg.DATABASE_PATH) {
        throw new ConfigError('DATABASE_PATH is required when DATABASE_TYPE is sqlite3', [
          'Set DATABASE_PATH=./data.db in .env',
        ]);
      }
      return {
        client: 'better-sqlite3',
        connection: { filename: cfg.DATABASE_PATH },
        useNullAsDefault: true,
      };

    case 'pg':
    case 'mysql2':
    case 'mssql':
      if (!cfg.DATABASE_URL) {
        throw new ConfigError(`DATABASE_URL is required when DATABASE_TYPE is ${cfg.DATABASE_TYPE}`, [
          `Set DATABASE_URL to a ${cfg.DATABASE_TYPE} connection string in .env`,
        ]);
      }
      return {
        client: cfg.DATABASE_TYPE,
        connection: cfg.DATABASE_URL,
        pool: { min: 2, max: 10 },
      };
  }
}

export interface GeneratorSettings {
  provider: 'anthropic' | 'openai';
  model: string;
  apiKey: string;
  maxTokens: number;
  maxRetries: number;
}

/**
 * Resolve generator settings, requiring the API key of the chosen provider.
 */
export function resolveGeneratorSettings(cfg: Config): GeneratorSettings {
  const apiKey = cfg.LLM_PROVIDER === 'anthropic' ? cfg.ANTHROPIC_API_KEY : cfg.OPENAI_API_KEY;
  if (!apiKey) {
    const variable = cfg.LLM_PROVIDER === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
    throw new ConfigError(`${variable} is required when LLM_PROVIDER is ${cfg.LLM_PROVIDER}`, [
      `Set ${variable} in .env`,
      'Or switch LLM_PROVIDER to a provider you have a key for',
    ]);
  }
  return {
    provider: cfg.LLM_PROVIDER,
    model: cfg.LLM_MODEL,
    apiKey,
    maxTokens: cfg.LLM_MAX_TOKENS,
    maxRetries: cfg.LLM_MAX_RETRIES,
  };
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();

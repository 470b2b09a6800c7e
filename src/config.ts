// ============================================================================
// FILE: src/config.ts
// PURPOSE: Environment-driven configuration, validated once at startup
// ============================================================================

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonEmpty = z
  .string()
  .trim()
  .transform(v => (v === '' ? undefined : v))
  .optional();

const EnvSchema = z.object({
  SARA_PROVIDER: z.enum(['openai', 'azure']).default('openai'),
  OPENAI_API_KEY: nonEmpty,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  CHAT_MODEL: z.string().min(1).default('gpt-4o'),
  AZURE_API_KEY: nonEmpty,
  AZURE_API_ENDPOINT: nonEmpty,
  AZURE_API_VERSION: z.string().min(1).default('2024-12-01-preview'),
  AZURE_EMBEDDING_DEPLOYMENT: nonEmpty,
  AZURE_CHAT_DEPLOYMENT: nonEmpty,
  DATA_PATH: z.string().min(1).default('data/researchers/researchers.json'),
  INDEX_PATH: z.string().min(1).default('index/researchers.index'),
  TOP_K: positiveInt(3),
  MAX_CONTEXT_CHARS: positiveInt(8000),
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  CURRENCY: z.string().min(1).default('PLN'),
  PORT: positiveInt(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type ProviderKind = 'openai' | 'azure';

/**
 * HttpPolicy - Timeout and retry settings shared by every provider request
 */
export interface HttpPolicy {
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
}

export interface OpenAISettings {
  apiKey: string | undefined;
  baseUrl: string;
}

export interface AzureSettings {
  apiKey: string | undefined;
  endpoint: string | undefined;
  apiVersion: string;
  embeddingDeployment: string;
  chatDeployment: string;
}

/**
 * SaraConfig - Fully resolved configuration
 */
export interface SaraConfig {
  provider: ProviderKind;
  embeddingModel: string;
  chatModel: string;
  openai: OpenAISettings;
  azure: AzureSettings;
  http: HttpPolicy;
  dataPath: string;
  indexPath: string;
  topK: number;
  maxContextChars: number;
  currency: string;
  port: number;
  logLevel: LogLevel;
}

/**
 * loadConfig - Parse configuration from an environment map
 *
 * Credentials are optional here; the provider factories require them only
 * when a provider is actually created, so `stats` works without an API key.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SaraConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, {
      variables: parsed.error.issues.map(i => i.path.join('.')).join(','),
    });
  }

  const e = parsed.data;
  return {
    provider: e.SARA_PROVIDER,
    embeddingModel: e.EMBEDDING_MODEL,
    chatModel: e.CHAT_MODEL,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, ''),
    },
    azure: {
      apiKey: e.AZURE_API_KEY,
      endpoint: e.AZURE_API_ENDPOINT?.replace(/\/+$/, ''),
      apiVersion: e.AZURE_API_VERSION,
      embeddingDeployment: e.AZURE_EMBEDDING_DEPLOYMENT ?? e.EMBEDDING_MODEL,
      chatDeployment: e.AZURE_CHAT_DEPLOYMENT ?? e.CHAT_MODEL,
    },
    http: {
      timeoutMs: e.REQUEST_TIMEOUT_MS,
      maxRetries: e.MAX_RETRIES,
      backoffMs: e.RETRY_BACKOFF_MS,
    },
    dataPath: e.DATA_PATH,
    indexPath: e.INDEX_PATH,
    topK: e.TOP_K,
    maxContextChars: e.MAX_CONTEXT_CHARS,
    currency: e.CURRENCY,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}

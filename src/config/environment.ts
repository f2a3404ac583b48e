/**
 * Environment configuration for the feed analyzer
 * Loads and validates environment variables into one explicit config object.
 * Nothing below the CLI reads process.env; the object is passed in.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { getProviderPreset, isProviderId, PROVIDER_IDS } from './providers';
import type { ProviderFamily, ProviderId } from './providers';
import type { LogLevel } from '../utils/logger';

export interface LlmConfig {
  provider: ProviderId;
  providerName: string;
  family: ProviderFamily;
  baseUrl: string;
  apiKey: string | null;
  model: string;
  timeoutSeconds: number;
  maxTokens: number;
  temperature: number;
  maxAttempts: number;
}

export interface EnvironmentConfig {
  paths: {
    home: string;
    feedsFile: string;
    personasDir: string;
    presetsDir: string;
    cacheDir: string;
    reportsDir: string;
  };
  // null when no provider is configured; analysis refuses to run without one
  llm: LlmConfig | null;
  feeds: {
    timeoutSeconds: number;
    cacheMaxAgeHours: number;
  };
  persona: string;
  logging: {
    level: LogLevel;
  };
}

// .env files commonly carry `KEY=` for unset values
const blank = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalString = z.preprocess(blank, z.string().optional());

const envSchema = z.object({
  FEEDSYNTH_HOME: optionalString,
  LOG_LEVEL: z.preprocess(blank, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  LLM_PROVIDER: optionalString,
  LLM_MODEL: optionalString,
  LLM_API_KEY: optionalString,
  LLM_BASE_URL: optionalString,
  LLM_TIMEOUT_SECONDS: z.preprocess(blank, z.coerce.number().positive().default(120)),
  LLM_MAX_TOKENS: z.preprocess(blank, z.coerce.number().int().positive().default(4096)),
  LLM_TEMPERATURE: z.preprocess(blank, z.coerce.number().min(0).max(2).default(0.7)),
  LLM_MAX_ATTEMPTS: z.preprocess(blank, z.coerce.number().int().min(1).default(2)),
  PERSONA: z.preprocess(blank, z.string().default('general')),
  FEED_TIMEOUT_SECONDS: z.preprocess(blank, z.coerce.number().positive().default(30)),
  CACHE_MAX_AGE_HOURS: z.preprocess(blank, z.coerce.number().nonnegative().default(1))
});

type EnvValues = z.infer<typeof envSchema>;

function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/')) return path.join(os.homedir(), dir.slice(2));
  return path.resolve(dir);
}

function resolveLlmConfig(values: EnvValues): LlmConfig | null {
  if (!values.LLM_PROVIDER) return null;

  const provider = values.LLM_PROVIDER.toLowerCase();
  if (!isProviderId(provider)) {
    throw new Error(`Unknown LLM_PROVIDER "${values.LLM_PROVIDER}". Expected one of: ${PROVIDER_IDS.join(', ')}`);
  }

  const preset = getProviderPreset(provider);
  const baseUrl = values.LLM_BASE_URL ?? preset.baseUrl;
  const model = values.LLM_MODEL ?? preset.defaultModel;
  const apiKey = values.LLM_API_KEY ?? preset.placeholderKey ?? null;

  const missing: string[] = [];
  if (!baseUrl) missing.push('LLM_BASE_URL');
  if (!model) missing.push('LLM_MODEL');
  if (preset.requiresApiKey && !apiKey) missing.push('LLM_API_KEY');

  if (!baseUrl || !model || missing.length > 0) {
    throw new Error(`Missing required environment variables for ${preset.name}: ${missing.join(', ')}`);
  }

  return {
    provider,
    providerName: preset.name,
    family: preset.family,
    baseUrl,
    apiKey,
    model,
    timeoutSeconds: values.LLM_TIMEOUT_SECONDS,
    maxTokens: values.LLM_MAX_TOKENS,
    temperature: values.LLM_TEMPERATURE,
    maxAttempts: values.LLM_MAX_ATTEMPTS
  };
}

/**
 * Load and validate environment configuration
 * @throws ZodError on malformed values, Error on an unknown or incomplete provider
 */
export function loadEnvironmentConfig(
  env: Record<string, string | undefined> = process.env
): EnvironmentConfig {
  const values = envSchema.parse(env);
  const home = expandHome(values.FEEDSYNTH_HOME ?? '~/.feedsynth');

  return {
    paths: {
      home,
      feedsFile: path.join(home, 'feeds.json'),
      personasDir: path.join(home, 'personas'),
      presetsDir: path.join(home, 'presets'),
      cacheDir: path.join(home, 'feed_cache'),
      reportsDir: path.join(home, 'reports')
    },
    llm: resolveLlmConfig(values),
    feeds: {
      timeoutSeconds: values.FEED_TIMEOUT_SECONDS,
      cacheMaxAgeHours: values.CACHE_MAX_AGE_HOURS
    },
    persona: values.PERSONA,
    logging: {
      level: values.LOG_LEVEL
    }
  };
}

/**
 * Known language-model backends.
 * Each preset belongs to one backend family; the family picks the gateway
 * implementation once, at configuration time.
 */

export type ProviderFamily = 'openai-compatible' | 'anthropic';

export interface ProviderPreset {
  name: string;
  family: ProviderFamily;
  baseUrl: string | null;
  defaultModel: string | null;
  requiresApiKey: boolean;
  // Local servers accept any non-empty key
  placeholderKey?: string;
}

export const PROVIDER_PRESETS = {
  ollama: {
    name: 'Ollama',
    family: 'openai-compatible',
    baseUrl: 'http://localhost:11434/v1',
    defaultModel: 'llama3.2',
    requiresApiKey: false,
    placeholderKey: 'ollama'
  },
  lmstudio: {
    name: 'LM Studio',
    family: 'openai-compatible',
    baseUrl: 'http://localhost:1234/v1',
    defaultModel: 'local-model',
    requiresApiKey: false,
    placeholderKey: 'lm-studio'
  },
  openai: {
    name: 'OpenAI',
    family: 'openai-compatible',
    baseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o',
    requiresApiKey: true
  },
  anthropic: {
    name: 'Anthropic',
    family: 'anthropic',
    baseUrl: 'https://api.anthropic.com',
    defaultModel: 'claude-3-5-sonnet-20241022',
    requiresApiKey: true
  },
  groq: {
    name: 'Groq',
    family: 'openai-compatible',
    baseUrl: 'https://api.groq.com/openai/v1',
    defaultModel: 'llama-3.3-70b-versatile',
    requiresApiKey: true
  },
  together: {
    name: 'Together AI',
    family: 'openai-compatible',
    baseUrl: 'https://api.together.xyz/v1',
    defaultModel: 'meta-llama/Llama-3.3-70B-Instruct-Turbo',
    requiresApiKey: true
  },
  openrouter: {
    name: 'OpenRouter',
    family: 'openai-compatible',
    baseUrl: 'https://openrouter.ai/api/v1',
    defaultModel: 'anthropic/claude-3.5-sonnet',
    requiresApiKey: true
  },
  deepseek: {
    name: 'DeepSeek',
    family: 'openai-compatible',
    baseUrl: 'https://api.deepseek.com/v1',
    defaultModel: 'deepseek-chat',
    requiresApiKey: true
  },
  custom: {
    name: 'Custom OpenAI-Compatible',
    family: 'openai-compatible',
    baseUrl: null,
    defaultModel: null,
    requiresApiKey: false
  }
} satisfies Record<string, ProviderPreset>;

export type ProviderId = keyof typeof PROVIDER_PRESETS;

export function isProviderId(value: string): value is ProviderId {
  return Object.prototype.hasOwnProperty.call(PROVIDER_PRESETS, value);
}

export const PROVIDER_IDS: ProviderId[] = Object.keys(PROVIDER_PRESETS).filter(isProviderId);

export function getProviderPreset(id: ProviderId): ProviderPreset {
  return PROVIDER_PRESETS[id];
}

import type { LlmConfig } from '../config/environment';
import { AnthropicGateway } from './anthropicGateway';
import type { LanguageModelGateway } from './gateway';
import { OpenAIGateway } from './openaiGateway';

/**
 * Pick the gateway implementation for the configured backend family.
 * Called once at startup; the pipeline only ever sees the interface.
 */
export function createGateway(config: LlmConfig | null): LanguageModelGateway | null {
  if (!config) return null;

  switch (config.family) {
    case 'anthropic':
      return new AnthropicGateway(config);
    case 'openai-compatible':
      return new OpenAIGateway(config);
  }
}

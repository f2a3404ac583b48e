import Anthropic, { APIConnectionError, APIConnectionTimeoutError, APIError } from '@anthropic-ai/sdk';
import type { ChatMessage, CompletionOptions, CompletionResult, LanguageModelGateway } from './gateway';
import { classifyErrorMessage, classifyStatus, errorMessage } from './gateway';

export interface AnthropicGatewayConfig {
  providerName: string;
  baseUrl: string;
  apiKey: string | null;
  model: string;
  timeoutSeconds: number;
  maxTokens: number;
  temperature: number;
}

export class AnthropicGateway implements LanguageModelGateway {
  readonly providerName: string;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(private readonly config: AnthropicGatewayConfig, client?: Anthropic) {
    this.providerName = config.providerName;
    this.model = config.model;
    this.client =
      client ??
      new Anthropic({
        apiKey: config.apiKey ?? undefined,
        baseURL: config.baseUrl,
        timeout: config.timeoutSeconds * 1000,
        maxRetries: 0
      });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
    const timeoutSeconds = options.timeoutSeconds ?? this.config.timeoutSeconds;

    // The Messages API takes the system prompt separately
    const system = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const conversation: Anthropic.MessageParam[] = messages
      .filter((message) => message.role !== 'system')
      .map((message): Anthropic.MessageParam => ({
        role: message.role === 'assistant' ? 'assistant' : 'user',
        content: message.content
      }));

    try {
      const response = await this.client.messages.create(
        {
          model: options.model ?? this.model,
          max_tokens: options.maxTokens ?? this.config.maxTokens,
          temperature: options.temperature ?? this.config.temperature,
          system: system || undefined,
          messages: conversation
        },
        { timeout: timeoutSeconds * 1000 }
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (!text) {
        return { success: false, error: 'Model returned an empty response', kind: 'empty' };
      }
      return { success: true, text };
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        return { success: false, error: `Request timed out after ${timeoutSeconds}s`, kind: 'timeout' };
      }
      if (error instanceof APIConnectionError) {
        return { success: false, error: 'Could not connect to Anthropic API', kind: 'connection' };
      }
      if (error instanceof APIError) {
        return {
          success: false,
          error: `API error ${error.status ?? 'unknown'}: ${error.message.slice(0, 500)}`,
          kind: classifyStatus(error.status)
        };
      }
      const message = errorMessage(error);
      return { success: false, error: `Request failed: ${message}`, kind: classifyErrorMessage(message) };
    }
  }
}

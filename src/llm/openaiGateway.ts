/**
 * Gateway for OpenAI and every OpenAI-compatible endpoint
 * (Ollama, LM Studio, Groq, Together, OpenRouter, DeepSeek, custom)
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type { ChatMessage, CompletionOptions, CompletionResult, LanguageModelGateway } from './gateway';
import { classifyErrorMessage, classifyStatus, errorMessage } from './gateway';

export interface OpenAIGatewayConfig {
  providerName: string;
  baseUrl: string;
  apiKey: string | null;
  model: string;
  timeoutSeconds: number;
  maxTokens: number;
  temperature: number;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

export class OpenAIGateway implements LanguageModelGateway {
  readonly providerName: string;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(private readonly config: OpenAIGatewayConfig, client?: OpenAI) {
    this.providerName = config.providerName;
    this.model = config.model;
    this.client =
      client ??
      new OpenAI({
        // Local servers ignore the key but the SDK insists on one
        apiKey: config.apiKey ?? 'not-needed',
        baseURL: config.baseUrl,
        timeout: config.timeoutSeconds * 1000,
        // Retries are owned by callWithRetry
        maxRetries: 0,
        defaultHeaders: config.baseUrl.includes('openrouter')
          ? { 'X-Title': 'feed-synthesizer' }
          : undefined
      });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
    const timeoutSeconds = options.timeoutSeconds ?? this.config.timeoutSeconds;

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: options.model ?? this.model,
          messages: messages.map(toOpenAIMessage),
          temperature: options.temperature ?? this.config.temperature,
          max_tokens: options.maxTokens ?? this.config.maxTokens
        },
        { timeout: timeoutSeconds * 1000 }
      );

      const text = completion.choices[0]?.message?.content;
      if (!text) {
        return { success: false, error: 'Model returned an empty response', kind: 'empty' };
      }
      return { success: true, text };
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        return { success: false, error: `Request timed out after ${timeoutSeconds}s`, kind: 'timeout' };
      }
      if (error instanceof APIConnectionError) {
        return { success: false, error: `Could not connect to ${this.config.baseUrl}`, kind: 'connection' };
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

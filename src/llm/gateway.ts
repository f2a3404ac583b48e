/**
 * Language-model gateway contract.
 * Implementations never throw from complete(); failures come back as a
 * result carrying a structured error kind.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutSeconds?: number;
}

export type GatewayErrorKind =
  | 'auth'
  | 'timeout'
  | 'connection'
  | 'rate-limit'
  | 'api'
  | 'empty'
  | 'unknown';

export type CompletionResult =
  | { success: true; text: string }
  | { success: false; error: string; kind: GatewayErrorKind };

export interface LanguageModelGateway {
  readonly providerName: string;
  readonly model: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

const AUTH_PHRASES = ['api key', 'api-key', 'authentication', 'unauthorized', 'invalid x-api-key', 'permission denied'];

/**
 * Fallback classification for errors that carry no HTTP status.
 */
export function classifyErrorMessage(message: string): GatewayErrorKind {
  const lower = message.toLowerCase();
  if (AUTH_PHRASES.some((phrase) => lower.includes(phrase))) return 'auth';
  if (lower.includes('timed out') || lower.includes('timeout')) return 'timeout';
  if (lower.includes('econnrefused') || lower.includes('enotfound') || lower.includes('connect')) return 'connection';
  return 'unknown';
}

export function classifyStatus(status: number | undefined): GatewayErrorKind {
  if (status === undefined) return 'unknown';
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate-limit';
  return 'api';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Retry wrapper around a single gateway call.
 * Authentication failures abandon retrying at once; every other failure is
 * retried with backoff until the attempt bound is reached.
 */

import pRetry from 'p-retry';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import type {
  ChatMessage,
  CompletionOptions,
  CompletionResult,
  GatewayErrorKind,
  LanguageModelGateway
} from './gateway';
import { classifyErrorMessage, errorMessage } from './gateway';

export interface RetryPolicy {
  maxAttempts: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  minTimeoutMs: 1000,
  maxTimeoutMs: 5000,
  factor: 2
};

export class GatewayCallError extends Error {
  constructor(message: string, readonly kind: GatewayErrorKind) {
    super(message);
    this.name = 'GatewayCallError';
  }
}

// complete() should never throw; a gateway that does is treated as a failed attempt
async function completeSafely(
  gateway: LanguageModelGateway,
  messages: ChatMessage[],
  options: CompletionOptions
): Promise<CompletionResult> {
  try {
    return await gateway.complete(messages, options);
  } catch (error) {
    const message = errorMessage(error);
    return { success: false, error: message, kind: classifyErrorMessage(message) };
  }
}

export async function callWithRetry(
  gateway: LanguageModelGateway,
  messages: ChatMessage[],
  options: CompletionOptions = {},
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  log: Logger = rootLogger
): Promise<CompletionResult> {
  const attempt = async (): Promise<string> => {
    const result = await completeSafely(gateway, messages, options);
    if (result.success) return result.text;

    const failure = new GatewayCallError(result.error, result.kind);
    if (result.kind === 'auth') {
      throw new pRetry.AbortError(failure);
    }
    throw failure;
  };

  try {
    const text = await pRetry(attempt, {
      retries: Math.max(0, policy.maxAttempts - 1),
      factor: policy.factor,
      minTimeout: policy.minTimeoutMs,
      maxTimeout: policy.maxTimeoutMs,
      onFailedAttempt: (error) => {
        log.warn(`LLM call failed (attempt ${error.attemptNumber}/${policy.maxAttempts}): ${error.message}`);
      }
    });
    return { success: true, text };
  } catch (error) {
    const message = errorMessage(error);

    if (error instanceof GatewayCallError && error.kind === 'auth') {
      log.warn(`LLM call rejected, not retrying: ${message}`);
      return { success: false, error: `Authentication failed: ${message}`, kind: 'auth' };
    }

    return {
      success: false,
      error: `LLM call failed after ${policy.maxAttempts} attempts. Last error: ${message}`,
      kind: error instanceof GatewayCallError ? error.kind : 'unknown'
    };
  }
}

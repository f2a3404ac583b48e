/**
 * Synthesizer - folds every successful agent output into one report body.
 * Falls back to the raw, role-labelled outputs when the call fails; never throws.
 */

import { callWithRetry, DEFAULT_RETRY_POLICY } from '../llm/callWithRetry';
import type { RetryPolicy } from '../llm/callWithRetry';
import { errorMessage } from '../llm/gateway';
import type { LanguageModelGateway } from '../llm/gateway';
import type { AgentResult } from '../types/analysis';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { buildFallbackSynthesis, buildSynthesisMessages } from './prompts';
import type { PriorInsight } from './prompts';

export const SYNTHESIS_TEMPERATURE = 0.5;

export interface SynthesizerOptions {
  gateway: LanguageModelGateway;
  temperature?: number;
  maxTokens?: number;
  timeoutSeconds?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

export interface SynthesisOutcome {
  text: string;
  usedFallback: boolean;
  error?: string;
}

export function succeededInsights(results: readonly AgentResult[]): PriorInsight[] {
  return results.flatMap((result) => (result.success ? [{ role: result.role, output: result.output }] : []));
}

export class Synthesizer {
  private readonly log: Logger;

  constructor(private readonly options: SynthesizerOptions) {
    this.log = (options.logger ?? rootLogger).child('synthesizer');
  }

  async synthesize(query: string, results: readonly AgentResult[], personaName = 'custom'): Promise<SynthesisOutcome> {
    const insights = succeededInsights(results);

    try {
      const response = await callWithRetry(
        this.options.gateway,
        buildSynthesisMessages(query, insights, personaName),
        {
          temperature: this.options.temperature ?? SYNTHESIS_TEMPERATURE,
          maxTokens: this.options.maxTokens,
          timeoutSeconds: this.options.timeoutSeconds
        },
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        this.log
      );

      if (response.success) {
        return { text: response.text, usedFallback: false };
      }

      this.log.warn('Synthesis failed, falling back to raw agent insights', { error: response.error });
      return { text: buildFallbackSynthesis(query, insights, personaName), usedFallback: true, error: response.error };
    } catch (error) {
      this.log.error('Synthesis raised unexpectedly, falling back to raw agent insights', error);
      return {
        text: buildFallbackSynthesis(query, insights, personaName),
        usedFallback: true,
        error: errorMessage(error)
      };
    }
  }
}

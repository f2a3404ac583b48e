/**
 * AgentPipeline - runs role-specialized analysis steps strictly in order
 *
 * Each step sees the query, the optional context and the complete output of
 * every earlier step that succeeded. A failed step is recorded and skipped;
 * the run only aborts when no step succeeds at all.
 *
 * started -> (running -> succeeded | failed)* -> aborted | ready-for-synthesis
 */

import { callWithRetry, DEFAULT_RETRY_POLICY } from '../llm/callWithRetry';
import type { RetryPolicy } from '../llm/callWithRetry';
import type { LanguageModelGateway } from '../llm/gateway';
import type { AgentResult, AgentSpec, AnalysisQuery } from '../types/analysis';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { AuditTrail } from './auditTrail';
import { buildAgentMessages } from './prompts';
import type { PriorInsight } from './prompts';

export const AGENT_TEMPERATURE = 0.7;

export interface AgentPipelineOptions {
  gateway: LanguageModelGateway;
  temperature?: number;
  maxTokens?: number;
  timeoutSeconds?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  onProgress?: (message: string) => void;
}

export type PipelineState = 'started' | 'running' | 'aborted' | 'ready-for-synthesis';

export type PipelineOutcome =
  | {
      status: 'ready-for-synthesis';
      results: AgentResult[];
      succeeded: PriorInsight[];
      audit: AuditTrail;
    }
  | {
      status: 'aborted';
      results: AgentResult[];
      error: string;
      audit: AuditTrail;
    };

export const ALL_AGENTS_FAILED = 'All agents failed. Check your LLM configuration.';

export class AgentPipeline {
  private readonly log: Logger;
  private currentState: PipelineState = 'started';

  constructor(private readonly options: AgentPipelineOptions) {
    this.log = (options.logger ?? rootLogger).child('pipeline');
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(
    query: AnalysisQuery,
    agents: readonly AgentSpec[],
    audit: AuditTrail = new AuditTrail()
  ): Promise<PipelineOutcome> {
    this.currentState = 'started';
    const results: AgentResult[] = [];
    // Replaced, never mutated, so each step holds its own snapshot of the history
    let prior: readonly PriorInsight[] = [];

    for (const [index, agent] of agents.entries()) {
      const role = agent.role || `Agent${index + 1}`;
      this.currentState = 'running';
      this.options.onProgress?.(`Running ${role}... (${index + 1}/${agents.length})`);
      audit.record('AGENT_START', role);

      const response = await callWithRetry(
        this.options.gateway,
        buildAgentMessages(agent, role, query, prior),
        {
          temperature: this.options.temperature ?? AGENT_TEMPERATURE,
          maxTokens: this.options.maxTokens,
          timeoutSeconds: this.options.timeoutSeconds
        },
        this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        this.log
      );

      if (response.success) {
        results.push({ role, success: true, output: response.text });
        prior = [...prior, { role, output: response.text }];
        audit.record('AGENT_COMPLETE', `${role} (success)`);
      } else {
        results.push({ role, success: false, error: response.error });
        audit.record('AGENT_FAILED', `${role}: ${response.error}`);
        this.log.warn(`Agent ${role} failed, continuing with remaining agents`, { kind: response.kind });
      }
    }

    if (prior.length === 0) {
      this.currentState = 'aborted';
      audit.record('ERROR', ALL_AGENTS_FAILED);
      return { status: 'aborted', results, error: ALL_AGENTS_FAILED, audit };
    }

    this.currentState = 'ready-for-synthesis';
    this.log.info(`${prior.length}/${agents.length} agents succeeded`);
    return { status: 'ready-for-synthesis', results, succeeded: [...prior], audit };
  }
}

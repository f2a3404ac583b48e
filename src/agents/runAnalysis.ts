/**
 * Analysis run - the aggregate that binds one query to one persona:
 * pipeline over the persona's agents, then synthesis, all under a single
 * audit trail. Nothing outlives the returned result.
 */

import { callWithRetry, DEFAULT_RETRY_POLICY } from '../llm/callWithRetry';
import type { RetryPolicy } from '../llm/callWithRetry';
import type { LanguageModelGateway } from '../llm/gateway';
import type { AgentResult, AnalysisQuery, Persona, RunDetails } from '../types/analysis';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { AgentPipeline } from './agentPipeline';
import { AuditTrail } from './auditTrail';
import type { AuditEvent } from './auditTrail';
import { buildAgentMessages } from './prompts';
import { Synthesizer } from './synthesizer';

export const NO_GATEWAY_CONFIGURED =
  'No LLM configured. Set LLM_PROVIDER (and LLM_API_KEY where required) in your environment.';

export interface AnalysisRunOptions {
  gateway: LanguageModelGateway | null;
  persona: Persona;
  maxAgents?: number;
  maxTokens?: number;
  timeoutSeconds?: number;
  agentTemperature?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  now?: () => Date;
  onProgress?: (message: string) => void;
}

export type AnalysisRunResult =
  | {
      success: true;
      query: AnalysisQuery;
      synthesis: string;
      usedFallback: boolean;
      results: AgentResult[];
      events: readonly AuditEvent[];
      auditTrail: string;
      elapsedMs: number;
      details: RunDetails;
    }
  | {
      success: false;
      query: AnalysisQuery;
      error: string;
      results: AgentResult[];
      events: readonly AuditEvent[];
      auditTrail: string;
    };

function truncate(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export async function runAnalysis(query: AnalysisQuery, options: AnalysisRunOptions): Promise<AnalysisRunResult> {
  const now = options.now ?? (() => new Date());
  const log = (options.logger ?? rootLogger).child('analysis');
  const audit = new AuditTrail(now);
  const startedAt = now().getTime();

  const fail = (error: string, results: AgentResult[] = []): AnalysisRunResult => {
    audit.record('ERROR', error);
    log.error(error);
    return { success: false, query, error, results, events: audit.entries, auditTrail: audit.format() };
  };

  audit.record('ANALYSIS_STARTED', `Query: '${truncate(query.query, 100)}'`);

  const { gateway, persona } = options;
  if (!gateway) {
    return fail(NO_GATEWAY_CONFIGURED);
  }
  audit.record('LLM_PROVIDER', `${gateway.providerName} (${gateway.model})`);

  const agents = options.maxAgents ? persona.agents.slice(0, options.maxAgents) : persona.agents;
  if (agents.length === 0) {
    return fail(`No agents found in persona '${persona.name}'.`);
  }
  audit.record('PERSONA_LOADED', `'${persona.name}' with ${agents.length} agents`);

  const pipeline = new AgentPipeline({
    gateway,
    temperature: options.agentTemperature,
    maxTokens: options.maxTokens,
    timeoutSeconds: options.timeoutSeconds,
    retryPolicy: options.retryPolicy,
    logger: options.logger,
    onProgress: options.onProgress
  });

  const outcome = await pipeline.run(query, agents, audit);
  if (outcome.status === 'aborted') {
    log.error(outcome.error);
    return {
      success: false,
      query,
      error: outcome.error,
      results: outcome.results,
      events: audit.entries,
      auditTrail: audit.format()
    };
  }

  options.onProgress?.('Synthesizing insights...');
  audit.record('SYNTHESIS_START', `Combining ${outcome.succeeded.length} perspectives`);

  const synthesizer = new Synthesizer({
    gateway,
    maxTokens: options.maxTokens,
    timeoutSeconds: options.timeoutSeconds,
    retryPolicy: options.retryPolicy,
    logger: options.logger
  });
  const synthesis = await synthesizer.synthesize(query.query, outcome.results, persona.name);

  if (synthesis.usedFallback) {
    audit.record('SYNTHESIS_FALLBACK', 'Using raw insights');
  } else {
    audit.record('SYNTHESIS_COMPLETE');
  }

  const elapsedMs = now().getTime() - startedAt;
  audit.record('ANALYSIS_COMPLETE', `${(elapsedMs / 1000).toFixed(1)}s elapsed`);
  log.info('Analysis completed', { agents: agents.length, succeeded: outcome.succeeded.length, elapsedMs });

  return {
    success: true,
    query,
    synthesis: synthesis.text,
    usedFallback: synthesis.usedFallback,
    results: outcome.results,
    events: audit.entries,
    auditTrail: audit.format(),
    elapsedMs,
    details: {
      persona: persona.name,
      agentCount: outcome.succeeded.length,
      provider: gateway.providerName,
      model: gateway.model,
      elapsedMs,
      perspectives: outcome.succeeded
    }
  };
}

/**
 * Ask one persona agent on its own, without accumulation or synthesis.
 */
export async function runSingleAgent(
  role: string,
  query: AnalysisQuery,
  options: Pick<AnalysisRunOptions, 'gateway' | 'persona' | 'maxTokens' | 'timeoutSeconds' | 'retryPolicy' | 'logger'>
): Promise<{ success: true; output: string } | { success: false; error: string }> {
  if (!options.gateway) {
    return { success: false, error: NO_GATEWAY_CONFIGURED };
  }

  const agent = options.persona.agents.find((candidate) => candidate.role.toLowerCase() === role.toLowerCase());
  if (!agent) {
    return { success: false, error: `Agent '${role}' not found in persona '${options.persona.name}'.` };
  }

  const response = await callWithRetry(
    options.gateway,
    buildAgentMessages(agent, agent.role, query, []),
    { maxTokens: options.maxTokens, timeoutSeconds: options.timeoutSeconds },
    options.retryPolicy ?? DEFAULT_RETRY_POLICY,
    options.logger ?? rootLogger
  );

  return response.success ? { success: true, output: response.text } : { success: false, error: response.error };
}

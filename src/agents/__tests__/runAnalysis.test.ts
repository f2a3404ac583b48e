import { FAST_RETRY, makePersona, ok, roleOf, ScriptedGateway, userMessageOf } from '../../__tests__/fakes';
import type { CompletionResult } from '../../llm/gateway';
import { ALL_AGENTS_FAILED } from '../agentPipeline';
import { SYNTHESIS_FALLBACK_NOTICE } from '../prompts';
import { NO_GATEWAY_CONFIGURED, runAnalysis, runSingleAgent } from '../runAnalysis';
import { SYNTHESIS_TEMPERATURE, Synthesizer } from '../synthesizer';

const persona = makePersona(['Analyst', 'Skeptic', 'Historian']);
const clock = () => new Date('2024-03-10T12:00:00.000Z');
const query = { query: 'What is driving battery prices?' };

function gatewayWith(options: { failingRole?: string; synthesisFails?: boolean } = {}): ScriptedGateway {
  return new ScriptedGateway((messages): CompletionResult => {
    const role = roleOf(messages);
    if (role === options.failingRole) return { success: false, error: 'Service unavailable', kind: 'api' };
    if (role === 'Synthesizer') {
      return options.synthesisFails ? { success: false, error: 'Overloaded', kind: 'rate-limit' } : ok('Final synthesis');
    }
    return ok(`${role} insight`);
  });
}

describe('Synthesizer', () => {
  it('should combine only the successful outputs', async () => {
    const gateway = gatewayWith();

    const outcome = await new Synthesizer({ gateway, retryPolicy: FAST_RETRY }).synthesize(
      'Why?',
      [
        { role: 'Analyst', success: true, output: 'Analyst insight' },
        { role: 'Skeptic', success: false, error: 'Service unavailable' },
        { role: 'Historian', success: true, output: 'Historian insight' }
      ],
      'test'
    );

    expect(outcome).toEqual({ text: 'Final synthesis', usedFallback: false });
    const [call] = gateway.callsFor('Synthesizer');
    expect(call.options?.temperature).toBe(SYNTHESIS_TEMPERATURE);
    expect(userMessageOf(call)).toContain("## Agent Perspectives (2 agents from 'test' persona)");
    expect(userMessageOf(call)).toContain('### Analyst Perspective\nAnalyst insight\n\n---\n');
    expect(userMessageOf(call)).toContain('### Historian Perspective\nHistorian insight\n\n---\n');
    expect(userMessageOf(call)).not.toContain('Skeptic');
  });

  it('should fall back to the raw outputs when the call fails', async () => {
    const outcome = await new Synthesizer({ gateway: gatewayWith({ synthesisFails: true }), retryPolicy: FAST_RETRY }).synthesize(
      'Why?',
      [{ role: 'Analyst', success: true, output: 'Analyst insight' }],
      'test'
    );

    expect(outcome.usedFallback).toBe(true);
    expect(outcome.error).toBe('LLM call failed after 2 attempts. Last error: Overloaded');
    expect(outcome.text).toBe(
      '## Analysis Report\n\n' +
        '**Query:** Why?\n' +
        '**Persona:** test\n' +
        '**Agents:** 1\n\n' +
        '---\n\n' +
        '### Analyst\nAnalyst insight\n\n\n' +
        '---\n\n' +
        `${SYNTHESIS_FALLBACK_NOTICE}\n`
    );
  });

  it('should not throw when the gateway does', async () => {
    const gateway = new ScriptedGateway(() => {
      throw new Error('boom');
    });

    const outcome = await new Synthesizer({ gateway, retryPolicy: FAST_RETRY }).synthesize('Why?', []);

    expect(outcome.usedFallback).toBe(true);
    expect(outcome.text).toContain('_No agent produced output._');
  });
});

describe('runAnalysis', () => {
  it('should run every agent, synthesize and audit the whole run', async () => {
    const result = await runAnalysis(query, {
      gateway: gatewayWith({ failingRole: 'Skeptic' }),
      persona,
      retryPolicy: FAST_RETRY,
      now: clock
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.synthesis).toBe('Final synthesis');
    expect(result.usedFallback).toBe(false);
    expect(result.elapsedMs).toBe(0);
    expect(result.details).toEqual({
      persona: 'test',
      agentCount: 2,
      provider: 'Fake',
      model: 'fake-model',
      elapsedMs: 0,
      perspectives: [
        { role: 'Analyst', output: 'Analyst insight' },
        { role: 'Historian', output: 'Historian insight' }
      ]
    });
    expect(result.events.map((event) => event.type)).toEqual([
      'ANALYSIS_STARTED',
      'LLM_PROVIDER',
      'PERSONA_LOADED',
      'AGENT_START',
      'AGENT_COMPLETE',
      'AGENT_START',
      'AGENT_FAILED',
      'AGENT_START',
      'AGENT_COMPLETE',
      'SYNTHESIS_START',
      'SYNTHESIS_COMPLETE',
      'ANALYSIS_COMPLETE'
    ]);

    const lines = result.auditTrail.split('\n');
    expect(lines[0]).toBe("[2024-03-10T12:00:00.000Z] ANALYSIS_STARTED - Query: 'What is driving battery prices?'");
    expect(lines[1]).toBe('[2024-03-10T12:00:00.000Z] LLM_PROVIDER - Fake (fake-model)');
    expect(lines[2]).toBe("[2024-03-10T12:00:00.000Z] PERSONA_LOADED - 'test' with 3 agents");
    expect(lines[9]).toBe('[2024-03-10T12:00:00.000Z] SYNTHESIS_START - Combining 2 perspectives');
    expect(lines[10]).toBe('[2024-03-10T12:00:00.000Z] SYNTHESIS_COMPLETE');
    expect(lines[11]).toBe('[2024-03-10T12:00:00.000Z] ANALYSIS_COMPLETE - 0.0s elapsed');
  });

  it('should record the synthesis fallback', async () => {
    const result = await runAnalysis(query, {
      gateway: gatewayWith({ synthesisFails: true }),
      persona,
      retryPolicy: FAST_RETRY,
      now: clock
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.usedFallback).toBe(true);
    expect(result.synthesis).toContain(SYNTHESIS_FALLBACK_NOTICE);
    expect(result.events.map((event) => [event.type, event.detail])).toContainEqual(['SYNTHESIS_FALLBACK', 'Using raw insights']);
  });

  it('should fail without a gateway', async () => {
    const result = await runAnalysis(query, { gateway: null, persona, now: clock });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe(NO_GATEWAY_CONFIGURED);
    expect(result.events.map((event) => event.type)).toEqual(['ANALYSIS_STARTED', 'ERROR']);
  });

  it('should fail when every agent fails', async () => {
    const gateway = new ScriptedGateway((): CompletionResult => ({ success: false, error: 'Invalid API key', kind: 'auth' }));

    const result = await runAnalysis(query, { gateway, persona, retryPolicy: FAST_RETRY, now: clock });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe(ALL_AGENTS_FAILED);
    expect(result.results).toHaveLength(3);
    expect(gateway.callsFor('Synthesizer')).toHaveLength(0);
  });

  it('should fail for a persona without agents', async () => {
    const result = await runAnalysis(query, { gateway: gatewayWith(), persona: makePersona([], 'empty'), now: clock });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe("No agents found in persona 'empty'.");
  });

  it('should limit the run to maxAgents and truncate long queries in the audit', async () => {
    const result = await runAnalysis(
      { query: 'x'.repeat(120) },
      { gateway: gatewayWith(), persona, maxAgents: 2, retryPolicy: FAST_RETRY, now: clock }
    );

    expect(result.results.map((step) => step.role)).toEqual(['Analyst', 'Skeptic']);
    expect(result.events[0].detail).toBe(`Query: '${'x'.repeat(100)}...'`);
    expect(result.events[2].detail).toBe("'test' with 2 agents");
  });
});

describe('runSingleAgent', () => {
  it('should ask one agent by role, ignoring case', async () => {
    const result = await runSingleAgent('skeptic', query, { gateway: gatewayWith(), persona, retryPolicy: FAST_RETRY });

    expect(result).toEqual({ success: true, output: 'Skeptic insight' });
  });

  it('should report an unknown role', async () => {
    const result = await runSingleAgent('Poet', query, { gateway: gatewayWith(), persona });

    expect(result).toEqual({ success: false, error: "Agent 'Poet' not found in persona 'test'." });
  });
});

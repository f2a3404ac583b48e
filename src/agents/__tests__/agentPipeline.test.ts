import { FAST_RETRY, makePersona, ok, roleOf, ScriptedGateway, userMessageOf } from '../../__tests__/fakes';
import type { CompletionResult } from '../../llm/gateway';
import { AGENT_TEMPERATURE, AgentPipeline, ALL_AGENTS_FAILED } from '../agentPipeline';

const persona = makePersona(['Analyst', 'Skeptic', 'Historian']);
const query = { query: 'What is driving battery prices?', context: '## Topic: Battery / Grid' };

// Skeptic fails on every attempt; everyone else answers
const skepticDown = (): ScriptedGateway =>
  new ScriptedGateway((messages): CompletionResult => {
    const role = roleOf(messages);
    if (role === 'Skeptic') return { success: false, error: 'Service unavailable', kind: 'api' };
    return ok(`${role} insight`);
  });

describe('AgentPipeline', () => {
  it('should skip a failing step and keep going', async () => {
    const gateway = skepticDown();
    const pipeline = new AgentPipeline({ gateway, retryPolicy: FAST_RETRY });

    const outcome = await pipeline.run(query, persona.agents);

    expect(outcome.status).toBe('ready-for-synthesis');
    expect(pipeline.state).toBe('ready-for-synthesis');
    expect(outcome.results).toEqual([
      { role: 'Analyst', success: true, output: 'Analyst insight' },
      {
        role: 'Skeptic',
        success: false,
        error: 'LLM call failed after 2 attempts. Last error: Service unavailable'
      },
      { role: 'Historian', success: true, output: 'Historian insight' }
    ]);
    if (outcome.status !== 'ready-for-synthesis') return;
    expect(outcome.succeeded).toEqual([
      { role: 'Analyst', output: 'Analyst insight' },
      { role: 'Historian', output: 'Historian insight' }
    ]);
    expect(gateway.callsFor('Skeptic')).toHaveLength(2);
  });

  it('should record every step in the audit trail', async () => {
    const outcome = await new AgentPipeline({ gateway: skepticDown(), retryPolicy: FAST_RETRY }).run(
      query,
      persona.agents
    );

    expect(outcome.audit.entries.map((event) => [event.type, event.detail])).toEqual([
      ['AGENT_START', 'Analyst'],
      ['AGENT_COMPLETE', 'Analyst (success)'],
      ['AGENT_START', 'Skeptic'],
      ['AGENT_FAILED', 'Skeptic: LLM call failed after 2 attempts. Last error: Service unavailable'],
      ['AGENT_START', 'Historian'],
      ['AGENT_COMPLETE', 'Historian (success)']
    ]);
  });

  it('should give each step the full output of every earlier successful step', async () => {
    const gateway = skepticDown();

    await new AgentPipeline({ gateway, retryPolicy: FAST_RETRY }).run(query, persona.agents);

    const [analyst] = gateway.callsFor('Analyst');
    const [historian] = gateway.callsFor('Historian');
    expect(userMessageOf(analyst)).not.toContain('## Previous Agent Insights');
    expect(userMessageOf(analyst)).toContain('## Additional Context\n## Topic: Battery / Grid\n');
    expect(userMessageOf(historian)).toContain('## Previous Agent Insights\n### Analyst\nAnalyst insight\n');
    expect(userMessageOf(historian)).not.toContain('### Skeptic');
    expect(historian.options).toEqual({ temperature: AGENT_TEMPERATURE, maxTokens: undefined, timeoutSeconds: undefined });
  });

  it('should run steps strictly in persona order', async () => {
    const gateway = skepticDown();

    await new AgentPipeline({ gateway, retryPolicy: FAST_RETRY }).run(query, persona.agents);

    expect(gateway.calls.map((call) => roleOf(call.messages))).toEqual(['Analyst', 'Skeptic', 'Skeptic', 'Historian']);
  });

  it('should abort when no step succeeds', async () => {
    const gateway = new ScriptedGateway((): CompletionResult => ({ success: false, error: 'Invalid API key', kind: 'auth' }));
    const pipeline = new AgentPipeline({ gateway, retryPolicy: FAST_RETRY });

    const outcome = await pipeline.run(query, persona.agents);

    expect(outcome.status).toBe('aborted');
    expect(pipeline.state).toBe('aborted');
    if (outcome.status !== 'aborted') return;
    expect(outcome.error).toBe(ALL_AGENTS_FAILED);
    expect(outcome.audit.has('ERROR', ALL_AGENTS_FAILED)).toBe(true);
    // Authentication failures are not retried
    expect(gateway.calls).toHaveLength(3);
  });

  it('should report progress per step', async () => {
    const progress: string[] = [];

    await new AgentPipeline({
      gateway: new ScriptedGateway(() => ok('fine')),
      retryPolicy: FAST_RETRY,
      onProgress: (message) => progress.push(message)
    }).run(query, persona.agents.slice(0, 2));

    expect(progress).toEqual(['Running Analyst... (1/2)', 'Running Skeptic... (2/2)']);
  });
});

/**
 * Prompt construction for agent steps and the synthesis step
 */

import type { ChatMessage } from '../llm/gateway';
import type { AgentInsight, AgentSpec, AnalysisQuery } from '../types/analysis';

export type PriorInsight = AgentInsight;

export function buildAgentSystemPrompt(agent: AgentSpec, role: string): string {
  return `You are the ${role} agent in a multi-agent news analysis system.

Your Perspective: ${agent.perspective}

Your Role: ${agent.prompt}

Guidelines:
- Provide analysis from your unique perspective
- Be concise but insightful (2-4 paragraphs)
- Focus on aspects others might miss
- Build upon previous insights when relevant
- End with a clear, actionable insight or observation
`;
}

/**
 * Every prior successful step, in execution order, never a summary of them.
 */
export function formatPriorInsights(prior: readonly PriorInsight[]): string {
  return prior.map((insight) => `### ${insight.role}\n${insight.output}\n`).join('\n');
}

export function buildAgentUserMessage(role: string, query: AnalysisQuery, prior: readonly PriorInsight[]): string {
  let message = `## Query to Analyze\n${query.query}\n\n`;

  if (query.context) {
    message += `## Additional Context\n${query.context}\n\n`;
  }

  if (prior.length > 0) {
    message += `## Previous Agent Insights\n${formatPriorInsights(prior)}\n`;
  }

  message += `Please provide your analysis as the ${role}. Focus on your unique perspective and add value beyond what has already been said.`;
  return message;
}

export function buildAgentMessages(
  agent: AgentSpec,
  role: string,
  query: AnalysisQuery,
  prior: readonly PriorInsight[]
): ChatMessage[] {
  return [
    { role: 'system', content: buildAgentSystemPrompt(agent, role) },
    { role: 'user', content: buildAgentUserMessage(role, query, prior) }
  ];
}

export const SYNTHESIS_SYSTEM_PROMPT = `You are the Master Synthesizer in a multi-agent news analysis system.

Your role is to:
1. Synthesize insights from multiple agent perspectives into a coherent analysis
2. Identify key themes, agreements, and productive tensions
3. Extract actionable recommendations
4. Present a clear, well-structured final report

Format your response as a professional analysis report with:
- Executive Summary (2-3 sentences)
- Key Insights (numbered list of the most important findings, most important first)
- Synthesis (how the perspectives connect and inform each other)
- Recommendations (concrete next steps or actions)
- Areas for Further Investigation (optional)
`;

export function buildSynthesisMessages(query: string, insights: readonly PriorInsight[], personaName: string): ChatMessage[] {
  const perspectives = insights.map((insight) => `### ${insight.role} Perspective\n${insight.output}\n\n---\n`).join('\n');

  const user = `## Original Query
${query}

## Agent Perspectives (${insights.length} agents from '${personaName}' persona)

${perspectives}

Please synthesize these perspectives into a comprehensive analysis report. Identify the key themes, areas of agreement, productive tensions, and actionable recommendations.`;

  return [
    { role: 'system', content: SYNTHESIS_SYSTEM_PROMPT },
    { role: 'user', content: user }
  ];
}

export const SYNTHESIS_FALLBACK_NOTICE = '*Note: Automated synthesis failed. Raw agent insights shown above.*';

export function buildFallbackSynthesis(query: string, insights: readonly PriorInsight[], personaName: string): string {
  return `## Analysis Report

**Query:** ${query}
**Persona:** ${personaName}
**Agents:** ${insights.length}

---

${formatPriorInsights(insights) || '_No agent produced output._'}

---

${SYNTHESIS_FALLBACK_NOTICE}
`;
}

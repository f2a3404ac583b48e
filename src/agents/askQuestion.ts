/**
 * Ask the persona a question directly, with no feeds behind it.
 */

import { buildQuestionReport } from '../report/reportBuilder';
import type { RunDetails } from '../types/analysis';
import type { AnalysisRunOptions } from './runAnalysis';
import { runAnalysis } from './runAnalysis';

export type QuestionResult =
  | { success: true; report: string; synthesis: string; details: RunDetails }
  | { success: false; error: string; auditTrail: string };

export async function askQuestion(question: string, options: AnalysisRunOptions): Promise<QuestionResult> {
  const query = question.trim();
  if (!query) {
    return { success: false, error: 'A question is required.', auditTrail: '' };
  }

  const now = options.now ?? (() => new Date());
  const run = await runAnalysis({ query }, options);
  if (!run.success) {
    return { success: false, error: run.error, auditTrail: run.auditTrail };
  }

  return {
    success: true,
    report: buildQuestionReport({
      query,
      synthesis: run.synthesis,
      auditTrail: run.auditTrail,
      details: run.details,
      generatedAt: now()
    }),
    synthesis: run.synthesis,
    details: run.details
  };
}

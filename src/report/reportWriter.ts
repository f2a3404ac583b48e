import path from 'path';
import { promises as fs } from 'fs';
import { fileStamp } from '../utils/dates';
import { logger } from '../utils/logger';

export type ReportKind = 'feed_report' | 'report';

export function reportFileName(date: Date, kind: ReportKind = 'feed_report'): string {
  return `${kind}_${fileStamp(date)}.md`;
}

/**
 * Write a rendered report under reportsDir and return its path.
 * Feed analyses are feed_report_*.md, plain questions report_*.md.
 */
export async function writeReport(
  reportsDir: string,
  report: string,
  date: Date = new Date(),
  kind: ReportKind = 'feed_report'
): Promise<string> {
  await fs.mkdir(reportsDir, { recursive: true });
  const file = path.join(reportsDir, reportFileName(date, kind));
  await fs.writeFile(file, report, 'utf8');
  logger.info(`Report saved to ${file}`);
  return file;
}

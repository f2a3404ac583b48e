/**
 * Validation of the per-run options the CLI accepts as text
 */

import { z } from 'zod';
import { parseSince } from '../utils/dates';

export const SINCE_FORMATS = 'Use 24h, 7d, 2w, 1m, today, yesterday or a date.';

const maxAgeSchema = z.string().trim().min(1).pipe(z.coerce.number().finite().nonnegative());

export interface RunWindow {
  since: Date | null;
  maxAgeHours?: number;
}

export type RunWindowResult = { success: true; value: RunWindow } | { success: false; error: string };

export function sinceError(raw: string): string {
  return `Could not parse since value '${raw}'. ${SINCE_FORMATS}`;
}

export function parseRunWindow(raw: { since?: string; maxAge?: string }, now: Date = new Date()): RunWindowResult {
  let since: Date | null = null;
  if (raw.since !== undefined) {
    since = parseSince(raw.since, now);
    if (!since) return { success: false, error: sinceError(raw.since) };
  }

  if (raw.maxAge === undefined) {
    return { success: true, value: { since } };
  }

  const maxAge = maxAgeSchema.safeParse(raw.maxAge);
  if (!maxAge.success) {
    return { success: false, error: `Invalid --max-age '${raw.maxAge}'. Use a number of hours, e.g. 1 or 0.5.` };
  }
  return { success: true, value: { since, maxAgeHours: maxAge.data } };
}

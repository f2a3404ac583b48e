/**
 * Append-only, timestamped record of one analysis run.
 * Rendered verbatim into the report, so entries are never edited or removed.
 */

export type AuditEventType =
  | 'ANALYSIS_STARTED'
  | 'LLM_PROVIDER'
  | 'PERSONA_LOADED'
  | 'AGENT_START'
  | 'AGENT_COMPLETE'
  | 'AGENT_FAILED'
  | 'SYNTHESIS_START'
  | 'SYNTHESIS_COMPLETE'
  | 'SYNTHESIS_FALLBACK'
  | 'ANALYSIS_COMPLETE'
  | 'ERROR';

export interface AuditEvent {
  timestamp: string;
  type: AuditEventType;
  detail: string;
}

export class AuditTrail {
  private readonly events: AuditEvent[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(type: AuditEventType, detail = ''): AuditEvent {
    const event: AuditEvent = { timestamp: this.now().toISOString(), type, detail };
    this.events.push(event);
    return event;
  }

  get entries(): readonly AuditEvent[] {
    return [...this.events];
  }

  has(type: AuditEventType, detail?: string): boolean {
    return this.events.some((event) => event.type === type && (detail === undefined || event.detail === detail));
  }

  format(): string {
    return this.events
      .map((event) => (event.detail ? `[${event.timestamp}] ${event.type} - ${event.detail}` : `[${event.timestamp}] ${event.type}`))
      .join('\n');
  }
}

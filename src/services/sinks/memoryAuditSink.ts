import { Address, AuditAction, AuditEvent } from '../../types/index.js';
import { IAuditSink } from '../../interfaces/IAuditSink.js';

export interface AuditQuery {
  action?: AuditAction;
  account?: Address;
}

/**
 * Keeps every audit event in memory for the audit-log endpoint
 */
export class MemoryAuditSink implements IAuditSink {
  readonly name = 'memory';
  private events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push(event);
  }

  getEvents(query: AuditQuery = {}): AuditEvent[] {
    return this.events.filter(event =>
      (query.action === undefined || event.action === query.action) &&
      (query.account === undefined || event.account === query.account)
    );
  }

  get size(): number {
    return this.events.length;
  }
}

import { AuditEvent, AuditRecord, SerializedAuditEvent } from '../types/index.js';
import { IAuditSink } from '../interfaces/IAuditSink.js';

/**
 * Append-only audit trail. Stamps committed records with a sequence number
 * and fans them out to every registered sink.
 */
export class AuditTrail {
  private sinks: IAuditSink[] = [];
  private nextSequence = 1;

  constructor(sinks: IAuditSink[] = []) {
    sinks.forEach(sink => this.addSink(sink));
  }

  addSink(sink: IAuditSink): void {
    this.sinks.push(sink);
    console.log(`📒 Audit sink registered: ${sink.name}`);
  }

  removeSink(name: string): void {
    this.sinks = this.sinks.filter(sink => sink.name !== name);
  }

  getSinks(): IAuditSink[] {
    return [...this.sinks];
  }

  /**
   * Publish committed records in order; a failing sink does not stop the others
   */
  publish(records: readonly AuditRecord[]): AuditEvent[] {
    const events = records.map(record => Object.freeze({ ...record, sequence: this.nextSequence++ }));

    for (const event of events) {
      for (const sink of this.sinks) {
        try {
          sink.record(event);
        } catch (error) {
          console.error(`❌ Audit sink ${sink.name} failed on event #${event.sequence}:`, error);
        }
      }
    }

    return events;
  }
}

export function serializeAuditEvent(event: AuditEvent): SerializedAuditEvent {
  return {
    sequence: event.sequence,
    account: event.account,
    action: event.action,
    amount: event.amount.toString(),
    blockNumber: event.blockNumber.toString(),
    timestamp: event.timestamp.toString(),
  };
}

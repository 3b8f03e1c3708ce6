import { AuditEvent } from '../../types/index.js';
import { IAuditSink } from '../../interfaces/IAuditSink.js';
import { serializeAuditEvent } from '../auditTrail.js';

/**
 * Streams audit events to connected WebSocket clients through the server's broadcast function
 */
export class WebSocketAuditSink implements IAuditSink {
  readonly name = 'websocket';

  constructor(private readonly broadcast: (message: object) => void) {}

  record(event: AuditEvent): void {
    this.broadcast({ type: 'audit_event', event: serializeAuditEvent(event) });
  }
}

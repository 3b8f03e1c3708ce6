import { AuditEvent } from '../types/index.js';

/**
 * Interface for audit sink implementations
 */
export interface IAuditSink {
  /**
   * Name of the sink (e.g., "memory", "console", "websocket")
   */
  name: string;

  /**
   * Receive one committed audit event, in publication order
   */
  record(event: AuditEvent): void;
}

import type { AuditEvent, AuditQuery } from "./AuditEvent";

/**
 * AuditSink is an append-only audit interface.
 * Implementations may persist, stream, or forward events.
 */
export interface AuditSink {
  emit(event: AuditEvent): Promise<void>;
}

/**
 * Read side of the audit trail. Results are ordered oldest first.
 */
export interface AuditReader {
  list(query?: AuditQuery): Promise<AuditEvent[]>;
}

export type AuditLog = AuditSink & AuditReader;

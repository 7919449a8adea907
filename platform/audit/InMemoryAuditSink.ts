import type { AuditEvent, AuditQuery } from "./AuditEvent";
import type { AuditLog } from "./AuditSink";

export class InMemoryAuditSink implements AuditLog {
  public readonly events: AuditEvent[] = [];

  async emit(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }

  async list(query: AuditQuery = {}): Promise<AuditEvent[]> {
    const since = query.since?.getTime();
    const matched = this.events.filter(
      (e) =>
        (query.entityId == null || e.entityId === query.entityId) &&
        (query.eventType == null || e.eventType === query.eventType) &&
        (since == null || Date.parse(e.timestamp) >= since),
    );
    return query.limit != null ? matched.slice(0, query.limit) : matched;
  }
}

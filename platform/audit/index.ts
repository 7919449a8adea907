export type {
  AuditEvent,
  AuditEventType,
  AuditEntityType,
  AuditActorType,
  AuditQuery,
} from "./AuditEvent";
export type { AuditSink, AuditReader, AuditLog } from "./AuditSink";
export { InMemoryAuditSink } from "./InMemoryAuditSink";

import { and, asc, eq, gte } from "drizzle-orm";
import { auditEvents } from "@shared/schema";
import type { AuditEvent, AuditLog, AuditQuery } from "../../platform/audit";
import type { InventoryExecutor } from "./DrizzleInventoryStore";
import { toAuditEvent, toAuditInsert } from "./rowMapping";

export class DrizzleAuditSink implements AuditLog {
  constructor(private readonly db: InventoryExecutor) {}

  async emit(event: AuditEvent): Promise<void> {
    await this.db.insert(auditEvents).values(toAuditInsert(event));
  }

  async list(query: AuditQuery = {}): Promise<AuditEvent[]> {
    const base = this.db
      .select()
      .from(auditEvents)
      .where(
        and(
          query.entityId ? eq(auditEvents.entityId, query.entityId) : undefined,
          query.eventType ? eq(auditEvents.eventType, query.eventType) : undefined,
          query.since ? gte(auditEvents.createdAt, query.since) : undefined,
        ),
      )
      .orderBy(asc(auditEvents.createdAt), asc(auditEvents.id));
    const rows = query.limit != null ? await base.limit(query.limit) : await base;
    return rows.map(toAuditEvent);
  }
}

import type { AuditActorType } from "../../audit";

export type ActorContext = Readonly<{
  actorId: string;
  actorType: AuditActorType;
}>;

export type ServiceOptions = Readonly<{
  urnPrefix: string;
  /** Applied to created assets that name no external system. */
  defaultExternalSystem: string;
  /** Whether change reports list Unchanged items when the caller does not say. */
  includeUnchangedByDefault: boolean;
  /** Window of the `recentSnapshots` count in summary(). */
  recentSnapshotDays: number;
  now?: () => Date;
  /** Actor recorded on audit events when a call names none. */
  actor?: ActorContext;
}>;

export type IngestOptions = Readonly<{
  batchId?: string;
  actor?: ActorContext;
}>;

export type ReportOptions = Readonly<{
  includeUnchanged?: boolean;
}>;

export type ChangeReportRequest = ReportOptions &
  Readonly<{
    /** Window end; defaults to the latest snapshot's timestamp. */
    now?: Date;
  }>;

export const DEFAULT_SERVICE_OPTIONS: ServiceOptions = {
  urnPrefix: "urn:asset",
  defaultExternalSystem: "OTOBO",
  includeUnchangedByDefault: false,
  recentSnapshotDays: 7,
};

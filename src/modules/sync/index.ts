export * from "./errors";
export * from "./types";
export { SyncRegistry, parseSyncConfig } from "./registry/service";
export type { RemoveServerReport, ServerRemovedHook } from "./registry/service";
export { AuditTrail, phaseByServer, revocableServers } from "./audit/service";
export { ConfirmationWorkflow, MAX_TIMER_DELAY_MS } from "./confirmation/workflow";
export type { ConfirmationOutcome, RearmReport, SettleResult } from "./confirmation/workflow";
export { HierarchyGuard, evaluateHierarchy } from "./roles/hierarchy";
export { RoleSyncCoordinator } from "./roles/coordinator";
export type { MemberUpdateReport, TransferReport } from "./roles/coordinator";
export { PunishmentSyncCoordinator, MAX_TIMEOUT_MS } from "./punishments/coordinator";
export type {
  ApplyOutcome,
  IssueInput,
  IssueReport,
  ProposeInput,
  ProposeReport,
  PunishmentStatusView,
  RevokeReport,
} from "./punishments/coordinator";
export type { GuildEffector, GuildInspector, RoleHierarchy } from "./effector/types";
export type { NotificationSink } from "./notifications/types";
export { SyncRuntime, createSyncRuntime, createSeyfertSyncRuntime } from "./runtime";

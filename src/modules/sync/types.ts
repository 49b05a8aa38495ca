/**
 * Domain types of the sync engine.
 *
 * Persisted shapes live in `@/db/schemas/*`; the types here are what services hand
 * around (`id` instead of `_id`, derived fields filled in).
 */
import type {
  ConfirmationState,
  PunishmentSubject,
} from "@/db/schemas/confirmation";
import type {
  PunishmentKind,
  PunishmentStatus,
  ResolutionEvent,
  ResolutionEventType,
} from "@/db/schemas/punishment";
import type { RoleMapping, StoredServerEntry, SyncConfig } from "@/db/schemas/sync-config";
import type {
  ConfirmationToken,
  PunishmentId,
  RoleId,
  ServerId,
  UserId,
} from "@/db/types";

export type {
  ConfirmationState,
  PunishmentKind,
  PunishmentStatus,
  PunishmentSubject,
  ResolutionEvent,
  ResolutionEventType,
  RoleMapping,
  SyncConfig,
};

export interface ServerEntry extends StoredServerEntry {
  /** Labels whose mapping references this server. */
  roleMappingRefs: string[];
}

export interface PunishmentRecord {
  id: PunishmentId;
  kind: PunishmentKind;
  targetUserId: UserId;
  sourceServerId: ServerId;
  issuedBy: UserId;
  reason: string;
  evidenceRef: string | null;
  expiry: Date | null;
  /** Timeout length; late confirmations apply the full length. */
  durationMs: number | null;
  warnDays: number;
  status: PunishmentStatus;
  createdAt: Date;
  history: ResolutionEvent[];
}

export type TerminalConfirmationState = Exclude<ConfirmationState, "pending">;

export interface PendingConfirmation<S = PunishmentSubject> {
  token: ConfirmationToken;
  key: string;
  subject: S;
  state: ConfirmationState;
  requestedAt: Date;
  expiresAt: Date;
  respondedBy: UserId | null;
  respondedAt: Date | null;
}

/** Whoever triggers an operation: user id plus the role ids they hold where they ran it. */
export interface SyncActor {
  userId: UserId;
  roleIds: RoleId[];
}

export const SYSTEM_ACTOR_ID = "system";

export interface SyncMember {
  userId: UserId;
  /** Role ids held in the source server. */
  roleIds: RoleId[];
}

export type RoleSkipReason = "PERMISSION_DENIED" | "NOT_MEMBER" | "ROLE_MISSING";

export type RoleSyncOutcome =
  /** `changed: false` means the member was already in the wanted state; no remote call made. */
  | { status: "applied"; label: string; roleId: RoleId; changed: boolean }
  | { status: "skipped"; label: string; roleId: RoleId; reason: RoleSkipReason }
  | { status: "failed"; label: string; roleId: RoleId; reason: string };

export type RoleSyncDisabledReason = "ROLE_SYNC_DISABLED" | "SOURCE_NOT_REGISTERED";

export interface RoleSyncReport {
  /** Set when nothing was attempted. */
  disabled: RoleSyncDisabledReason | null;
  targets: Record<ServerId, RoleSyncOutcome[]>;
}

/** Per-server view derived from a record's history. */
export type PunishmentPhase =
  | "pending"
  | "confirmed"
  | "rejected"
  | "expired"
  | "canceled"
  | "applied"
  | "apply_failed"
  | "revoked"
  | "revoke_failed";

export const confirmationKey = (punishmentId: PunishmentId, serverId: ServerId): string =>
  `${punishmentId}:${serverId}`;

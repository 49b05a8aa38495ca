/**
 * AuditTrail: append-only ledger of punishment records and their resolution history.
 *
 * It is the only place that answers "is this punishment active" and "what happened on
 * server X". Each call maps to one atomic repository update, so readers only ever see
 * committed transitions.
 */
import type { PunishmentRepo } from "@/db/repositories/sync/punishments";
import type { PunishmentId, ServerId, UserId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { NotFoundError, asPersistenceError, type SyncError } from "../errors";
import type {
  PunishmentPhase,
  PunishmentRecord,
  ResolutionEvent,
  ResolutionEventType,
} from "../types";

export type NewPunishment = Omit<PunishmentRecord, "status" | "createdAt" | "history">;

export interface AuditEventInput {
  type: ResolutionEventType;
  serverId: ServerId;
  actorId: UserId;
  detail?: string | null;
}

export interface RevokeMark {
  record: PunishmentRecord;
  /** False when the record was already revoked. */
  changed: boolean;
}

const PHASE_BY_EVENT: Record<ResolutionEventType, PunishmentPhase> = {
  proposed: "pending",
  confirmed: "confirmed",
  rejected: "rejected",
  expired: "expired",
  canceled: "canceled",
  applied: "applied",
  apply_failed: "apply_failed",
  revoked: "revoked",
  revoke_failed: "revoke_failed",
};

/** Latest phase per server, in history order. */
export function phaseByServer(record: PunishmentRecord): Record<ServerId, PunishmentPhase> {
  const phases: Record<ServerId, PunishmentPhase> = {};
  for (const event of record.history) {
    phases[event.serverId] = PHASE_BY_EVENT[event.type];
  }
  return phases;
}

const REACHED_SERVER = new Set<ResolutionEventType>([
  "confirmed",
  "applied",
  "apply_failed",
]);

/**
 * Servers a revoke has to reach: any server where applying was confirmed or attempted,
 * with no `revoked` after it. A failed apply counts, since a timed-out call may still have
 * landed. A `revoke_failed` keeps the server in the set.
 */
export function revocableServers(record: PunishmentRecord): ServerId[] {
  const reached = new Set<ServerId>();
  for (const event of record.history) {
    if (REACHED_SERVER.has(event.type)) reached.add(event.serverId);
    if (event.type === "revoked") reached.delete(event.serverId);
  }
  return [...reached];
}

export class AuditTrail {
  constructor(
    private readonly repo: PunishmentRepo,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(input: NewPunishment): Promise<Result<PunishmentRecord, SyncError>> {
    const record: PunishmentRecord = {
      ...input,
      status: "active",
      createdAt: this.now(),
      history: [],
    };
    const res = await this.repo.insert(record);
    if (res.isErr()) {
      return ErrResult(asPersistenceError(res.error, `Failed to record punishment ${input.id}`));
    }
    return OkResult(res.value);
  }

  async append(
    punishmentId: PunishmentId,
    input: AuditEventInput,
  ): Promise<Result<PunishmentRecord, SyncError>> {
    const res = await this.repo.appendEvent(punishmentId, this.event(input));
    if (res.isErr()) {
      return ErrResult(
        asPersistenceError(res.error, `Failed to append ${input.type} to ${punishmentId}`),
      );
    }
    if (!res.value) return ErrResult(new NotFoundError(`Unknown punishment ${punishmentId}`));
    return OkResult(res.value);
  }

  /**
   * `active → revoked` for the whole record. Per-server `revoked` events are appended
   * separately. Repeating it is a no-op that reports `changed: false`.
   */
  async markRevoked(punishmentId: PunishmentId): Promise<Result<RevokeMark, SyncError>> {
    const res = await this.repo.markRevoked(punishmentId);
    if (res.isErr()) {
      return ErrResult(asPersistenceError(res.error, `Failed to revoke ${punishmentId}`));
    }
    if (res.value) return OkResult({ record: res.value, changed: true });

    const current = await this.get(punishmentId);
    if (current.isErr()) return ErrResult(current.error);
    if (!current.value) return ErrResult(new NotFoundError(`Unknown punishment ${punishmentId}`));
    return OkResult({ record: current.value, changed: false });
  }

  async get(punishmentId: PunishmentId): Promise<Result<PunishmentRecord | null, SyncError>> {
    const res = await this.repo.findById(punishmentId);
    if (res.isErr()) {
      return ErrResult(asPersistenceError(res.error, `Failed to read ${punishmentId}`));
    }
    return OkResult(res.value);
  }

  /** Newest first. */
  async findByTarget(userId: UserId): Promise<Result<PunishmentRecord[], SyncError>> {
    const res = await this.repo.findByTarget(userId);
    if (res.isErr()) {
      return ErrResult(asPersistenceError(res.error, `Failed to list punishments of ${userId}`));
    }
    return OkResult(res.value);
  }

  private event(input: AuditEventInput): ResolutionEvent {
    return {
      type: input.type,
      serverId: input.serverId,
      actorId: input.actorId,
      at: this.now(),
      detail: input.detail ?? null,
    };
  }
}

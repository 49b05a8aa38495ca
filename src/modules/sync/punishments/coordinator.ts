/**
 * PunishmentSyncCoordinator: propose → confirm / reject / expire → apply, and revoke.
 *
 * Per `(punishmentId, targetServerId)`:
 *   NONE → PENDING → CONFIRMED | REJECTED | EXPIRED | CANCELED
 *   CONFIRMED → APPLIED | APPLY_FAILED
 *
 * Invariants:
 * - Transitions of one key run under a per-key lock and settle the ticket with a
 *   compare-and-swap, so a confirm racing a reject or the expiry timer resolves once.
 * - Applying is never retried automatically; `APPLY_FAILED` waits for `retryApply`.
 * - Revoking needs no confirmation, only the issuer or an operator, and repeating it
 *   changes nothing.
 * - Notifications are fire-and-forget.
 */
import { generatePunishmentId } from "@/utils/punishmentId";
import type { ConfirmationStore } from "@/db/repositories/sync/confirmations";
import type { ConfirmationToken, PunishmentId, ServerId, UserId } from "@/db/types";
import { KeyedMutex } from "@/utils/keyedMutex";
import { silentLogger, type SyncLogger } from "@/utils/logger";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { phaseByServer, revocableServers, type AuditTrail } from "../audit/service";
import {
  ConfirmationWorkflow,
  type ConfirmationOutcome,
  type RearmReport,
} from "../confirmation/workflow";
import { callRemote, type RemoteCallPolicy } from "../effector/call";
import type { GuildEffector } from "../effector/types";
import {
  DuplicatePunishmentError,
  InvalidStateError,
  NotFoundError,
  PermissionDenied,
  ValidationError,
  type SyncError,
} from "../errors";
import type { AnnouncedOutcome, NotificationSink } from "../notifications/types";
import type { SyncRegistry } from "../registry/service";
import {
  SYSTEM_ACTOR_ID,
  confirmationKey,
  type PendingConfirmation,
  type PunishmentKind,
  type PunishmentPhase,
  type PunishmentRecord,
  type PunishmentSubject,
  type SyncActor,
} from "../types";

/** Longest timeout the platform accepts (28 days). */
export const MAX_TIMEOUT_MS = 28 * 24 * 60 * 60 * 1000;

export interface IssueInput {
  kind: PunishmentKind;
  targetUserId: UserId;
  sourceServerId: ServerId;
  reason: string;
  evidenceRef?: string | null;
  /** Required for `timeout`. */
  durationMs?: number | null;
  warnDays?: number;
}

export interface ProposeInput extends IssueInput {
  id: PunishmentId;
  issuedBy: UserId;
}

export type ProposeSkipReason =
  | "SOURCE_SERVER"
  | "UNKNOWN_SERVER"
  | "SERVER_SYNC_DISABLED"
  | "SOURCE_SYNC_DISABLED"
  | "GLOBAL_SYNC_DISABLED"
  | "OPEN_FAILED";

export interface ProposeReport {
  punishment: PunishmentRecord;
  opened: { serverId: ServerId; token: ConfirmationToken; expiresAt: Date }[];
  skipped: { serverId: ServerId; reason: ProposeSkipReason }[];
}

export interface ApplyOutcome {
  punishmentId: PunishmentId;
  serverId: ServerId;
  phase: "applied" | "apply_failed";
  error: string | null;
}

export interface IssueReport {
  punishment: PunishmentRecord;
  source: ApplyOutcome;
  /** `null` when the source application failed and nothing was proposed. */
  proposal: ProposeReport | null;
}

export interface RevokeReport {
  punishment: PunishmentRecord;
  /** False when the record was already revoked. */
  changed: boolean;
  servers: { serverId: ServerId; phase: "revoked" | "revoke_failed"; error: string | null }[];
  canceledConfirmations: ConfirmationToken[];
}

export interface PunishmentStatusView {
  punishment: PunishmentRecord;
  phases: Record<ServerId, PunishmentPhase>;
  openConfirmations: PendingConfirmation[];
}

export interface PunishmentSyncCoordinatorDeps {
  registry: SyncRegistry;
  audit: AuditTrail;
  store: ConfirmationStore<PunishmentSubject>;
  effector: GuildEffector;
  sink: NotificationSink;
  confirmationTimeoutMs: number;
  /** Used for revocations. Applications always run with `retries: 0`. */
  policy: RemoteCallPolicy;
  logger?: SyncLogger;
  now?: () => Date;
  generateId?: () => PunishmentId;
  generateToken?: () => ConfirmationToken;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class PunishmentSyncCoordinator {
  readonly workflow: ConfirmationWorkflow<PunishmentSubject>;
  private readonly lock = new KeyedMutex();
  private readonly logger: SyncLogger;
  private readonly now: () => Date;
  private readonly generateId: () => PunishmentId;

  constructor(private readonly deps: PunishmentSyncCoordinatorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? generatePunishmentId;
    this.workflow = new ConfirmationWorkflow(deps.store, {
      onExpire: (ticket) => this.handleExpired(ticket),
      logger: this.logger,
      now: this.now,
      generateToken: deps.generateToken,
    });
  }

  /** Records the punishment, applies it in its own server, then asks the others. */
  async issue(input: IssueInput, actor: SyncActor): Promise<Result<IssueReport, SyncError>> {
    if (!this.deps.registry.getServer(input.sourceServerId)) {
      return ErrResult(
        new ValidationError(`Unknown server ${input.sourceServerId}`, "UNKNOWN_SERVER"),
      );
    }

    const recorded = await this.record({ ...input, id: this.generateId(), issuedBy: actor.userId });
    if (recorded.isErr()) return ErrResult(recorded.error);

    const source = await this.applyOn(recorded.value, input.sourceServerId, actor.userId);
    if (source.phase === "apply_failed") {
      return OkResult({ punishment: recorded.value, source, proposal: null });
    }

    const targets = this.deps.registry.listServers().map((s) => s.serverId);
    const proposal = await this.openConfirmations(recorded.value, targets);
    return OkResult({ punishment: proposal.punishment, source, proposal });
  }

  /** Opens one confirmation per eligible target. The id must be new. */
  async propose(
    input: ProposeInput,
    targetServers: ServerId[],
  ): Promise<Result<ProposeReport, SyncError>> {
    const existing = await this.deps.audit.get(input.id);
    if (existing.isErr()) return ErrResult(existing.error);
    if (existing.value) return ErrResult(new DuplicatePunishmentError(input.id));

    const open = await this.workflow.openTickets((t) => t.subject.punishmentId === input.id);
    if (open.isErr()) return ErrResult(open.error);
    if (open.value.length) return ErrResult(new DuplicatePunishmentError(input.id));

    const recorded = await this.record(input);
    if (recorded.isErr()) return ErrResult(recorded.error);
    return OkResult(await this.openConfirmations(recorded.value, targetServers));
  }

  async confirm(
    punishmentId: PunishmentId,
    serverId: ServerId,
    actorId: UserId,
  ): Promise<Result<ApplyOutcome, SyncError>> {
    const key = confirmationKey(punishmentId, serverId);
    return this.lock.run(key, async () => {
      const settled = await this.settle(key, "confirmed", actorId);
      if (settled.isErr()) return ErrResult(settled.error);

      const appended = await this.deps.audit.append(punishmentId, {
        type: "confirmed",
        serverId,
        actorId,
      });
      if (appended.isErr()) {
        // Ticket already settled; the apply still runs.
        this.logger.error("[sync:punishments] failed to record confirmation", {
          key,
          error: appended.error,
        });
      }
      const record = appended.isOk() ? appended : await this.require(punishmentId);
      if (record.isErr()) return ErrResult(record.error);

      if (record.value.status !== "active") {
        return ErrResult(new InvalidStateError(`Punishment ${punishmentId} is revoked`, "revoked"));
      }
      return OkResult(await this.applyOn(record.value, serverId, actorId, settled.value));
    });
  }

  async reject(
    punishmentId: PunishmentId,
    serverId: ServerId,
    actorId: UserId,
  ): Promise<Result<PendingConfirmation, SyncError>> {
    const key = confirmationKey(punishmentId, serverId);
    return this.lock.run(key, async () => {
      const settled = await this.settle(key, "rejected", actorId);
      if (settled.isErr()) return ErrResult(settled.error);

      const recorded = await this.deps.audit.append(punishmentId, {
        type: "rejected",
        serverId,
        actorId,
      });
      if (recorded.isErr()) return ErrResult(recorded.error);

      this.announce(recorded.value, serverId, "rejected", actorId, settled.value);
      return OkResult(settled.value);
    });
  }

  ticket(token: ConfirmationToken): Promise<Result<PendingConfirmation | null, SyncError>> {
    return this.workflow.get(token);
  }

  /** Entry point for prompt buttons, which only carry the ticket token. */
  async respond(
    token: ConfirmationToken,
    outcome: ConfirmationOutcome,
    actorId: UserId,
  ): Promise<Result<ApplyOutcome | PendingConfirmation, SyncError>> {
    const ticket = await this.workflow.get(token);
    if (ticket.isErr()) return ErrResult(ticket.error);
    if (!ticket.value) return ErrResult(new NotFoundError(`Unknown confirmation ${token}`));

    const { punishmentId, serverId } = ticket.value.subject;
    return outcome === "confirmed"
      ? this.confirm(punishmentId, serverId, actorId)
      : this.reject(punishmentId, serverId, actorId);
  }

  /** Manual re-trigger for a server stuck in `apply_failed`. */
  async retryApply(
    punishmentId: PunishmentId,
    serverId: ServerId,
    actor: SyncActor,
  ): Promise<Result<ApplyOutcome, SyncError>> {
    const key = confirmationKey(punishmentId, serverId);
    return this.lock.run(key, async () => {
      const record = await this.require(punishmentId);
      if (record.isErr()) return ErrResult(record.error);
      if (!this.mayManage(record.value, actor)) {
        return ErrResult(new PermissionDenied("Only the issuer or an operator can retry"));
      }
      if (record.value.status !== "active") {
        return ErrResult(new InvalidStateError(`Punishment ${punishmentId} is revoked`, "revoked"));
      }

      const phase = phaseByServer(record.value)[serverId] ?? null;
      if (phase !== "apply_failed") {
        return ErrResult(
          new InvalidStateError(`Nothing to retry on ${serverId} (phase: ${phase ?? "none"})`, phase),
        );
      }
      return OkResult(await this.applyOn(record.value, serverId, actor.userId));
    });
  }

  /**
   * Lifts the punishment wherever it was applied, or confirmed and attempted, and closes
   * its open confirmations.
   * The record only becomes `revoked` once every server succeeded; calling again retries
   * the servers that failed.
   */
  async revoke(
    punishmentId: PunishmentId,
    actor: SyncActor,
    reason?: string,
  ): Promise<Result<RevokeReport, SyncError>> {
    return this.lock.run(`revoke:${punishmentId}`, async () => {
      const current = await this.require(punishmentId);
      if (current.isErr()) return ErrResult(current.error);
      if (!this.mayManage(current.value, actor)) {
        return ErrResult(new PermissionDenied("Only the issuer or an operator can revoke"));
      }
      if (current.value.status === "revoked") {
        return OkResult({
          punishment: current.value,
          changed: false,
          servers: [],
          canceledConfirmations: [],
        });
      }

      const canceled = await this.cancelWhere(
        (t) => t.subject.punishmentId === punishmentId,
        actor.userId,
        "punishment revoked",
        proposedServers(current.value),
      );
      if (canceled.isErr()) return ErrResult(canceled.error);

      // Re-read: confirmations that finished while we waited for their locks are in now.
      const record = await this.require(punishmentId);
      if (record.isErr()) return ErrResult(record.error);

      const servers = await Promise.all(
        revocableServers(record.value).map((serverId) =>
          this.revokeOn(record.value, serverId, actor.userId, reason),
        ),
      );

      let punishment = record.value;
      let changed = false;
      if (servers.every((s) => s.phase === "revoked")) {
        const marked = await this.deps.audit.markRevoked(punishmentId);
        if (marked.isErr()) return ErrResult(marked.error);
        punishment = marked.value.record;
        changed = marked.value.changed;
      } else {
        const latest = await this.require(punishmentId);
        if (latest.isOk()) punishment = latest.value;
      }

      this.logger.info("[sync:punishments] revoke finished", {
        punishmentId,
        actorId: actor.userId,
        servers,
      });
      return OkResult({ punishment, changed, servers, canceledConfirmations: canceled.value });
    });
  }

  async status(punishmentId: PunishmentId): Promise<Result<PunishmentStatusView, SyncError>> {
    const record = await this.require(punishmentId);
    if (record.isErr()) return ErrResult(record.error);
    const open = await this.workflow.openTickets((t) => t.subject.punishmentId === punishmentId);
    if (open.isErr()) return ErrResult(open.error);
    return OkResult({
      punishment: record.value,
      phases: phaseByServer(record.value),
      openConfirmations: open.value,
    });
  }

  history(userId: UserId): Promise<Result<PunishmentRecord[], SyncError>> {
    return this.deps.audit.findByTarget(userId);
  }

  /** Cancels every open confirmation aimed at `serverId`. */
  cancelForServer(
    serverId: ServerId,
    actorId: UserId = SYSTEM_ACTOR_ID,
  ): Promise<Result<ConfirmationToken[], SyncError>> {
    return this.cancelWhere((t) => t.subject.serverId === serverId, actorId, "server removed", []);
  }

  /** Re-arms timers after a restart; overdue confirmations expire now. */
  resume(): Promise<Result<RearmReport, SyncError>> {
    return this.workflow.rearm();
  }

  dispose(): void {
    this.workflow.dispose();
  }

  private async record(input: ProposeInput): Promise<Result<PunishmentRecord, SyncError>> {
    const reason = input.reason.trim();
    if (!reason) return ErrResult(new ValidationError("A reason is required"));

    const warnDays = input.warnDays ?? 0;
    if (!Number.isInteger(warnDays) || warnDays < 0) {
      return ErrResult(new ValidationError("Warning days must be a non-negative integer"));
    }

    let durationMs: number | null = null;
    if (input.kind === "timeout") {
      durationMs = input.durationMs ?? null;
      if (durationMs === null || durationMs <= 0 || durationMs > MAX_TIMEOUT_MS) {
        return ErrResult(new ValidationError("A timeout needs a duration between 1ms and 28 days"));
      }
    }

    const now = this.now().getTime();
    let expiry: Date | null = null;
    if (durationMs !== null) expiry = new Date(now + durationMs);
    else if (input.kind === "warn" && warnDays > 0) expiry = new Date(now + warnDays * DAY_MS);

    return this.deps.audit.record({
      id: input.id,
      kind: input.kind,
      targetUserId: input.targetUserId,
      sourceServerId: input.sourceServerId,
      issuedBy: input.issuedBy,
      reason,
      evidenceRef: input.evidenceRef ?? null,
      expiry,
      durationMs,
      warnDays,
    });
  }

  private async openConfirmations(
    punishment: PunishmentRecord,
    targetServers: ServerId[],
  ): Promise<ProposeReport> {
    const { registry, audit, sink, confirmationTimeoutMs } = this.deps;
    const report: ProposeReport = { punishment, opened: [], skipped: [] };
    const targets = [...new Set(targetServers)].sort();
    const source = registry.getServer(punishment.sourceServerId);

    let blanket: ProposeSkipReason | null = null;
    if (!registry.punishmentSyncEnabled) blanket = "GLOBAL_SYNC_DISABLED";
    else if (!source?.punishmentSyncEnabled) blanket = "SOURCE_SYNC_DISABLED";

    for (const serverId of targets) {
      if (serverId === punishment.sourceServerId) {
        report.skipped.push({ serverId, reason: "SOURCE_SERVER" });
        continue;
      }
      if (blanket) {
        report.skipped.push({ serverId, reason: blanket });
        continue;
      }
      const target = registry.getServer(serverId);
      if (!target) {
        report.skipped.push({ serverId, reason: "UNKNOWN_SERVER" });
        continue;
      }
      if (!target.punishmentSyncEnabled) {
        report.skipped.push({ serverId, reason: "SERVER_SYNC_DISABLED" });
        continue;
      }

      const key = confirmationKey(punishment.id, serverId);
      // `proposed` is appended under the key lock, so an early expiry is recorded after it.
      const ticket = await this.lock.run(key, async () => {
        const created = await this.workflow.create(
          key,
          { punishmentId: punishment.id, serverId },
          confirmationTimeoutMs,
        );
        if (created.isErr()) return created;

        const proposed = await audit.append(punishment.id, {
          type: "proposed",
          serverId,
          actorId: punishment.issuedBy,
        });
        if (proposed.isErr()) {
          this.logger.error("[sync:punishments] failed to record proposal", {
            key,
            error: proposed.error,
          });
        } else {
          report.punishment = proposed.value;
        }
        return created;
      });
      if (ticket.isErr()) {
        this.logger.error("[sync:punishments] failed to open confirmation", {
          key,
          error: ticket.error,
        });
        report.skipped.push({ serverId, reason: "OPEN_FAILED" });
        continue;
      }

      report.opened.push({
        serverId,
        token: ticket.value.token,
        expiresAt: ticket.value.expiresAt,
      });
      this.notify("requestConfirmation", () =>
        sink.requestConfirmation({
          ticket: ticket.value,
          punishment: report.punishment,
          target,
          sourceName: source?.name ?? null,
        }),
      );
    }

    this.logger.info("[sync:punishments] proposal opened", {
      punishmentId: punishment.id,
      opened: report.opened.length,
      skipped: report.skipped,
    });
    return report;
  }

  /** Settles the latest ticket of `key`; a lost race becomes `InvalidStateError`. */
  private async settle(
    key: string,
    outcome: ConfirmationOutcome,
    actorId: UserId,
  ): Promise<Result<PendingConfirmation, SyncError>> {
    const latest = await this.workflow.latest(key);
    if (latest.isErr()) return ErrResult(latest.error);
    if (!latest.value) {
      return ErrResult(new InvalidStateError(`No confirmation requested for ${key}`));
    }

    const settled = await this.workflow.respond(latest.value.token, outcome, actorId);
    if (settled.isErr()) return ErrResult(settled.error);
    if (!settled.value.won) {
      return ErrResult(
        new InvalidStateError(
          `Confirmation ${key} is already ${settled.value.previousState}`,
          settled.value.previousState,
        ),
      );
    }
    return OkResult(settled.value.ticket);
  }

  private async applyOn(
    punishment: PunishmentRecord,
    serverId: ServerId,
    actorId: UserId,
    ticket: PendingConfirmation | null = null,
  ): Promise<ApplyOutcome> {
    const { registry, effector, audit, sink, policy } = this.deps;
    const server = registry.getServer(serverId);
    const res = await callRemote(
      serverId,
      "applyPunishment",
      () =>
        effector.applyPunishment(serverId, punishment, {
          warnedRoleId: server?.warnedRoleId ?? null,
          reason: punishment.reason,
        }),
      { timeoutMs: policy.timeoutMs, retries: 0 },
    );

    const error = res.isErr() ? res.error.message : null;
    const recorded = await audit.append(punishment.id, {
      type: error === null ? "applied" : "apply_failed",
      serverId,
      actorId,
      detail: error,
    });
    if (recorded.isErr()) {
      this.logger.error("[sync:punishments] failed to record application", {
        punishmentId: punishment.id,
        serverId,
        error: recorded.error,
      });
    }
    const latest = recorded.isOk() ? recorded.value : punishment;

    if (error !== null) {
      this.logger.warn("[sync:punishments] apply failed", {
        punishmentId: punishment.id,
        serverId,
        error,
      });
      if (server) {
        this.notify("reportFailure", () =>
          sink.reportFailure({ punishment: latest, server, action: "apply", error }),
        );
      }
      return { punishmentId: punishment.id, serverId, phase: "apply_failed", error };
    }

    this.announce(latest, serverId, "applied", actorId, ticket);
    return { punishmentId: punishment.id, serverId, phase: "applied", error: null };
  }

  private async revokeOn(
    punishment: PunishmentRecord,
    serverId: ServerId,
    actorId: UserId,
    reason?: string,
  ): Promise<RevokeReport["servers"][number]> {
    const { registry, effector, audit, sink, policy } = this.deps;
    const server = registry.getServer(serverId);
    const res = await callRemote(
      serverId,
      "revokePunishment",
      () =>
        effector.revokePunishment(serverId, punishment, {
          warnedRoleId: server?.warnedRoleId ?? null,
          reason,
        }),
      policy,
    );

    const error = res.isErr() ? res.error.message : null;
    const recorded = await audit.append(punishment.id, {
      type: error === null ? "revoked" : "revoke_failed",
      serverId,
      actorId,
      detail: error ?? reason ?? null,
    });
    if (recorded.isErr()) {
      // Without the event the server is still revocable; the next revoke repeats it.
      this.logger.error("[sync:punishments] failed to record revocation", {
        punishmentId: punishment.id,
        serverId,
        error: recorded.error,
      });
      return { serverId, phase: "revoke_failed", error: recorded.error.message };
    }

    if (error !== null) {
      if (server) {
        this.notify("reportFailure", () =>
          sink.reportFailure({ punishment: recorded.value, server, action: "revoke", error }),
        );
      }
      return { serverId, phase: "revoke_failed", error };
    }

    this.announce(recorded.value, serverId, "revoked", actorId, null);
    return { serverId, phase: "revoked", error: null };
  }

  /**
   * Cancels open tickets matching `filter`. `alsoLock` names extra servers whose keys are
   * locked (and so waited on) even without an open ticket.
   */
  private async cancelWhere(
    filter: (ticket: PendingConfirmation) => boolean,
    actorId: UserId,
    detail: string,
    alsoLock: { punishmentId: PunishmentId; serverId: ServerId }[],
  ): Promise<Result<ConfirmationToken[], SyncError>> {
    const open = await this.workflow.openTickets(filter);
    if (open.isErr()) return ErrResult(open.error);

    const byKey = new Map<string, PendingConfirmation | null>();
    for (const subject of alsoLock) {
      byKey.set(confirmationKey(subject.punishmentId, subject.serverId), null);
    }
    for (const ticket of open.value) byKey.set(ticket.key, ticket);

    const canceled: ConfirmationToken[] = [];
    for (const [key, ticket] of byKey) {
      await this.lock.run(key, async () => {
        if (!ticket) return;
        const res = await this.workflow.cancel(ticket.token, actorId);
        if (res.isErr()) {
          this.logger.error("[sync:punishments] failed to cancel confirmation", {
            key,
            error: res.error,
          });
          return;
        }
        if (!res.value.won) return;

        canceled.push(ticket.token);
        const { punishmentId, serverId } = ticket.subject;
        const recorded = await this.deps.audit.append(punishmentId, {
          type: "canceled",
          serverId,
          actorId,
          detail,
        });
        if (recorded.isErr()) {
          this.logger.error("[sync:punishments] failed to record cancelation", {
            key,
            error: recorded.error,
          });
          return;
        }
        this.announce(recorded.value, serverId, "canceled", actorId, res.value.ticket);
      });
    }
    return OkResult(canceled);
  }

  private handleExpired(ticket: PendingConfirmation): Promise<void> {
    const { punishmentId, serverId } = ticket.subject;
    return this.lock.run(ticket.key, async () => {
      const recorded = await this.deps.audit.append(punishmentId, {
        type: "expired",
        serverId,
        actorId: SYSTEM_ACTOR_ID,
        detail: "not applied",
      });
      if (recorded.isErr()) {
        this.logger.error("[sync:punishments] failed to record expiry", {
          key: ticket.key,
          error: recorded.error,
        });
        return;
      }
      this.logger.info("[sync:punishments] confirmation expired", { key: ticket.key });
      this.announce(recorded.value, serverId, "expired", SYSTEM_ACTOR_ID, ticket);
    });
  }

  private async require(punishmentId: PunishmentId): Promise<Result<PunishmentRecord, SyncError>> {
    const res = await this.deps.audit.get(punishmentId);
    if (res.isErr()) return ErrResult(res.error);
    if (!res.value) return ErrResult(new NotFoundError(`Unknown punishment ${punishmentId}`));
    return OkResult(res.value);
  }

  private mayManage(punishment: PunishmentRecord, actor: SyncActor): boolean {
    return punishment.issuedBy === actor.userId || this.deps.registry.isOperator(actor.roleIds);
  }

  private announce(
    punishment: PunishmentRecord,
    serverId: ServerId,
    outcome: AnnouncedOutcome,
    actorId: UserId,
    ticket: PendingConfirmation | null,
  ): void {
    const server = this.deps.registry.getServer(serverId);
    if (!server) return;
    this.notify("announceOutcome", () =>
      this.deps.sink.announceOutcome({ punishment, server, outcome, actorId, ticket }),
    );
  }

  private notify(label: string, task: () => Promise<void>): void {
    const fail = (error: unknown) => {
      this.logger.warn(`[sync:notifications] ${label} failed`, { error });
    };
    try {
      task().catch(fail);
    } catch (error) {
      fail(error);
    }
  }
}

function proposedServers(
  record: PunishmentRecord,
): { punishmentId: PunishmentId; serverId: ServerId }[] {
  const servers = new Set<ServerId>();
  for (const event of record.history) {
    if (event.type === "proposed") servers.add(event.serverId);
  }
  return [...servers].map((serverId) => ({ punishmentId: record.id, serverId }));
}

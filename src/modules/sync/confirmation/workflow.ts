/**
 * ConfirmationWorkflow: keyed accept/reject gate with a deadline.
 *
 * Every transition is a compare-and-swap from `pending` in the store, run under a
 * per-key lock: a button press and the expiry timer can race, exactly one settles the
 * ticket and the other sees the settled state. Deadlines live in the store; `rearm()`
 * restores timers after a restart and expires what became overdue while down.
 */
import { randomBytes } from "node:crypto";
import type { ConfirmationStore } from "@/db/repositories/sync/confirmations";
import type { ConfirmationToken, UserId } from "@/db/types";
import { KeyedMutex } from "@/utils/keyedMutex";
import { silentLogger, type SyncLogger } from "@/utils/logger";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  NotFoundError,
  ValidationError,
  asPersistenceError,
  type SyncError,
} from "../errors";
import {
  SYSTEM_ACTOR_ID,
  type ConfirmationState,
  type PendingConfirmation,
  type TerminalConfirmationState,
} from "../types";

/** Largest delay `setTimeout` accepts; longer waits are chained. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type ConfirmationOutcome = "confirmed" | "rejected";

export interface SettleResult<S> {
  /** State before this call. Anything but `pending` means another caller got there first. */
  previousState: ConfirmationState;
  ticket: PendingConfirmation<S>;
  won: boolean;
}

export interface RearmReport {
  rearmed: number;
  expired: number;
}

export interface ConfirmationWorkflowOptions<S> {
  /** Runs once per ticket that reached `expired`, whichever path expired it. */
  onExpire: (ticket: PendingConfirmation<S>) => Promise<void>;
  logger?: SyncLogger;
  now?: () => Date;
  generateToken?: () => ConfirmationToken;
}

export class ConfirmationWorkflow<S> {
  private readonly lock = new KeyedMutex();
  private readonly timers = new Map<ConfirmationToken, ReturnType<typeof setTimeout>>();
  private readonly logger: SyncLogger;
  private readonly now: () => Date;
  private readonly generateToken: () => ConfirmationToken;

  constructor(
    private readonly store: ConfirmationStore<S>,
    private readonly options: ConfirmationWorkflowOptions<S>,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.generateToken = options.generateToken ?? (() => randomBytes(8).toString("hex"));
  }

  async create(
    key: string,
    subject: S,
    timeoutMs: number,
  ): Promise<Result<PendingConfirmation<S>, SyncError>> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      return ErrResult(new ValidationError("Confirmation timeout must be positive"));
    }

    return this.lock.run(key, async () => {
      const requestedAt = this.now();
      const ticket: PendingConfirmation<S> = {
        token: this.generateToken(),
        key,
        subject,
        state: "pending",
        requestedAt,
        expiresAt: new Date(requestedAt.getTime() + timeoutMs),
        respondedBy: null,
        respondedAt: null,
      };

      const res = await this.store.insert(ticket);
      if (res.isErr()) {
        return ErrResult(asPersistenceError(res.error, `Failed to open confirmation ${key}`));
      }
      this.arm(res.value);
      return OkResult(res.value);
    });
  }

  respond(
    token: ConfirmationToken,
    outcome: ConfirmationOutcome,
    actorId: UserId,
  ): Promise<Result<SettleResult<S>, SyncError>> {
    return this.settle(token, outcome, actorId);
  }

  cancel(token: ConfirmationToken, actorId: UserId): Promise<Result<SettleResult<S>, SyncError>> {
    return this.settle(token, "canceled", actorId);
  }

  async get(token: ConfirmationToken): Promise<Result<PendingConfirmation<S> | null, SyncError>> {
    const res = await this.store.get(token);
    if (res.isErr()) return ErrResult(asPersistenceError(res.error, `Failed to read ${token}`));
    return OkResult(res.value);
  }

  /** Most recent ticket for `key`, settled or not. */
  async latest(key: string): Promise<Result<PendingConfirmation<S> | null, SyncError>> {
    const res = await this.store.latestByKey(key);
    if (res.isErr()) return ErrResult(asPersistenceError(res.error, `Failed to read ${key}`));
    return OkResult(res.value);
  }

  async openTickets(
    filter: (ticket: PendingConfirmation<S>) => boolean = () => true,
  ): Promise<Result<PendingConfirmation<S>[], SyncError>> {
    const res = await this.store.listPending();
    if (res.isErr()) {
      return ErrResult(asPersistenceError(res.error, "Failed to list pending confirmations"));
    }
    return OkResult(res.value.filter(filter));
  }

  /** Restores timers for every pending ticket; overdue ones expire now. */
  async rearm(): Promise<Result<RearmReport, SyncError>> {
    const open = await this.openTickets();
    if (open.isErr()) return ErrResult(open.error);

    const report: RearmReport = { rearmed: 0, expired: 0 };
    const now = this.now().getTime();
    for (const ticket of open.value) {
      if (ticket.expiresAt.getTime() <= now) {
        const res = await this.expire(ticket.token);
        if (res.isOk() && res.value.won) report.expired += 1;
        continue;
      }
      this.arm(ticket);
      report.rearmed += 1;
    }

    this.logger.info("[sync:confirmations] rearmed pending confirmations", report);
    return OkResult(report);
  }

  /** Number of armed timers. */
  get armed(): number {
    return this.timers.size;
  }

  dispose(): void {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  private arm(ticket: PendingConfirmation<S>): void {
    this.clearTimer(ticket.token);
    const remaining = ticket.expiresAt.getTime() - this.now().getTime();
    const delay = Math.max(0, Math.min(remaining, MAX_TIMER_DELAY_MS));

    const timer = setTimeout(() => {
      this.timers.delete(ticket.token);
      if (remaining > MAX_TIMER_DELAY_MS) {
        this.arm(ticket);
        return;
      }
      this.expire(ticket.token).then(
        (res) => {
          if (res.isErr()) {
            this.logger.error("[sync:confirmations] expiry failed", {
              token: ticket.token,
              error: res.error,
            });
          }
        },
        (error: unknown) => {
          this.logger.error("[sync:confirmations] expiry crashed", { token: ticket.token, error });
        },
      );
    }, delay);
    timer.unref?.();
    this.timers.set(ticket.token, timer);
  }

  private clearTimer(token: ConfirmationToken): void {
    const timer = this.timers.get(token);
    if (timer) clearTimeout(timer);
    this.timers.delete(token);
  }

  private async expire(token: ConfirmationToken): Promise<Result<SettleResult<S>, SyncError>> {
    const res = await this.settle(token, "expired", SYSTEM_ACTOR_ID);
    if (res.isOk() && res.value.won) {
      await this.options.onExpire(res.value.ticket);
    }
    return res;
  }

  private async settle(
    token: ConfirmationToken,
    state: TerminalConfirmationState,
    actorId: UserId,
  ): Promise<Result<SettleResult<S>, SyncError>> {
    const current = await this.get(token);
    if (current.isErr()) return ErrResult(current.error);
    if (!current.value) return ErrResult(new NotFoundError(`Unknown confirmation ${token}`));
    const { key } = current.value;

    return this.lock.run(key, async () => {
      const settled = await this.store.settle(token, state, actorId, this.now());
      if (settled.isErr()) {
        return ErrResult(asPersistenceError(settled.error, `Failed to settle ${token}`));
      }

      if (settled.value) {
        this.clearTimer(token);
        return OkResult({ previousState: "pending", ticket: settled.value, won: true });
      }

      // Lost the swap: report what is stored now.
      const latest = await this.get(token);
      if (latest.isErr()) return ErrResult(latest.error);
      if (!latest.value) return ErrResult(new NotFoundError(`Unknown confirmation ${token}`));
      return OkResult({ previousState: latest.value.state, ticket: latest.value, won: false });
    });
  }
}

/**
 * Confirmation ticket repository (`sync_confirmations`).
 *
 * Invariants:
 * - At most one `pending` ticket per key: enforced by a partial unique index.
 * - Every state change goes through `settle`, a compare-and-swap from `pending`, so two
 *   processes (or a timer and a button) can never both resolve the same ticket.
 */
import { MongoStore, isDuplicateKeyError } from "@/db/mongo-store";
import {
  ConfirmationDocumentSchema,
  type ConfirmationDocument,
  type PunishmentSubject,
} from "@/db/schemas/confirmation";
import type { ConfirmationToken, UserId } from "@/db/types";
import { InvalidStateError } from "@/modules/sync/errors";
import type { PendingConfirmation, TerminalConfirmationState } from "@/modules/sync/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export interface ConfirmationStore<S> {
  /** Fails with `InvalidStateError` when the key already has a pending ticket. */
  insert(ticket: PendingConfirmation<S>): Promise<Result<PendingConfirmation<S>>>;
  get(token: ConfirmationToken): Promise<Result<PendingConfirmation<S> | null>>;
  /** Most recent ticket for `key`, whatever its state. */
  latestByKey(key: string): Promise<Result<PendingConfirmation<S> | null>>;
  listPending(): Promise<Result<PendingConfirmation<S>[]>>;
  /** `pending → state`. `Ok(null)` when the ticket was no longer pending. */
  settle(
    token: ConfirmationToken,
    state: TerminalConfirmationState,
    respondedBy: UserId,
    at: Date,
  ): Promise<Result<PendingConfirmation<S> | null>>;
}

const PENDING_KEY_INDEX = "uniq_pending_confirmation_key";

const toTicket = ({ _id, ...rest }: ConfirmationDocument): PendingConfirmation<PunishmentSubject> => ({
  token: _id,
  ...rest,
});

class MongoConfirmationStore implements ConfirmationStore<PunishmentSubject> {
  private readonly store = new MongoStore<ConfirmationDocument>(
    "sync_confirmations",
    ConfirmationDocumentSchema,
  );
  private indexes: Promise<void> | null = null;

  private ensureIndexes(): Promise<void> {
    this.indexes ??= this.store
      .collection()
      .then((col) =>
        Promise.all([
          col.createIndex(
            { key: 1 },
            {
              name: PENDING_KEY_INDEX,
              unique: true,
              partialFilterExpression: { state: "pending" },
            },
          ),
          col.createIndex({ state: 1, expiresAt: 1 }),
        ]),
      )
      .then(
        () => undefined,
        (error: unknown) => {
          // Without the unique index only the in-process lock prevents duplicates.
          console.error("[sync:confirmations] failed to ensure indexes", error);
          this.indexes = null;
        },
      );
    return this.indexes;
  }

  async insert(
    ticket: PendingConfirmation<PunishmentSubject>,
  ): Promise<Result<PendingConfirmation<PunishmentSubject>>> {
    await this.ensureIndexes();
    const { token, ...rest } = ticket;
    const res = await this.store.insert({ _id: token, ...rest });
    if (res.isErr()) {
      if (isDuplicateKeyError(res.error)) {
        return ErrResult(
          new InvalidStateError(`A confirmation is already pending for ${ticket.key}`, "pending"),
        );
      }
      return ErrResult(res.error);
    }
    return OkResult(ticket);
  }

  async get(
    token: ConfirmationToken,
  ): Promise<Result<PendingConfirmation<PunishmentSubject> | null>> {
    const res = await this.store.get(token);
    return res.map((doc) => (doc ? toTicket(doc) : null));
  }

  async latestByKey(key: string): Promise<Result<PendingConfirmation<PunishmentSubject> | null>> {
    const res = await this.store.find({ key }, { sort: { requestedAt: -1 }, limit: 1 });
    return res.map((docs) => (docs[0] ? toTicket(docs[0]) : null));
  }

  async listPending(): Promise<Result<PendingConfirmation<PunishmentSubject>[]>> {
    const res = await this.store.find({ state: "pending" }, { sort: { expiresAt: 1 } });
    return res.map((docs) => docs.map(toTicket));
  }

  async settle(
    token: ConfirmationToken,
    state: TerminalConfirmationState,
    respondedBy: UserId,
    at: Date,
  ): Promise<Result<PendingConfirmation<PunishmentSubject> | null>> {
    const res = await this.store.updateIfMatch(
      token,
      { state: "pending" },
      { $set: { state, respondedBy, respondedAt: at } },
    );
    return res.map((doc) => (doc ? toTicket(doc) : null));
  }
}

export const confirmationStore: ConfirmationStore<PunishmentSubject> = new MongoConfirmationStore();

/**
 * Punishment ledger repository (`sync_punishments`).
 *
 * Responsibility:
 * - Insert records (duplicate ids become `DuplicatePunishmentError`).
 * - Append history events and flip status, each with one atomic update, so a reader
 *   never sees a half-written transition.
 */
import { MongoStore, isDuplicateKeyError } from "@/db/mongo-store";
import {
  PunishmentDocumentSchema,
  type PunishmentDocument,
  type ResolutionEvent,
} from "@/db/schemas/punishment";
import type { PunishmentId, UserId } from "@/db/types";
import { DuplicatePunishmentError } from "@/modules/sync/errors";
import type { PunishmentRecord } from "@/modules/sync/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export interface PunishmentRepo {
  insert(record: PunishmentRecord): Promise<Result<PunishmentRecord>>;
  findById(id: PunishmentId): Promise<Result<PunishmentRecord | null>>;
  findByTarget(userId: UserId): Promise<Result<PunishmentRecord[]>>;
  /** `Ok(null)` when the record does not exist. */
  appendEvent(id: PunishmentId, event: ResolutionEvent): Promise<Result<PunishmentRecord | null>>;
  /** Flips `active → revoked`. `Ok(null)` when it was not active (or does not exist). */
  markRevoked(id: PunishmentId): Promise<Result<PunishmentRecord | null>>;
}

export const toPunishmentRecord = ({ _id, ...rest }: PunishmentDocument): PunishmentRecord => ({
  id: _id,
  ...rest,
});

export const toPunishmentDocument = ({ id, ...rest }: PunishmentRecord): PunishmentDocument => ({
  _id: id,
  ...rest,
});

class PunishmentRepoImpl implements PunishmentRepo {
  private readonly store = new MongoStore<PunishmentDocument>(
    "sync_punishments",
    PunishmentDocumentSchema,
  );
  private indexes: Promise<void> | null = null;

  private ensureIndexes(): Promise<void> {
    this.indexes ??= this.store
      .collection()
      .then((col) => col.createIndex({ targetUserId: 1, createdAt: -1 }))
      .then(
        () => undefined,
        (error: unknown) => {
          // Lookups still work without the index, only slower.
          console.error("[sync:punishments] failed to ensure indexes", error);
          this.indexes = null;
        },
      );
    return this.indexes;
  }

  async insert(record: PunishmentRecord): Promise<Result<PunishmentRecord>> {
    await this.ensureIndexes();
    const res = await this.store.insert(toPunishmentDocument(record));
    if (res.isErr()) {
      if (isDuplicateKeyError(res.error)) {
        return ErrResult(new DuplicatePunishmentError(record.id));
      }
      return ErrResult(res.error);
    }
    return OkResult(record);
  }

  async findById(id: PunishmentId): Promise<Result<PunishmentRecord | null>> {
    const res = await this.store.get(id);
    return res.map((doc) => (doc ? toPunishmentRecord(doc) : null));
  }

  async findByTarget(userId: UserId): Promise<Result<PunishmentRecord[]>> {
    const res = await this.store.find({ targetUserId: userId }, { sort: { createdAt: -1 } });
    return res.map((docs) => docs.map(toPunishmentRecord));
  }

  async appendEvent(
    id: PunishmentId,
    event: ResolutionEvent,
  ): Promise<Result<PunishmentRecord | null>> {
    const res = await this.store.updateIfMatch(id, {}, { $push: { history: event } });
    return res.map((doc) => (doc ? toPunishmentRecord(doc) : null));
  }

  async markRevoked(id: PunishmentId): Promise<Result<PunishmentRecord | null>> {
    const res = await this.store.updateIfMatch(
      id,
      { status: "active" },
      { $set: { status: "revoked" } },
    );
    return res.map((doc) => (doc ? toPunishmentRecord(doc) : null));
  }
}

export const punishmentRepo: PunishmentRepo = new PunishmentRepoImpl();

/**
 * Purpose: encapsulate CRUD and compare-and-swap operations on a Mongo collection,
 * validating every document read with Zod.
 * Fit: base layer for the sync repositories (`sync_punishments`, `sync_confirmations`).
 * Invariants: every document has `_id: string`; reads never throw and skip documents that
 * fail validation (logged), since the audit ledger must never invent defaults; every
 * method returns a `Result` so the caller decides about retries.
 */
import type {
  Collection,
  Document,
  Filter,
  FindOptions,
  OptionalUnlessRequiredId,
  UpdateFilter,
} from "mongodb";
import type { ZodType, ZodTypeDef } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "./mongo";

/** Mongo duplicate key error. */
export const DUPLICATE_KEY_CODE = 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === DUPLICATE_KEY_CODE;

export class MongoStore<T extends Document & { _id: string }> {
  constructor(
    private readonly collectionName: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
  ) {}

  /** Not cached; `getDb` owns the client singleton. */
  public async collection(): Promise<Collection<T>> {
    return (await getDb()).collection<T>(this.collectionName);
  }

  /** Validates a raw document. Invalid documents are logged and dropped. */
  parse(doc: unknown): T | null {
    const parsed = this.schema.safeParse(doc);
    if (parsed.success) return parsed.data;

    const id =
      typeof doc === "object" && doc !== null && "_id" in doc ? String(doc._id) : "unknown";
    console.error(`[MongoStore:${this.collectionName}] invalid document; skipping`, {
      id,
      error: parsed.error.message,
    });
    return null;
  }

  async get(id: string): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: id } as Filter<T>);
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Inserts a new document. A duplicate `_id` (or unique index hit) surfaces as the raw
   * driver error so the repository can map it to a domain error.
   */
  async insert(doc: T): Promise<Result<T>> {
    try {
      const col = await this.collection();
      await col.insertOne(doc as OptionalUnlessRequiredId<T>);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Applies `update` only if the document still matches `expected`.
   *
   * Returns `null` when the snapshot no longer matches (another writer won). `expected`
   * must be minimal and stable: typically a status field.
   */
  async updateIfMatch(
    id: string,
    expected: Filter<T>,
    update: UpdateFilter<T>,
  ): Promise<Result<T | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate({ ...expected, _id: id } as Filter<T>, update, {
        returnDocument: "after",
      });
      return OkResult(doc ? this.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async find(filter: Filter<T>, options?: FindOptions): Promise<Result<T[]>> {
    try {
      const col = await this.collection();
      const docs = await col.find(filter, options).toArray();
      const parsed: T[] = [];
      for (const doc of docs) {
        const value = this.parse(doc);
        if (value) parsed.push(value);
      }
      return OkResult(parsed);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

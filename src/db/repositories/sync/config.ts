/**
 * Repository for the federation configuration (`sync_config`).
 *
 * The document is stored whole and read back raw: validation belongs to
 * `parseSyncConfig`, which reports problems as a `ConfigError` instead of skipping.
 */
import { getDb } from "@/db/mongo";
import { SYNC_CONFIG_ID, type SyncConfig } from "@/db/schemas/sync-config";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";

export interface SyncConfigSource {
  /** `Ok(null)` when nothing has been stored yet. */
  read(): Promise<Result<unknown | null>>;
  write(config: SyncConfig): Promise<Result<void>>;
}

type SyncConfigDocument = SyncConfig & { _id: string; updatedAt: Date };

export class MongoSyncConfigSource implements SyncConfigSource {
  constructor(private readonly collectionName = "sync_config") {}

  private async collection() {
    return (await getDb()).collection<SyncConfigDocument>(this.collectionName);
  }

  async read(): Promise<Result<unknown | null>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: SYNC_CONFIG_ID });
      if (!doc) return OkResult(null);
      const { _id, updatedAt, ...config } = doc;
      return OkResult(config);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async write(config: SyncConfig): Promise<Result<void>> {
    try {
      const col = await this.collection();
      await col.replaceOne(
        { _id: SYNC_CONFIG_ID },
        { ...config, updatedAt: new Date() },
        { upsert: true },
      );
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

/**
 * Wires the sync engine together and owns its lifecycle.
 *
 * `createSyncRuntime` is platform-agnostic (tests build it from in-memory parts);
 * `createSeyfertSyncRuntime` plugs in the Mongo repositories and the Seyfert client.
 */
import type { UsingClient } from "seyfert";
import type { SyncSettings } from "@/configuration";
import { MongoSyncConfigSource, type SyncConfigSource } from "@/db/repositories/sync/config";
import { confirmationStore, type ConfirmationStore } from "@/db/repositories/sync/confirmations";
import { punishmentRepo, type PunishmentRepo } from "@/db/repositories/sync/punishments";
import { silentLogger, type SyncLogger } from "@/utils/logger";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { AuditTrail } from "./audit/service";
import type { RearmReport } from "./confirmation/workflow";
import type { RemoteCallPolicy } from "./effector/call";
import { SeyfertGuildEffector, SeyfertGuildInspector } from "./effector/seyfert";
import type { GuildEffector, GuildInspector } from "./effector/types";
import type { SyncError } from "./errors";
import { SeyfertNotificationSink } from "./notifications/seyfert";
import type { NotificationSink } from "./notifications/types";
import { PunishmentSyncCoordinator } from "./punishments/coordinator";
import { SyncRegistry } from "./registry/service";
import { RoleSyncCoordinator } from "./roles/coordinator";
import { HierarchyGuard } from "./roles/hierarchy";
import type { PunishmentSubject } from "./types";

export type RuntimeSettings = Pick<
  SyncSettings,
  "confirmationTimeoutMs" | "effectorTimeoutMs" | "effectorRetries"
>;

export interface SyncRuntimeDeps {
  source: SyncConfigSource;
  punishments: PunishmentRepo;
  confirmations: ConfirmationStore<PunishmentSubject>;
  effector: GuildEffector;
  inspector: GuildInspector;
  sink: NotificationSink;
  settings: RuntimeSettings;
  logger?: SyncLogger;
  now?: () => Date;
}

export class SyncRuntime {
  constructor(
    readonly registry: SyncRegistry,
    readonly audit: AuditTrail,
    readonly roles: RoleSyncCoordinator,
    readonly punishments: PunishmentSyncCoordinator,
    private readonly logger: SyncLogger,
  ) {}

  /** Restores confirmation timers left by a previous process. */
  async start(): Promise<Result<RearmReport, SyncError>> {
    const res = await this.punishments.resume();
    if (res.isErr()) {
      this.logger.error("[sync] failed to resume confirmations", { error: res.error });
    }
    return res;
  }

  stop(): void {
    this.punishments.dispose();
  }
}

export async function createSyncRuntime(
  deps: SyncRuntimeDeps,
): Promise<Result<SyncRuntime, SyncError>> {
  const logger = deps.logger ?? silentLogger;
  const loaded = await SyncRegistry.load(deps.source, logger);
  if (loaded.isErr()) return ErrResult(loaded.error);
  const registry = loaded.value;

  const policy: RemoteCallPolicy = {
    timeoutMs: deps.settings.effectorTimeoutMs,
    retries: deps.settings.effectorRetries,
  };
  const audit = new AuditTrail(deps.punishments, deps.now);

  const roles = new RoleSyncCoordinator({
    registry,
    effector: deps.effector,
    inspector: deps.inspector,
    guard: new HierarchyGuard(deps.inspector, policy),
    policy,
    logger,
  });

  const punishments = new PunishmentSyncCoordinator({
    registry,
    audit,
    store: deps.confirmations,
    effector: deps.effector,
    sink: deps.sink,
    confirmationTimeoutMs: deps.settings.confirmationTimeoutMs,
    policy,
    logger,
    now: deps.now,
  });

  registry.onServerRemoved((serverId) => punishments.cancelForServer(serverId));

  return OkResult(new SyncRuntime(registry, audit, roles, punishments, logger));
}

export function createSeyfertSyncRuntime(
  client: UsingClient,
  settings: RuntimeSettings,
): Promise<Result<SyncRuntime, SyncError>> {
  return createSyncRuntime({
    source: new MongoSyncConfigSource(),
    punishments: punishmentRepo,
    confirmations: confirmationStore,
    effector: new SeyfertGuildEffector(client),
    inspector: new SeyfertGuildInspector(client),
    sink: new SeyfertNotificationSink(client),
    settings,
    logger: client.logger,
  });
}

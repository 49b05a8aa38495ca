import type { SyncConfig } from "@/db/schemas/sync-config";
import type { RuntimeSettings } from "@/modules/sync/runtime";
import { createSyncRuntime, type SyncRuntime } from "@/modules/sync/runtime";
import { silentLogger } from "@/utils/logger";
import { FakePlatform, RecordingSink } from "./platform";
import { MemoryConfigSource, MemoryConfirmationStore, MemoryPunishmentRepo } from "./stores";

export const A = "100000000000000001";
export const B = "100000000000000002";
export const C = "100000000000000003";

export const OPERATOR_ROLE = "900000000000000001";
export const ISSUER = "200000000000000001";
export const TARGET = "200000000000000002";
export const MOD_B = "200000000000000003";

export const TEST_SETTINGS: RuntimeSettings = {
  confirmationTimeoutMs: 60_000,
  effectorTimeoutMs: 1_000,
  effectorRetries: 0,
};

/** Three servers, all taking part in punishment sync, with a `Staff` label on each. */
export function networkConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  const server = (serverId: string, name: string) => ({
    serverId,
    name,
    punishmentSyncEnabled: true,
    announceChannelRef: null,
    confirmChannelRef: null,
    warnedRoleId: null,
  });
  return {
    roleSyncEnabled: true,
    punishmentSyncEnabled: true,
    operatorRoleIds: [OPERATOR_ROLE],
    servers: [server(A, "Alpha"), server(B, "Beta"), server(C, "Gamma")],
    roleMappings: [{ label: "Staff", perServerRoleId: { [A]: "ra", [B]: "rb", [C]: "rc" } }],
    ...overrides,
  };
}

export interface Harness {
  runtime: SyncRuntime;
  source: MemoryConfigSource;
  repo: MemoryPunishmentRepo;
  store: MemoryConfirmationStore;
  platform: FakePlatform;
  sink: RecordingSink;
}

export async function buildHarness(
  config: SyncConfig = networkConfig(),
  settings: RuntimeSettings = TEST_SETTINGS,
): Promise<Harness> {
  const source = new MemoryConfigSource(config);
  const repo = new MemoryPunishmentRepo();
  const store = new MemoryConfirmationStore();
  const platform = new FakePlatform()
    .addServer(A, 10, { ra: 5 })
    .addServer(B, 10, { rb: 5 })
    .addServer(C, 10, { rc: 5 });
  const sink = new RecordingSink();

  const runtime = await createSyncRuntime({
    source,
    punishments: repo,
    confirmations: store,
    effector: platform,
    inspector: platform,
    sink,
    settings,
    logger: silentLogger,
  });
  if (runtime.isErr()) throw runtime.error;
  return { runtime: runtime.value, source, repo, store, platform, sink };
}

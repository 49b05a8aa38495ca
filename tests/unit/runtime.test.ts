import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSyncRuntime, type SyncRuntimeDeps } from "@/modules/sync/runtime";
import { silentLogger } from "@/utils/logger";
import { advance, useFakeClock } from "../_utils/clock";
import { A, B, C, ISSUER, TARGET, TEST_SETTINGS, networkConfig } from "../_utils/fixtures";
import { FakePlatform, RecordingSink } from "../_utils/platform";
import { MemoryConfigSource, MemoryConfirmationStore, MemoryPunishmentRepo } from "../_utils/stores";

function deps(shared: Pick<SyncRuntimeDeps, "source" | "punishments" | "confirmations">): SyncRuntimeDeps {
  const platform = new FakePlatform().addServer(A, 10, {}).addServer(B, 10, {}).addServer(C, 10, {});
  return {
    ...shared,
    effector: platform,
    inspector: platform,
    sink: new RecordingSink(),
    settings: TEST_SETTINGS,
    logger: silentLogger,
  };
}

describe("SyncRuntime", () => {
  beforeEach(() => {
    useFakeClock();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("refuses to start on an invalid configuration", async () => {
    const res = await createSyncRuntime(
      deps({
        source: new MemoryConfigSource({ servers: [{ serverId: A }, { serverId: A }] }),
        punishments: new MemoryPunishmentRepo(),
        confirmations: new MemoryConfirmationStore(),
      }),
    );
    expect(res.isErr() && res.error.code).toBe("CONFIG_INVALID");
  });

  it("picks up pending confirmations after a restart", async () => {
    const shared = {
      source: new MemoryConfigSource(networkConfig()),
      punishments: new MemoryPunishmentRepo(),
      confirmations: new MemoryConfirmationStore(),
    };

    const first = await createSyncRuntime(deps(shared));
    if (first.isErr()) throw first.error;
    const issued = await first.value.punishments.issue(
      { kind: "ban", targetUserId: TARGET, sourceServerId: A, reason: "spam" },
      { userId: ISSUER, roleIds: [] },
    );
    if (issued.isErr()) throw issued.error;
    first.value.stop();

    await advance(30_000);
    const second = await createSyncRuntime(deps(shared));
    if (second.isErr()) throw second.error;
    const started = await second.value.start();
    expect(started.isOk() && started.value).toEqual({ rearmed: 2, expired: 0 });

    await advance(30_000);
    const id = issued.value.punishment.id;
    const events = shared.punishments.events(id);
    expect(events.slice(0, 3)).toEqual([`applied@${A}`, `proposed@${B}`, `proposed@${C}`]);
    expect(events.slice(3).sort()).toEqual([`expired@${B}`, `expired@${C}`].sort());
    second.value.stop();
  });
});

import { describe, expect, it } from "vitest";
import { AuditTrail, phaseByServer, revocableServers } from "@/modules/sync/audit/service";
import type { NewPunishment } from "@/modules/sync/audit/service";
import { A, B, C, ISSUER, TARGET } from "../_utils/fixtures";
import { MemoryPunishmentRepo } from "../_utils/stores";

const T0 = new Date("2026-01-01T00:00:00Z");

const newBan = (id = "p1"): NewPunishment => ({
  id,
  kind: "ban",
  targetUserId: TARGET,
  sourceServerId: A,
  issuedBy: ISSUER,
  reason: "spam",
  evidenceRef: null,
  expiry: null,
  durationMs: null,
  warnDays: 0,
});

function setup() {
  const repo = new MemoryPunishmentRepo();
  return { repo, audit: new AuditTrail(repo, () => T0) };
}

describe("AuditTrail", () => {
  it("records an active punishment with an empty history", async () => {
    const { audit } = setup();
    const res = await audit.record(newBan());
    expect(res.isOk() && res.value).toMatchObject({ id: "p1", status: "active", history: [] });
    expect(res.isOk() && res.value.createdAt).toEqual(T0);

    const dup = await audit.record(newBan());
    expect(dup.isErr() && dup.error.code).toBe("DUPLICATE_PUNISHMENT");
  });

  it("appends events in order", async () => {
    const { audit } = setup();
    await audit.record(newBan());
    await audit.append("p1", { type: "proposed", serverId: B, actorId: ISSUER });
    const res = await audit.append("p1", {
      type: "confirmed",
      serverId: B,
      actorId: "mod",
      detail: "ok",
    });
    expect(res.isOk() && res.value.history).toEqual([
      { type: "proposed", serverId: B, actorId: ISSUER, at: T0, detail: null },
      { type: "confirmed", serverId: B, actorId: "mod", at: T0, detail: "ok" },
    ]);
  });

  it("returns NOT_FOUND when appending to an unknown record", async () => {
    const { audit } = setup();
    const res = await audit.append("missing", { type: "applied", serverId: A, actorId: ISSUER });
    expect(res.isErr() && res.error.code).toBe("NOT_FOUND");
  });

  it("wraps repository failures as persistence errors", async () => {
    const { audit, repo } = setup();
    await audit.record(newBan());
    repo.failAppendFor.add("applied");
    const res = await audit.append("p1", { type: "applied", serverId: A, actorId: ISSUER });
    expect(res.isErr() && res.error.code).toBe("PERSISTENCE_FAILURE");
  });

  it("flips to revoked once", async () => {
    const { audit } = setup();
    await audit.record(newBan());
    const first = await audit.markRevoked("p1");
    expect(first.isOk() && first.value.changed).toBe(true);
    expect(first.isOk() && first.value.record.status).toBe("revoked");

    const second = await audit.markRevoked("p1");
    expect(second.isOk() && second.value.changed).toBe(false);

    const stored = await audit.get("p1");
    expect(stored.isOk() && stored.value?.status).toBe("revoked");

    const missing = await audit.markRevoked("nope");
    expect(missing.isErr() && missing.error.code).toBe("NOT_FOUND");
  });

  it("lists a user's records newest first", async () => {
    const repo = new MemoryPunishmentRepo();
    let clock = T0.getTime();
    const audit = new AuditTrail(repo, () => new Date((clock += 1000)));
    await audit.record(newBan("old"));
    await audit.record(newBan("new"));
    const res = await audit.findByTarget(TARGET);
    expect(res.isOk() && res.value.map((r) => r.id)).toEqual(["new", "old"]);
  });
});

describe("history projections", () => {
  it("derives the latest phase per server and where it is in effect", async () => {
    const { audit } = setup();
    await audit.record(newBan());
    const events = [
      { type: "applied", serverId: A },
      { type: "proposed", serverId: B },
      { type: "proposed", serverId: C },
      { type: "confirmed", serverId: B },
      { type: "applied", serverId: B },
      { type: "expired", serverId: C },
      { type: "revoked", serverId: A },
    ] as const;
    for (const event of events) await audit.append("p1", { ...event, actorId: ISSUER });

    const record = await audit.get("p1");
    if (record.isErr() || !record.value) throw new Error("record missing");
    expect(phaseByServer(record.value)).toEqual({ [A]: "revoked", [B]: "applied", [C]: "expired" });
    expect(revocableServers(record.value)).toEqual([B]);
  });

  it("counts servers whose application failed after being confirmed", async () => {
    const { audit } = setup();
    await audit.record(newBan());
    const events = [
      { type: "apply_failed", serverId: A },
      { type: "proposed", serverId: B },
      { type: "confirmed", serverId: B },
      { type: "apply_failed", serverId: B },
      { type: "proposed", serverId: C },
      { type: "rejected", serverId: C },
    ] as const;
    for (const event of events) await audit.append("p1", { ...event, actorId: ISSUER });

    const record = await audit.get("p1");
    if (record.isErr() || !record.value) throw new Error("record missing");
    expect(revocableServers(record.value)).toEqual([A, B]);
  });

  it("keeps a server applied after a failed revocation", async () => {
    const { audit } = setup();
    await audit.record(newBan());
    await audit.append("p1", { type: "applied", serverId: A, actorId: ISSUER });
    await audit.append("p1", { type: "revoke_failed", serverId: A, actorId: ISSUER });
    const record = await audit.get("p1");
    if (record.isErr() || !record.value) throw new Error("record missing");
    expect(revocableServers(record.value)).toEqual([A]);
    expect(phaseByServer(record.value)[A]).toBe("revoke_failed");
  });
});

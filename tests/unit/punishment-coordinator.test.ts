import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { IssueInput } from "@/modules/sync/punishments/coordinator";
import type { SyncActor } from "@/modules/sync/types";
import { advance, flush, useFakeClock } from "../_utils/clock";
import {
  A,
  B,
  C,
  ISSUER,
  MOD_B,
  OPERATOR_ROLE,
  TARGET,
  buildHarness,
  networkConfig,
  type Harness,
} from "../_utils/fixtures";

const issuer: SyncActor = { userId: ISSUER, roleIds: [] };
const stranger: SyncActor = { userId: MOD_B, roleIds: [] };
const operator: SyncActor = { userId: MOD_B, roleIds: [OPERATOR_ROLE] };

const ban = (overrides: Partial<IssueInput> = {}): IssueInput => ({
  kind: "ban",
  targetUserId: TARGET,
  sourceServerId: A,
  reason: "raiding",
  ...overrides,
});

async function issueBan(h: Harness, input: IssueInput = ban()) {
  const res = await h.runtime.punishments.issue(input, issuer);
  if (res.isErr()) throw res.error;
  return res.value;
}

function eventsOn(h: Harness, id: string, serverId: string): string[] {
  return (h.repo.records.get(id)?.history ?? [])
    .filter((e) => e.serverId === serverId)
    .map((e) => e.type);
}

describe("PunishmentSyncCoordinator", () => {
  let h: Harness;

  beforeEach(async () => {
    useFakeClock();
    h = await buildHarness();
  });

  afterEach(() => {
    h.runtime.stop();
    vi.useRealTimers();
  });

  describe("issue", () => {
    it("applies at the source and proposes to the other servers", async () => {
      const report = await issueBan(h);
      const id = report.punishment.id;

      expect(report.source).toEqual({ punishmentId: id, serverId: A, phase: "applied", error: null });
      expect(report.proposal?.opened.map((o) => o.serverId)).toEqual([B, C]);
      expect(report.proposal?.skipped).toEqual([{ serverId: A, reason: "SOURCE_SERVER" }]);
      expect(h.repo.events(id)).toEqual([`applied@${A}`, `proposed@${B}`, `proposed@${C}`]);
      expect(h.platform.callsTo("applyPunishment").map((c) => c.serverId)).toEqual([A]);
      expect(h.sink.requests.map((r) => r.target.serverId)).toEqual([B, C]);
      expect(h.sink.requests[0]?.sourceName).toBe("Alpha");
    });

    it("refuses an unregistered source server", async () => {
      const res = await h.runtime.punishments.issue(ban({ sourceServerId: "404" }), issuer);
      expect(res.isErr() && res.error.code).toBe("UNKNOWN_SERVER");
      expect(h.repo.records.size).toBe(0);
    });

    it("validates the input", async () => {
      const noReason = await h.runtime.punishments.issue(ban({ reason: "  " }), issuer);
      expect(noReason.isErr() && noReason.error.code).toBe("VALIDATION_FAILED");

      const noDuration = await h.runtime.punishments.issue(ban({ kind: "timeout" }), issuer);
      expect(noDuration.isErr() && noDuration.error.code).toBe("VALIDATION_FAILED");

      const tooLong = await h.runtime.punishments.issue(
        ban({ kind: "timeout", durationMs: 29 * 24 * 60 * 60 * 1000 }),
        issuer,
      );
      expect(tooLong.isErr() && tooLong.error.code).toBe("VALIDATION_FAILED");

      const badDays = await h.runtime.punishments.issue(ban({ kind: "warn", warnDays: 1.5 }), issuer);
      expect(badDays.isErr() && badDays.error.code).toBe("VALIDATION_FAILED");
    });

    it("computes expiry for timeouts and warns", async () => {
      const timeout = await issueBan(h, ban({ kind: "timeout", durationMs: 3_600_000 }));
      expect(timeout.punishment.expiry).toEqual(new Date("2026-01-01T01:00:00Z"));
      expect(timeout.punishment.durationMs).toBe(3_600_000);

      const warn = await issueBan(h, ban({ kind: "warn", warnDays: 2 }));
      expect(warn.punishment.expiry).toEqual(new Date("2026-01-03T00:00:00Z"));

      const permanent = await issueBan(h);
      expect(permanent.punishment.expiry).toBeNull();
    });

    it("proposes nothing when the source application fails", async () => {
      h.platform.failWhen = (call) =>
        call.method === "applyPunishment" && call.serverId === A ? new Error("Missing Permissions") : null;
      const report = await issueBan(h);

      expect(report.source.phase).toBe("apply_failed");
      expect(report.source.error).toBe("applyPunishment: Missing Permissions");
      expect(report.proposal).toBeNull();
      expect(h.store.tickets.size).toBe(0);
      expect(h.sink.failures.map((f) => `${f.action}@${f.server.serverId}`)).toEqual([`apply@${A}`]);
    });

    it("skips every target while punishment sync is off globally", async () => {
      await h.runtime.registry.setPunishmentSyncEnabled(false);
      const report = await issueBan(h);
      expect(report.source.phase).toBe("applied");
      expect(report.proposal?.opened).toEqual([]);
      expect(report.proposal?.skipped).toEqual([
        { serverId: A, reason: "SOURCE_SERVER" },
        { serverId: B, reason: "GLOBAL_SYNC_DISABLED" },
        { serverId: C, reason: "GLOBAL_SYNC_DISABLED" },
      ]);
    });

    it("skips servers that opted out", async () => {
      await h.runtime.registry.toggleServerSync(C, false);
      const report = await issueBan(h);
      expect(report.proposal?.opened.map((o) => o.serverId)).toEqual([B]);
      expect(report.proposal?.skipped).toContainEqual({ serverId: C, reason: "SERVER_SYNC_DISABLED" });
    });

    it("skips everything when the source opted out", async () => {
      await h.runtime.registry.toggleServerSync(A, false);
      const report = await issueBan(h);
      expect(report.proposal?.opened).toEqual([]);
      expect(report.proposal?.skipped).toContainEqual({ serverId: B, reason: "SOURCE_SYNC_DISABLED" });
    });

    it("keeps state consistent when notifications fail", async () => {
      h.sink.broken = true;
      const report = await issueBan(h);
      await flush();
      expect(report.proposal?.opened).toHaveLength(2);
      expect(h.sink.requests).toHaveLength(2);
    });
  });

  describe("propose", () => {
    it("rejects a reused id", async () => {
      const input = { ...ban(), id: "fixed", issuedBy: ISSUER };
      const first = await h.runtime.punishments.propose(input, [B]);
      expect(first.isOk() && first.value.opened.map((o) => o.serverId)).toEqual([B]);

      const again = await h.runtime.punishments.propose(input, [C]);
      expect(again.isErr() && again.error.code).toBe("DUPLICATE_PUNISHMENT");
    });

    it("reports unknown targets", async () => {
      const res = await h.runtime.punishments.propose({ ...ban(), id: "p", issuedBy: ISSUER }, [
        "404",
        B,
      ]);
      expect(res.isOk() && res.value.skipped).toEqual([{ serverId: "404", reason: "UNKNOWN_SERVER" }]);
    });
  });

  describe("confirm / reject / expire", () => {
    it("applies where confirmed and expires where nobody answered", async () => {
      const { punishment } = await issueBan(h);
      const id = punishment.id;

      const confirmed = await h.runtime.punishments.confirm(id, B, MOD_B);
      expect(confirmed.isOk() && confirmed.value.phase).toBe("applied");

      await advance(60_000);

      expect(eventsOn(h, id, B)).toEqual(["proposed", "confirmed", "applied"]);
      expect(eventsOn(h, id, C)).toEqual(["proposed", "expired"]);
      expect(h.platform.callsTo("applyPunishment").map((c) => c.serverId)).toEqual([A, B]);
      expect(h.sink.outcomeList()).toEqual([`applied@${A}`, `applied@${B}`, `expired@${C}`]);

      const late = await h.runtime.punishments.confirm(id, C, MOD_B);
      expect(late.isErr() && late.error.code).toBe("INVALID_STATE");
      expect(h.platform.callsTo("applyPunishment")).toHaveLength(2);
    });

    it("records a rejection without touching the server", async () => {
      const { punishment } = await issueBan(h);
      const res = await h.runtime.punishments.reject(punishment.id, B, MOD_B);
      expect(res.isOk() && res.value.state).toBe("rejected");
      expect(eventsOn(h, punishment.id, B)).toEqual(["proposed", "rejected"]);

      const twice = await h.runtime.punishments.confirm(punishment.id, B, MOD_B);
      expect(twice.isErr() && twice.error.code).toBe("INVALID_STATE");
      expect(h.platform.callsTo("applyPunishment").map((c) => c.serverId)).toEqual([A]);
    });

    it("resolves a confirm racing the deadline exactly once", async () => {
      const { punishment } = await issueBan(h);
      await advance(59_999);

      const confirming = h.runtime.punishments.confirm(punishment.id, C, MOD_B);
      await advance(1);
      await confirming;
      await flush();

      const terminal = eventsOn(h, punishment.id, C).filter(
        (t) => t === "confirmed" || t === "expired",
      );
      expect(terminal).toHaveLength(1);
      const applied = h.platform.callsTo("applyPunishment").filter((c) => c.serverId === C);
      expect(applied).toHaveLength(terminal[0] === "confirmed" ? 1 : 0);
    });

    it("records the proposal before an expiry that fires while it is written", async () => {
      let release = (): void => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const append = h.repo.appendEvent.bind(h.repo);
      h.repo.appendEvent = async (id, event) => {
        if (event.type === "proposed") await gate;
        return append(id, event);
      };

      const proposing = h.runtime.punishments.propose({ ...ban(), id: "slow", issuedBy: ISSUER }, [B]);
      await flush();
      await advance(60_000);
      release();
      await proposing;
      await flush();

      expect(eventsOn(h, "slow", B)).toEqual(["proposed", "expired"]);
    });

    it("answers prompts by token", async () => {
      const report = await issueBan(h);
      const token = report.proposal?.opened.find((o) => o.serverId === C)?.token ?? "";
      const res = await h.runtime.punishments.respond(token, "confirmed", MOD_B);
      expect(res.isOk() && "phase" in res.value && res.value.phase).toBe("applied");

      const unknown = await h.runtime.punishments.respond("missing", "rejected", MOD_B);
      expect(unknown.isErr() && unknown.error.code).toBe("NOT_FOUND");
    });

    it("refuses servers that were never asked", async () => {
      const { punishment } = await issueBan(h);
      const res = await h.runtime.punishments.confirm(punishment.id, A, MOD_B);
      expect(res.isErr() && res.error.code).toBe("INVALID_STATE");
    });

    it("passes the server's warned role to warns", async () => {
      await h.runtime.registry.setWarnedRole(B, "warned-b");
      const { punishment } = await issueBan(h, ban({ kind: "warn", warnDays: 3 }));
      await h.runtime.punishments.confirm(punishment.id, B, MOD_B);
      expect(h.platform.callsTo("applyPunishment").map((c) => c.detail)).toEqual([
        "warn:-",
        "warn:warned-b",
      ]);
    });
  });

  describe("retryApply", () => {
    it("retries a failed application on request", async () => {
      h.platform.failWhen = (call) =>
        call.method === "applyPunishment" && call.serverId === B ? new Error("Unknown Member") : null;
      const { punishment } = await issueBan(h);
      const id = punishment.id;

      const confirmed = await h.runtime.punishments.confirm(id, B, MOD_B);
      expect(confirmed.isOk() && confirmed.value.phase).toBe("apply_failed");
      expect(h.sink.failures.map((f) => f.server.serverId)).toEqual([B]);

      const denied = await h.runtime.punishments.retryApply(id, B, stranger);
      expect(denied.isErr() && denied.error.code).toBe("PERMISSION_DENIED");

      h.platform.failWhen = () => null;
      const retried = await h.runtime.punishments.retryApply(id, B, issuer);
      expect(retried.isOk() && retried.value.phase).toBe("applied");
      expect(eventsOn(h, id, B)).toEqual(["proposed", "confirmed", "apply_failed", "applied"]);

      const again = await h.runtime.punishments.retryApply(id, B, operator);
      expect(again.isErr() && again.error.code).toBe("INVALID_STATE");
    });

    it("never retries the application by itself", async () => {
      const settings = { confirmationTimeoutMs: 60_000, effectorTimeoutMs: 1_000, effectorRetries: 3 };
      h.runtime.stop();
      h = await buildHarness(networkConfig(), settings);
      h.platform.failWhen = (call) =>
        call.method === "applyPunishment" ? new Error("rate limited") : null;

      await issueBan(h);
      expect(h.platform.callsTo("applyPunishment")).toHaveLength(1);
    });
  });

  describe("revoke", () => {
    it("lifts the punishment where applied and closes open prompts", async () => {
      const { punishment } = await issueBan(h);
      const id = punishment.id;
      await h.runtime.punishments.confirm(id, B, MOD_B);

      const res = await h.runtime.punishments.revoke(id, issuer, "appeal accepted");
      if (res.isErr()) throw res.error;
      expect(res.value.changed).toBe(true);
      expect(res.value.punishment.status).toBe("revoked");
      expect(res.value.servers).toEqual([
        { serverId: A, phase: "revoked", error: null },
        { serverId: B, phase: "revoked", error: null },
      ]);
      expect(res.value.canceledConfirmations).toHaveLength(1);
      expect(eventsOn(h, id, C)).toEqual(["proposed", "canceled"]);
      expect(h.platform.callsTo("revokePunishment").map((c) => c.serverId).sort()).toEqual([A, B]);

      const late = await h.runtime.punishments.confirm(id, C, MOD_B);
      expect(late.isErr() && late.error.code).toBe("INVALID_STATE");
    });

    it("is idempotent", async () => {
      const { punishment } = await issueBan(h);
      await h.runtime.punishments.revoke(punishment.id, issuer);
      const second = await h.runtime.punishments.revoke(punishment.id, issuer);
      if (second.isErr()) throw second.error;
      expect(second.value).toMatchObject({ changed: false, servers: [], canceledConfirmations: [] });
      expect(h.platform.callsTo("revokePunishment")).toHaveLength(1);
    });

    it("allows only the issuer or an operator", async () => {
      const { punishment } = await issueBan(h);
      const denied = await h.runtime.punishments.revoke(punishment.id, stranger);
      expect(denied.isErr() && denied.error.code).toBe("PERMISSION_DENIED");

      const allowed = await h.runtime.punishments.revoke(punishment.id, operator);
      expect(allowed.isOk() && allowed.value.changed).toBe(true);
    });

    it("stays active after a partial failure so a second call finishes it", async () => {
      const { punishment } = await issueBan(h);
      const id = punishment.id;
      await h.runtime.punishments.confirm(id, B, MOD_B);

      h.platform.failWhen = (call) =>
        call.method === "revokePunishment" && call.serverId === B ? new Error("timeout") : null;
      const first = await h.runtime.punishments.revoke(id, issuer);
      if (first.isErr()) throw first.error;
      expect(first.value.punishment.status).toBe("active");
      expect(first.value.changed).toBe(false);
      expect(first.value.servers.find((s) => s.serverId === B)?.phase).toBe("revoke_failed");

      h.platform.failWhen = () => null;
      const calls = h.platform.callsTo("revokePunishment").length;
      const second = await h.runtime.punishments.revoke(id, issuer);
      if (second.isErr()) throw second.error;
      expect(second.value.servers).toEqual([{ serverId: B, phase: "revoked", error: null }]);
      expect(second.value.punishment.status).toBe("revoked");
      expect(h.platform.callsTo("revokePunishment")).toHaveLength(calls + 1);
    });

    it("reaches servers whose confirmed application reported a failure", async () => {
      h.platform.failWhen = (call) =>
        call.method === "applyPunishment" && call.serverId === B ? new Error("timed out") : null;
      const { punishment } = await issueBan(h);
      const confirmed = await h.runtime.punishments.confirm(punishment.id, B, MOD_B);
      expect(confirmed.isOk() && confirmed.value.phase).toBe("apply_failed");
      h.platform.failWhen = () => null;

      const res = await h.runtime.punishments.revoke(punishment.id, issuer);
      if (res.isErr()) throw res.error;
      expect(res.value.punishment.status).toBe("revoked");
      expect(h.platform.callsTo("revokePunishment").map((c) => c.serverId).sort()).toEqual([A, B]);
      expect(eventsOn(h, punishment.id, B)).toEqual([
        "proposed",
        "confirmed",
        "apply_failed",
        "revoked",
      ]);
    });

    it("reaches the source when its own application failed", async () => {
      h.platform.failWhen = (call) => (call.method === "applyPunishment" ? new Error("nope") : null);
      const { punishment } = await issueBan(h);
      h.platform.failWhen = () => null;

      const res = await h.runtime.punishments.revoke(punishment.id, issuer);
      expect(res.isOk() && res.value.punishment.status).toBe("revoked");
      expect(h.platform.callsTo("revokePunishment").map((c) => c.serverId)).toEqual([A]);
    });

    it("flips a never-applied record without remote calls", async () => {
      const input = { ...ban(), id: "unapplied", issuedBy: ISSUER };
      const proposed = await h.runtime.punishments.propose(input, [B]);
      expect(proposed.isOk() && proposed.value.opened.map((o) => o.serverId)).toEqual([B]);

      const res = await h.runtime.punishments.revoke("unapplied", issuer);
      if (res.isErr()) throw res.error;
      expect(res.value.punishment.status).toBe("revoked");
      expect(res.value.canceledConfirmations).toHaveLength(1);
      expect(h.platform.callsTo("revokePunishment")).toHaveLength(0);
      expect(h.platform.callsTo("applyPunishment")).toHaveLength(0);
    });

    it("returns NOT_FOUND for unknown ids", async () => {
      const res = await h.runtime.punishments.revoke("missing", operator);
      expect(res.isErr() && res.error.code).toBe("NOT_FOUND");
    });
  });

  describe("server removal", () => {
    it("cancels the removed server's open prompts", async () => {
      const { punishment } = await issueBan(h);
      const res = await h.runtime.registry.removeServer(C);
      expect(res.isOk() && res.value.canceledConfirmations).toHaveLength(1);
      expect(eventsOn(h, punishment.id, C)).toEqual(["proposed", "canceled"]);
      expect(eventsOn(h, punishment.id, B)).toEqual(["proposed"]);

      await advance(60_000);
      expect(eventsOn(h, punishment.id, C)).toEqual(["proposed", "canceled"]);
    });
  });

  describe("status and history", () => {
    it("reports per-server phases and open prompts", async () => {
      const { punishment } = await issueBan(h);
      await h.runtime.punishments.reject(punishment.id, C, MOD_B);
      const res = await h.runtime.punishments.status(punishment.id);
      if (res.isErr()) throw res.error;
      expect(res.value.phases).toEqual({ [A]: "applied", [B]: "pending", [C]: "rejected" });
      expect(res.value.openConfirmations.map((t) => t.subject.serverId)).toEqual([B]);
    });

    it("lists a user's punishments", async () => {
      await issueBan(h);
      await issueBan(h, ban({ targetUserId: "someone-else" }));
      const res = await h.runtime.punishments.history(TARGET);
      expect(res.isOk() && res.value).toHaveLength(1);
    });
  });
});

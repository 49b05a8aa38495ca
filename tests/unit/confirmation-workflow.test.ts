import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ConfirmationWorkflow,
  MAX_TIMER_DELAY_MS,
} from "@/modules/sync/confirmation/workflow";
import type { PendingConfirmation } from "@/modules/sync/types";
import { advance, useFakeClock } from "../_utils/clock";
import { MemoryConfirmationStore } from "../_utils/stores";

interface Subject {
  name: string;
}

function setup(store = new MemoryConfirmationStore<Subject>()) {
  const expired: PendingConfirmation<Subject>[] = [];
  let seq = 0;
  const workflow = new ConfirmationWorkflow<Subject>(store, {
    onExpire: async (ticket) => {
      expired.push(ticket);
    },
    generateToken: () => `t${++seq}`,
  });
  return { store, workflow, expired };
}

describe("ConfirmationWorkflow", () => {
  beforeEach(() => {
    useFakeClock();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("opens a pending ticket with its deadline", async () => {
    const { workflow } = setup();
    const res = await workflow.create("k1", { name: "a" }, 60_000);
    expect(res.isOk() && res.value).toMatchObject({
      token: "t1",
      key: "k1",
      state: "pending",
      expiresAt: new Date("2026-01-01T00:01:00Z"),
      respondedBy: null,
    });
    expect(workflow.armed).toBe(1);
  });

  it("rejects non-positive timeouts", async () => {
    const { workflow } = setup();
    const res = await workflow.create("k1", { name: "a" }, 0);
    expect(res.isErr() && res.error.code).toBe("VALIDATION_FAILED");
  });

  it("refuses a second pending ticket for the same key", async () => {
    const { workflow } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);
    const res = await workflow.create("k1", { name: "b" }, 60_000);
    expect(res.isErr() && res.error.code).toBe("INVALID_STATE");
  });

  it("settles once: the second answer sees the first", async () => {
    const { workflow } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);

    const first = await workflow.respond("t1", "confirmed", "u1");
    expect(first.isOk() && first.value.won).toBe(true);
    expect(first.isOk() && first.value.ticket.respondedBy).toBe("u1");
    expect(workflow.armed).toBe(0);

    const second = await workflow.respond("t1", "rejected", "u2");
    expect(second.isOk() && second.value).toMatchObject({ won: false, previousState: "confirmed" });
  });

  it("lets exactly one of two concurrent answers win", async () => {
    const { workflow } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);
    const [a, b] = await Promise.all([
      workflow.respond("t1", "confirmed", "u1"),
      workflow.respond("t1", "rejected", "u2"),
    ]);
    const wins = [a, b].filter((r) => r.isOk() && r.value.won);
    expect(wins).toHaveLength(1);
    const stored = await workflow.get("t1");
    expect(stored.isOk() && stored.value?.state).toBe("confirmed");
  });

  it("expires at the deadline and calls onExpire once", async () => {
    const { workflow, expired } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);

    await advance(59_999);
    expect(expired).toHaveLength(0);

    await advance(1);
    expect(expired.map((t) => t.token)).toEqual(["t1"]);
    expect(expired[0]?.state).toBe("expired");

    const late = await workflow.respond("t1", "confirmed", "u1");
    expect(late.isOk() && late.value).toMatchObject({ won: false, previousState: "expired" });
  });

  it("does not expire an answered ticket", async () => {
    const { workflow, expired } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);
    await workflow.respond("t1", "rejected", "u1");
    await advance(120_000);
    expect(expired).toHaveLength(0);
  });

  it("chains timers past the setTimeout limit", async () => {
    const { workflow, expired } = setup();
    const timeout = MAX_TIMER_DELAY_MS + 10_000;
    await workflow.create("k1", { name: "a" }, timeout);

    await advance(MAX_TIMER_DELAY_MS);
    expect(expired).toHaveLength(0);
    expect(workflow.armed).toBe(1);

    await advance(10_000);
    expect(expired).toHaveLength(1);
  });

  it("cancels open tickets", async () => {
    const { workflow } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);
    const res = await workflow.cancel("t1", "system");
    expect(res.isOk() && res.value.ticket.state).toBe("canceled");
    const open = await workflow.openTickets();
    expect(open.isOk() && open.value).toEqual([]);
  });

  it("returns NOT_FOUND for unknown tokens", async () => {
    const { workflow } = setup();
    const res = await workflow.respond("nope", "confirmed", "u1");
    expect(res.isErr() && res.error.code).toBe("NOT_FOUND");
  });

  it("restores timers after a restart and expires overdue tickets", async () => {
    const store = new MemoryConfirmationStore<Subject>();
    const before = setup(store);
    await before.workflow.create("k1", { name: "a" }, 30_000);
    await before.workflow.create("k2", { name: "b" }, 120_000);
    before.workflow.dispose();

    // Down for a minute: k1 became overdue.
    vi.setSystemTime(new Date("2026-01-01T00:01:00Z"));
    const after = setup(store);
    const report = await after.workflow.rearm();
    expect(report.isOk() && report.value).toEqual({ rearmed: 1, expired: 1 });
    expect(after.expired.map((t) => t.key)).toEqual(["k1"]);

    await advance(60_000);
    expect(after.expired.map((t) => t.key)).toEqual(["k1", "k2"]);
  });

  it("returns the latest ticket of a key", async () => {
    const { workflow } = setup();
    await workflow.create("k1", { name: "a" }, 60_000);
    await workflow.cancel("t1", "system");
    vi.advanceTimersByTime(1);
    await workflow.create("k1", { name: "b" }, 60_000);
    const latest = await workflow.latest("k1");
    expect(latest.isOk() && latest.value?.token).toBe("t2");
  });
});

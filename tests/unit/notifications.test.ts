import { describe, expect, it } from "vitest";
import { hasDiscordCode, warnedRoleFor } from "@/modules/sync/effector/seyfert";
import {
  CONFIRM_PREFIX,
  buildConfirmationButtons,
  buildOutcomeEmbed,
} from "@/modules/sync/notifications/embeds";
import type { PunishmentRecord } from "@/modules/sync/types";
import { A, ISSUER, TARGET } from "../_utils/fixtures";

const record: PunishmentRecord = {
  id: "p1",
  kind: "timeout",
  targetUserId: TARGET,
  sourceServerId: A,
  issuedBy: ISSUER,
  reason: "spam",
  evidenceRef: null,
  expiry: null,
  durationMs: 5_400_000,
  warnDays: 0,
  status: "active",
  createdAt: new Date("2026-01-01T00:00:00Z"),
  history: [],
};

describe("prompt buttons", () => {
  it("encode the action and token in the custom id", () => {
    const row = buildConfirmationButtons("abc123", true).toJSON();
    const ids = row.components.map((c) => ("custom_id" in c ? c.custom_id : null));
    expect(ids).toEqual([`${CONFIRM_PREFIX}confirm:abc123`, `${CONFIRM_PREFIX}reject:abc123`]);
    expect(row.components.map((c) => ("disabled" in c ? c.disabled : null))).toEqual([true, true]);
  });
});

describe("outcome embed", () => {
  it("credits automatic outcomes to nobody in particular", () => {
    const embed = buildOutcomeEmbed(record, "expired", "system").toJSON();
    expect(embed.title).toBe("Timeout · Expired, not applied");
    expect(embed.fields?.find((f) => f.name === "By")?.value).toBe("Automatic");
    expect(embed.fields?.find((f) => f.name === "Duration")?.value).toBe("1h 30m");
  });

  it("mentions the moderator otherwise", () => {
    const embed = buildOutcomeEmbed(record, "applied", "42").toJSON();
    expect(embed.fields?.find((f) => f.name === "By")?.value).toBe("<@42>");
  });
});

describe("hasDiscordCode", () => {
  it("matches numeric codes and known messages", () => {
    expect(hasDiscordCode({ code: 10007 }, 10007)).toBe(true);
    expect(hasDiscordCode(new Error("[404] Unknown Ban"), 10026)).toBe(true);
    expect(hasDiscordCode(new Error("Missing Access"), 10026)).toBe(false);
    expect(hasDiscordCode("Unknown Ban", 10026)).toBe(false);
  });
});

describe("warnedRoleFor", () => {
  const context = { warnedRoleId: "warned" };

  it("marks warns and timeouts issued with warning days", () => {
    expect(warnedRoleFor({ ...record, kind: "warn" }, context)).toBe("warned");
    expect(warnedRoleFor({ ...record, warnDays: 7 }, context)).toBe("warned");
  });

  it("leaves plain timeouts, bans and servers without the role alone", () => {
    expect(warnedRoleFor(record, context)).toBeNull();
    expect(warnedRoleFor({ ...record, kind: "ban", warnDays: 7 }, context)).toBeNull();
    expect(warnedRoleFor({ ...record, warnDays: 7 }, { warnedRoleId: null })).toBeNull();
  });
});

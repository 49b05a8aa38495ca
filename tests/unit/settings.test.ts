import { describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
  DEFAULT_DB_NAME,
  DEFAULT_EFFECTOR_RETRIES,
  DEFAULT_EFFECTOR_TIMEOUT_MS,
  parseSettings,
} from "@/configuration";

describe("parseSettings", () => {
  it("falls back to defaults", () => {
    const res = parseSettings({});
    expect(res.isOk() && res.value).toEqual({
      mongoUri: null,
      dbName: DEFAULT_DB_NAME,
      confirmationTimeoutMs: DEFAULT_CONFIRMATION_TIMEOUT_MS,
      effectorTimeoutMs: DEFAULT_EFFECTOR_TIMEOUT_MS,
      effectorRetries: DEFAULT_EFFECTOR_RETRIES,
      mirrorMemberUpdates: true,
    });
  });

  it("reads numbers from strings and ignores blank values", () => {
    const res = parseSettings({
      MONGO_URI: "mongodb://localhost:27017",
      DB_NAME: "",
      SYNC_CONFIRMATION_TIMEOUT_MS: "3600000",
      SYNC_EFFECTOR_TIMEOUT_MS: "5000",
      SYNC_EFFECTOR_RETRIES: "2",
      SYNC_MIRROR_MEMBER_UPDATES: "false",
    });
    expect(res.isOk() && res.value).toEqual({
      mongoUri: "mongodb://localhost:27017",
      dbName: DEFAULT_DB_NAME,
      confirmationTimeoutMs: 3_600_000,
      effectorTimeoutMs: 5_000,
      effectorRetries: 2,
      mirrorMemberUpdates: false,
    });
  });

  it("rejects invalid values", () => {
    const res = parseSettings({
      SYNC_CONFIRMATION_TIMEOUT_MS: "-5",
      SYNC_EFFECTOR_RETRIES: "99",
      SYNC_MIRROR_MEMBER_UPDATES: "yes",
    });
    expect(res.isErr()).toBe(true);
    if (res.isErr()) {
      expect(res.error.code).toBe("CONFIG_INVALID");
      expect(res.error.issues.map((i) => i.split(":")[0])).toEqual([
        "SYNC_CONFIRMATION_TIMEOUT_MS",
        "SYNC_EFFECTOR_RETRIES",
        "SYNC_MIRROR_MEMBER_UPDATES",
      ]);
    }
  });
});

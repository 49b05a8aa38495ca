/**
 * GuildEffector and GuildInspector on top of a Seyfert client.
 *
 * Calls throw on failure; `callRemote` in the coordinators bounds and records them.
 * Repeats are absorbed here: unbanning someone not banned, or fetching a member that
 * left, are treated as answers rather than errors.
 */
import type { UsingClient } from "seyfert";
import type { RoleId, ServerId, UserId } from "@/db/types";
import type { PunishmentRecord } from "../types";
import type {
  GuildEffector,
  GuildInspector,
  PunishmentContext,
  RoleHierarchy,
} from "./types";

/** Discord JSON error codes we branch on. */
const UNKNOWN_MEMBER = 10007;
const UNKNOWN_BAN = 10026;

const CODE_MESSAGES: Record<number, string> = {
  [UNKNOWN_MEMBER]: "Unknown Member",
  [UNKNOWN_BAN]: "Unknown Ban",
};

export function hasDiscordCode(error: unknown, code: number): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && error.code === code) return true;
  const message = error instanceof Error ? error.message : "";
  const text = CODE_MESSAGES[code];
  return text !== undefined && message.includes(text);
}

/**
 * Role that marks the member while the punishment is in effect: always for warns, and for
 * timeouts issued with warning days.
 */
export function warnedRoleFor(
  punishment: PunishmentRecord,
  context: PunishmentContext,
): RoleId | null {
  if (punishment.kind === "warn") return context.warnedRoleId;
  if (punishment.kind === "timeout" && punishment.warnDays > 0) return context.warnedRoleId;
  return null;
}

function auditReason(punishment: PunishmentRecord, context: PunishmentContext): string {
  return `[sync ${punishment.id}] ${context.reason ?? punishment.reason}`.slice(0, 512);
}

export class SeyfertGuildEffector implements GuildEffector {
  constructor(private readonly client: UsingClient) {}

  async grantRole(serverId: ServerId, userId: UserId, roleId: RoleId): Promise<void> {
    await this.client.members.addRole(serverId, userId, roleId);
  }

  async revokeRole(serverId: ServerId, userId: UserId, roleId: RoleId): Promise<void> {
    await this.client.members.removeRole(serverId, userId, roleId);
  }

  async applyPunishment(
    serverId: ServerId,
    punishment: PunishmentRecord,
    context: PunishmentContext,
  ): Promise<void> {
    const reason = auditReason(punishment, context);
    switch (punishment.kind) {
      case "ban":
        await this.client.bans.create(serverId, punishment.targetUserId, {}, reason);
        return;
      case "timeout": {
        if (!punishment.durationMs) throw new Error("Timeout without duration");
        const member = await this.client.members.fetch(serverId, punishment.targetUserId, true);
        await member.timeout(punishment.durationMs, reason);
        break;
      }
      case "warn":
        break;
    }

    const warnedRoleId = warnedRoleFor(punishment, context);
    if (warnedRoleId) {
      await this.client.members.addRole(serverId, punishment.targetUserId, warnedRoleId);
    } else if (punishment.kind === "warn") {
      this.client.logger?.debug?.("[sync:effector] no warned role configured", { serverId });
    }
  }

  async revokePunishment(
    serverId: ServerId,
    punishment: PunishmentRecord,
    context: PunishmentContext,
  ): Promise<void> {
    const reason = auditReason(punishment, context);
    try {
      switch (punishment.kind) {
        case "ban":
          await this.client.bans.remove(serverId, punishment.targetUserId, reason);
          return;
        case "timeout": {
          const member = await this.client.members.fetch(serverId, punishment.targetUserId, true);
          await member.timeout(null, reason);
          break;
        }
        case "warn":
          break;
      }

      const warnedRoleId = warnedRoleFor(punishment, context);
      if (warnedRoleId) {
        await this.client.members.removeRole(serverId, punishment.targetUserId, warnedRoleId);
      }
    } catch (error) {
      // Already lifted (unbanned, or the member left): nothing to undo.
      if (hasDiscordCode(error, UNKNOWN_BAN) || hasDiscordCode(error, UNKNOWN_MEMBER)) return;
      throw error;
    }
  }
}

export class SeyfertGuildInspector implements GuildInspector {
  constructor(private readonly client: UsingClient) {}

  async getMemberRoles(serverId: ServerId, userId: UserId): Promise<RoleId[] | null> {
    try {
      const member = await this.client.members.fetch(serverId, userId, true);
      return [...member.roles.keys];
    } catch (error) {
      if (hasDiscordCode(error, UNKNOWN_MEMBER)) return null;
      throw error;
    }
  }

  async getRoleHierarchy(serverId: ServerId): Promise<RoleHierarchy> {
    const guild = await this.client.guilds.fetch(serverId);
    const roles = await guild.roles.list(true);
    const positions: Record<RoleId, number> = {};
    for (const role of roles) positions[role.id] = role.position;

    const botId = this.client.me?.id;
    if (!botId) return { botHighestPosition: null, positions };

    const botMember = await guild.members.fetch(botId, true);
    const highest = await botMember.roles.highest(true);
    return { botHighestPosition: highest?.position ?? null, positions };
  }
}

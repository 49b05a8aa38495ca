/**
 * Remote capabilities the coordinators are written against. One implementation per
 * platform; the Seyfert one lives next to this file.
 *
 * Implementations throw on failure. Callers go through `callRemote`, which bounds the
 * time and converts the failure into an `EffectorFailure`.
 */
import type { RoleId, ServerId, UserId } from "@/db/types";
import type { PunishmentRecord } from "../types";

export interface PunishmentContext {
  /** Role given for warns, and for timeouts with warning days, if configured. */
  warnedRoleId: RoleId | null;
  reason?: string;
}

export interface GuildEffector {
  grantRole(serverId: ServerId, userId: UserId, roleId: RoleId, reason?: string): Promise<void>;
  revokeRole(serverId: ServerId, userId: UserId, roleId: RoleId, reason?: string): Promise<void>;
  /** Must tolerate being repeated: re-banning a banned user is not an error. */
  applyPunishment(
    serverId: ServerId,
    punishment: PunishmentRecord,
    context: PunishmentContext,
  ): Promise<void>;
  /** Must tolerate a punishment that is no longer in effect. */
  revokePunishment(
    serverId: ServerId,
    punishment: PunishmentRecord,
    context: PunishmentContext,
  ): Promise<void>;
}

export interface RoleHierarchy {
  /** Position of the bot's highest role; `null` when the bot is not in the server. */
  botHighestPosition: number | null;
  /** Position of every role in the server. */
  positions: Record<RoleId, number>;
}

export interface GuildInspector {
  /** `null` when the user is not a member of the server. */
  getMemberRoles(serverId: ServerId, userId: UserId): Promise<RoleId[] | null>;
  getRoleHierarchy(serverId: ServerId): Promise<RoleHierarchy>;
}

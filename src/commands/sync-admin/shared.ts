import { createStringOption, type GuildCommandContext } from "seyfert";
import type { ServerEntry } from "@/modules/sync";
import { normalizeSnowflake } from "@/utils/snowflake";
import { replyEphemeral } from "../sync/shared";

/** Most admin commands act on the current server unless another id is given. */
export const serverOption = () =>
  createStringOption({
    description: "Server ID (defaults to this server)",
    required: false,
  });

/** The explicit server id, or the current guild. Replies and returns `null` on a malformed id. */
export async function targetServer(
  ctx: GuildCommandContext,
  explicit: string | undefined,
): Promise<string | null> {
  if (!explicit?.trim()) return ctx.guildId ?? null;
  const id = normalizeSnowflake(explicit);
  if (!id) await replyEphemeral(ctx, `❌ \`${explicit.trim()}\` is not a server ID.`);
  return id;
}

export function describeServer(server: ServerEntry): string {
  const channel = (id: string | null) => (id ? `<#${id}>` : "not set");
  return [
    `**${server.name || server.serverId}** (\`${server.serverId}\`)`,
    `Punishment sync: ${server.punishmentSyncEnabled ? "on" : "off"}`,
    `Confirm channel: ${channel(server.confirmChannelRef)}`,
    `Announce channel: ${channel(server.announceChannelRef)}`,
    `Warned role: ${server.warnedRoleId ? `<@&${server.warnedRoleId}>` : "not set"}`,
    `Labels: ${server.roleMappingRefs.length ? server.roleMappingRefs.join(", ") : "none"}`,
  ].join("\n");
}

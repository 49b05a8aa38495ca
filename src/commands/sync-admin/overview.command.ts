import { Declare, Embed, SubCommand, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { MessageFlags } from "seyfert/lib/types";
import type { SyncRegistry } from "@/modules/sync";
import { requireGuild } from "@/commands/sync/shared";
import { describeServer } from "./shared";

export function buildOverviewEmbed(registry: SyncRegistry): Embed {
  const config = registry.snapshot;
  const servers = registry.listServers();
  const labels = config.roleMappings.map(
    (m) => `\`${m.label}\`: ${Object.keys(m.perServerRoleId).length} server(s)`,
  );

  return new Embed()
    .setTitle("Sync network")
    .setColor(EmbedColors.Blurple)
    .setDescription(
      [
        `Role sync: **${config.roleSyncEnabled ? "on" : "off"}**`,
        `Punishment sync: **${config.punishmentSyncEnabled ? "on" : "off"}**`,
        `Operator roles: ${config.operatorRoleIds.map((id) => `<@&${id}>`).join(", ") || "none"}`,
      ].join("\n"),
    )
    .addFields([
      ...servers.slice(0, 20).map((s) => ({ name: s.serverId, value: describeServer(s) })),
      { name: "Labels", value: labels.join("\n").slice(0, 1024) || "None" },
    ]);
}

@Declare({ name: "overview", description: "Show the sync configuration" })
export default class SyncOverviewCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const context = await requireGuild(ctx);
    if (!context) return;
    await ctx.write({
      embeds: [buildOverviewEmbed(context.runtime.registry)],
      flags: MessageFlags.Ephemeral,
    });
  }
}

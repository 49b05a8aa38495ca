/**
 * `/sync roles`: mirror a member's mapped roles from this server into the others.
 */
import {
  Declare,
  Embed,
  Options,
  SubCommand,
  createUserOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { MessageFlags } from "seyfert/lib/types";
import type { RoleSyncOutcome, RoleSyncReport } from "@/modules/sync";
import { replyEphemeral, requireGuild } from "./shared";

const options = {
  user: createUserOption({
    description: "Member to sync (defaults to you)",
    required: false,
  }),
};

const DISABLED_MESSAGE = {
  ROLE_SYNC_DISABLED: "Role sync is turned off.",
  SOURCE_NOT_REGISTERED: "This server is not part of the sync network.",
} as const;

export function formatOutcome(outcome: RoleSyncOutcome): string {
  switch (outcome.status) {
    case "applied":
      return `✅ \`${outcome.label}\`${outcome.changed ? "" : " (already in place)"}`;
    case "skipped":
      return `⏭️ \`${outcome.label}\`: ${outcome.reason}`;
    case "failed":
      return `❌ \`${outcome.label}\`: ${outcome.reason}`;
  }
}

export function buildRoleSyncEmbed(userId: string, report: RoleSyncReport): Embed {
  const embed = new Embed()
    .setTitle("Role sync")
    .setDescription(`Member: <@${userId}>`)
    .setColor(EmbedColors.Blurple);

  const fields = Object.entries(report.targets).map(([serverId, outcomes]) => ({
    name: `Server ${serverId}`,
    value: outcomes.map(formatOutcome).join("\n").slice(0, 1024) || "Nothing to do",
    inline: false,
  }));
  if (fields.length) embed.addFields(fields.slice(0, 25));
  else embed.setDescription(`Member: <@${userId}>\nNo mapped roles to sync.`);
  return embed;
}

@Declare({
  name: "roles",
  description: "Sync a member's mapped roles to the other servers",
})
@Options(options)
export default class SyncRolesCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    await ctx.deferReply(true);
    const userId = ctx.options.user?.id ?? ctx.author.id;

    let roleIds: string[];
    try {
      const member = await ctx.client.members.fetch(context.guildId, userId, true);
      roleIds = [...member.roles.keys];
    } catch (error) {
      ctx.client.logger?.warn?.("[sync:roles] member lookup failed", { userId, error });
      await replyEphemeral(ctx, "❌ That user is not a member of this server.");
      return;
    }

    const report = await context.runtime.roles.syncMemberRoles(
      { userId, roleIds },
      context.guildId,
    );
    if (report.disabled) {
      await replyEphemeral(ctx, `⚠️ ${DISABLED_MESSAGE[report.disabled]}`);
      return;
    }

    await ctx.editOrReply({
      embeds: [buildRoleSyncEmbed(userId, report)],
      flags: MessageFlags.Ephemeral,
    });
  }
}

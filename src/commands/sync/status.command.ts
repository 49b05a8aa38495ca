/**
 * `/sync status`: per-server phase of one punishment.
 */
import {
  Declare,
  Embed,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { MessageFlags } from "seyfert/lib/types";
import type { PunishmentPhase, PunishmentStatusView } from "@/modules/sync";
import { KIND_LABEL } from "@/modules/sync/notifications/embeds";
import { describeError, readPunishmentId, replyEphemeral, requireGuild } from "./shared";

const options = {
  id: createStringOption({ description: "Punishment ID", required: true }),
};

const PHASE_ICON: Record<PunishmentPhase, string> = {
  pending: "⏳",
  confirmed: "☑️",
  rejected: "🚫",
  expired: "⌛",
  canceled: "➖",
  applied: "✅",
  apply_failed: "❌",
  revoked: "↩️",
  revoke_failed: "⚠️",
};

export function buildStatusEmbed(view: PunishmentStatusView): Embed {
  const { punishment, phases } = view;
  const rows = Object.entries(phases).map(
    ([serverId, phase]) => `${PHASE_ICON[phase]} ${serverId}: \`${phase}\``,
  );
  return new Embed()
    .setTitle(`Punishment \`${punishment.id}\``)
    .setColor(punishment.status === "active" ? EmbedColors.Orange : EmbedColors.Grey)
    .setDescription(
      [
        `**Target:** <@${punishment.targetUserId}>`,
        `**Type:** ${KIND_LABEL[punishment.kind]}`,
        `**Status:** ${punishment.status}`,
        `**Issued by:** <@${punishment.issuedBy}> in ${punishment.sourceServerId}`,
        `**Reason:** ${punishment.reason}`,
      ].join("\n"),
    )
    .addFields([
      { name: "Servers", value: rows.join("\n").slice(0, 1024) || "No activity yet" },
      { name: "Open confirmations", value: String(view.openConfirmations.length) },
    ]);
}

@Declare({ name: "status", description: "Show where a punishment stands on each server" })
@Options(options)
export default class SyncStatusCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const id = await readPunishmentId(ctx, ctx.options.id);
    if (!id) return;

    const res = await context.runtime.punishments.status(id);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await ctx.editOrReply({ embeds: [buildStatusEmbed(res.value)], flags: MessageFlags.Ephemeral });
  }
}

/**
 * `/sync punish`: apply a punishment here and ask the other servers to confirm it.
 */
import {
  Declare,
  Embed,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  createUserOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { MessageFlags } from "seyfert/lib/types";
import { PunishmentKindSchema } from "@/db/schemas/punishment";
import type { IssueReport } from "@/modules/sync";
import { KIND_LABEL } from "@/modules/sync/notifications/embeds";
import { format as formatMs, parse } from "@/utils/ms";
import { actorOf, describeError, replyEphemeral, requireOperator } from "./shared";

const options = {
  user: createUserOption({ description: "User to punish", required: true }),
  type: createStringOption({
    description: "Kind of punishment",
    required: true,
    choices: [
      { name: "Timeout", value: "timeout" },
      { name: "Ban", value: "ban" },
      { name: "Warn", value: "warn" },
    ],
  }),
  reason: createStringOption({ description: "Reason", required: true }),
  duration: createStringOption({
    description: "Timeout length (e.g. 30m, 2h, 7d)",
    required: false,
  }),
  warn_days: createIntegerOption({
    description: "Days the warned role is kept",
    required: false,
    min_value: 0,
  }),
  evidence: createStringOption({ description: "Link to evidence", required: false }),
};

export function buildIssueEmbed(report: IssueReport): Embed {
  const { punishment, source, proposal } = report;
  const lines = [
    `**Target:** <@${punishment.targetUserId}>`,
    `**Type:** ${KIND_LABEL[punishment.kind]}`,
    `**Reason:** ${punishment.reason}`,
  ];
  if (punishment.durationMs) lines.push(`**Duration:** ${formatMs(punishment.durationMs)}`);
  lines.push(
    source.phase === "applied"
      ? "✅ Applied in this server."
      : `❌ Could not apply here: ${source.error ?? "unknown error"}`,
  );

  const embed = new Embed()
    .setTitle(`Punishment \`${punishment.id}\``)
    .setDescription(lines.join("\n"))
    .setColor(source.phase === "applied" ? EmbedColors.Green : EmbedColors.Red);

  if (proposal) {
    const opened = proposal.opened.map((o) => `<t:${Math.floor(o.expiresAt.getTime() / 1000)}:R> ${o.serverId}`);
    const skipped = proposal.skipped.map((s) => `${s.serverId}: ${s.reason}`);
    embed.addFields([
      { name: "Awaiting confirmation", value: opened.join("\n").slice(0, 1024) || "None" },
      { name: "Skipped", value: skipped.join("\n").slice(0, 1024) || "None" },
    ]);
  }
  return embed;
}

@Declare({
  name: "punish",
  description: "Punish a user here and propose it to the other servers",
})
@Options(options)
export default class SyncPunishCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireOperator(ctx);
    if (!context) return;

    const kind = PunishmentKindSchema.safeParse(ctx.options.type);
    if (!kind.success) {
      await replyEphemeral(ctx, "❌ Unknown punishment type.");
      return;
    }

    let durationMs: number | null = null;
    if (kind.data === "timeout") {
      const raw = ctx.options.duration;
      durationMs = raw ? parse(raw) : null;
      if (durationMs === null) {
        await replyEphemeral(
          ctx,
          "❌ Timeouts need a valid duration.\nValid examples: `10m`, `1h`, `3d`, `1w`.",
        );
        return;
      }
    }

    await ctx.deferReply(true);
    const res = await context.runtime.punishments.issue(
      {
        kind: kind.data,
        targetUserId: ctx.options.user.id,
        sourceServerId: context.guildId,
        reason: ctx.options.reason,
        evidenceRef: ctx.options.evidence ?? null,
        durationMs,
        warnDays: ctx.options.warn_days ?? 0,
      },
      actorOf(ctx),
    );
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    await ctx.editOrReply({
      embeds: [buildIssueEmbed(res.value)],
      flags: MessageFlags.Ephemeral,
    });
  }
}

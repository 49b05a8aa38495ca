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
import { KIND_LABEL } from "@/modules/sync/notifications/embeds";
import { describeError, replyEphemeral, requireOperator } from "./shared";

const MAX_ENTRIES = 15;

const options = {
  user: createUserOption({ description: "User to look up", required: true }),
};

@Declare({ name: "history", description: "List the synced punishments of a user" })
@Options(options)
export default class SyncHistoryCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireOperator(ctx);
    if (!context) return;

    const user = ctx.options.user;
    const res = await context.runtime.punishments.history(user.id);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    const records = res.value;
    const lines = records.slice(0, MAX_ENTRIES).map((p) => {
      const when = `<t:${Math.floor(p.createdAt.getTime() / 1000)}:d>`;
      const mark = p.status === "revoked" ? "~~" : "";
      return `${when} ${mark}\`${p.id}\` ${KIND_LABEL[p.kind]}${mark}: ${p.reason}`;
    });
    if (records.length > MAX_ENTRIES) lines.push(`…and ${records.length - MAX_ENTRIES} more.`);

    const embed = new Embed()
      .setTitle(`Punishments of ${user.username}`)
      .setColor(EmbedColors.Blurple)
      .setDescription(lines.join("\n").slice(0, 4096) || "No punishments recorded.");
    await ctx.editOrReply({ embeds: [embed], flags: MessageFlags.Ephemeral });
  }
}

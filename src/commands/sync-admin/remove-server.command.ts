import { Declare, Options, SubCommand, type GuildCommandContext } from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";
import { serverOption, targetServer } from "./shared";

const options = {
  server: serverOption(),
};

@Declare({
  name: "remove-server",
  description: "Remove a server, its role mappings and its pending confirmations",
})
@Options(options)
export default class SyncRemoveServerCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;
    const serverId = await targetServer(ctx, ctx.options.server);
    if (!serverId) return;

    const res = await context.runtime.registry.removeServer(serverId);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    const { affectedLabels, droppedLabels, canceledConfirmations } = res.value;
    const lines = [`✅ Server \`${serverId}\` removed.`];
    if (affectedLabels.length) lines.push(`Unmapped labels: ${affectedLabels.join(", ")}`);
    if (droppedLabels.length) lines.push(`Deleted labels: ${droppedLabels.join(", ")}`);
    lines.push(`Canceled confirmations: ${canceledConfirmations.length}`);
    await replyEphemeral(ctx, lines.join("\n"));
  }
}

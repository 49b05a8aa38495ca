import {
  Declare,
  Options,
  SubCommand,
  createChannelOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";

const options = {
  kind: createStringOption({
    description: "Which channel to set",
    required: true,
    choices: [
      { name: "Confirmations", value: "confirm" },
      { name: "Announcements", value: "announce" },
    ],
  }),
  channel: createChannelOption({
    description: "Channel of this server (leave empty to clear)",
    required: false,
  }),
};

@Declare({
  name: "channel",
  description: "Set where this server receives confirmation prompts or announcements",
})
@Options(options)
export default class SyncChannelCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const { registry } = context.runtime;
    const channelId = ctx.options.channel ? String(ctx.options.channel.id) : null;
    const res =
      ctx.options.kind === "confirm"
        ? await registry.setConfirmChannel(context.guildId, channelId)
        : await registry.setAnnounceChannel(context.guildId, channelId);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    const what = ctx.options.kind === "confirm" ? "Confirmation" : "Announcement";
    await replyEphemeral(
      ctx,
      channelId ? `✅ ${what} channel set to <#${channelId}>.` : `✅ ${what} channel cleared.`,
    );
  }
}

import {
  Declare,
  Options,
  SubCommand,
  createBooleanOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";
import { serverOption, targetServer } from "./shared";

const options = {
  enabled: createBooleanOption({ description: "Take part in punishment sync", required: true }),
  server: serverOption(),
};

@Declare({
  name: "punishment-sync",
  description: "Let a server receive and send punishment proposals",
})
@Options(options)
export default class SyncPunishmentToggleCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;
    const serverId = await targetServer(ctx, ctx.options.server);
    if (!serverId) return;

    const res = await context.runtime.registry.toggleServerSync(serverId, ctx.options.enabled);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(
      ctx,
      `✅ Punishment sync ${res.value.punishmentSyncEnabled ? "enabled" : "disabled"} for \`${serverId}\`.`,
    );
  }
}

import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";
import { describeServer, serverOption, targetServer } from "./shared";

const options = {
  server: serverOption(),
  name: createStringOption({ description: "Display name", required: false }),
};

@Declare({ name: "add-server", description: "Register a server in the sync network" })
@Options(options)
export default class SyncAddServerCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;
    const serverId = await targetServer(ctx, ctx.options.server);
    if (!serverId) return;

    let name = ctx.options.name?.trim() ?? "";
    if (!name && serverId === context.guildId) {
      const guild = await ctx.guild().catch(() => null);
      name = guild?.name ?? "";
    }

    const res = await context.runtime.registry.addServer(serverId, name);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(
      ctx,
      `✅ Server registered. Punishment sync starts off; enable it with \`/sync-admin punishment-sync\`.\n${describeServer(res.value)}`,
    );
  }
}

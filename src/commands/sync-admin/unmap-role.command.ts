import {
  Declare,
  Options,
  SubCommand,
  createBooleanOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";
import { serverOption, targetServer } from "./shared";

const options = {
  label: createStringOption({ description: "Label to unmap", required: true }),
  everywhere: createBooleanOption({
    description: "Delete the label on every server",
    required: false,
  }),
  server: serverOption(),
};

@Declare({ name: "unmap-role", description: "Remove a label from a server or from all of them" })
@Options(options)
export default class SyncUnmapRoleCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const label = ctx.options.label.trim();
    let serverId: string | undefined;
    if (!ctx.options.everywhere) {
      const target = await targetServer(ctx, ctx.options.server);
      if (!target) return;
      serverId = target;
    }

    const res = await context.runtime.registry.removeRoleMapping(label, serverId);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(
      ctx,
      serverId ? `✅ \`${label}\` unmapped from \`${serverId}\`.` : `✅ \`${label}\` deleted.`,
    );
  }
}

import {
  Declare,
  Options,
  SubCommand,
  createRoleOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";

const options = {
  role: createRoleOption({ description: "Role given on warns (leave empty to clear)", required: false }),
};

@Declare({ name: "warned-role", description: "Set the role synced warns give in this server" })
@Options(options)
export default class SyncWarnedRoleCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const roleId = ctx.options.role?.id ?? null;
    const res = await context.runtime.registry.setWarnedRole(context.guildId, roleId);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(ctx, roleId ? `✅ Warned role set to <@&${roleId}>.` : "✅ Warned role cleared.");
  }
}

import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, parseRoleList, replyEphemeral, requireGuild } from "@/commands/sync/shared";

const options = {
  roles: createStringOption({
    description: "Role mentions or IDs, from any server (empty to clear)",
    required: false,
  }),
};

@Declare({ name: "operators", description: "Set the roles allowed to run sync operator commands" })
@Options(options)
export default class SyncOperatorsCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const res = await context.runtime.registry.setOperatorRoles(
      parseRoleList(ctx.options.roles ?? ""),
    );
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(
      ctx,
      res.value.length
        ? `✅ Operator roles: ${res.value.map((id) => `<@&${id}>`).join(", ")}`
        : "✅ Operator roles cleared; only administrators can operate.",
    );
  }
}

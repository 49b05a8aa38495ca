import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireOperator } from "./shared";

const options = {
  id: createStringOption({ description: "Punishment ID", required: true }),
};

@Declare({
  name: "reject",
  description: "Decline a punishment proposed to this server",
})
@Options(options)
export default class SyncRejectCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireOperator(ctx);
    if (!context) return;

    const res = await context.runtime.punishments.reject(
      ctx.options.id.trim(),
      context.guildId,
      ctx.author.id,
    );
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(ctx, "🚫 Punishment rejected for this server.");
  }
}

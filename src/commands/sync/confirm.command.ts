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
  name: "confirm",
  description: "Accept a punishment proposed to this server and apply it",
})
@Options(options)
export default class SyncConfirmCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireOperator(ctx);
    if (!context) return;

    await ctx.deferReply(true);
    const res = await context.runtime.punishments.confirm(
      ctx.options.id.trim(),
      context.guildId,
      ctx.author.id,
    );
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(
      ctx,
      res.value.phase === "applied"
        ? "✅ Confirmed and applied in this server."
        : `⚠️ Confirmed, but applying failed: ${res.value.error ?? "unknown error"}. Use \`/sync retry\`.`,
    );
  }
}

import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { normalizeSnowflake } from "@/utils/snowflake";
import { actorOf, describeError, readPunishmentId, replyEphemeral, requireGuild } from "./shared";

const options = {
  id: createStringOption({ description: "Punishment ID", required: true }),
  server: createStringOption({
    description: "Server ID where applying failed (defaults to this one)",
    required: false,
  }),
};

@Declare({
  name: "retry",
  description: "Try again to apply a punishment where it failed",
})
@Options(options)
export default class SyncRetryCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const id = await readPunishmentId(ctx, ctx.options.id);
    if (!id) return;
    const serverId = ctx.options.server ? normalizeSnowflake(ctx.options.server) : context.guildId;
    if (!serverId) {
      await replyEphemeral(ctx, "❌ `server` must be a server ID.");
      return;
    }

    await ctx.deferReply(true);
    const res = await context.runtime.punishments.retryApply(
      id,
      serverId,
      actorOf(ctx),
    );
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    const outcome = res.value;
    await replyEphemeral(
      ctx,
      outcome.phase === "applied"
        ? `✅ Applied on ${serverId}.`
        : `❌ Still failing on ${serverId}: ${outcome.error ?? "unknown error"}`,
    );
  }
}

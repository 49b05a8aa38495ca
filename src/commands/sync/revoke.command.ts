import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { actorOf, describeError, readPunishmentId, replyEphemeral, requireGuild } from "./shared";

const options = {
  id: createStringOption({ description: "Punishment ID", required: true }),
  reason: createStringOption({ description: "Why it is lifted", required: false }),
};

// Issuer or operator; checked by the coordinator.
@Declare({
  name: "revoke",
  description: "Lift a punishment on every server where it was applied",
})
@Options(options)
export default class SyncRevokeCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const id = await readPunishmentId(ctx, ctx.options.id);
    if (!id) return;

    await ctx.deferReply(true);
    const res = await context.runtime.punishments.revoke(
      id,
      actorOf(ctx),
      ctx.options.reason,
    );
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    const { punishment, changed, servers, canceledConfirmations } = res.value;
    if (punishment.status === "revoked" && !changed && !servers.length) {
      await replyEphemeral(ctx, `ℹ️ Punishment \`${punishment.id}\` was already revoked.`);
      return;
    }

    const lines = servers.map((s) =>
      s.phase === "revoked" ? `✅ ${s.serverId}` : `❌ ${s.serverId}: ${s.error ?? "failed"}`,
    );
    if (canceledConfirmations.length) {
      lines.push(`Closed ${canceledConfirmations.length} pending confirmation(s).`);
    }
    const header =
      punishment.status === "revoked"
        ? `✅ Punishment \`${punishment.id}\` revoked.`
        : `⚠️ Punishment \`${punishment.id}\` is still active on some servers. Run the command again to retry.`;
    await replyEphemeral(ctx, [header, ...lines].join("\n"));
  }
}

import {
  Declare,
  Options,
  SubCommand,
  createBooleanOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";

const options = {
  roles: createBooleanOption({ description: "Global role sync", required: false }),
  punishments: createBooleanOption({ description: "Global punishment sync", required: false }),
};

@Declare({ name: "switches", description: "Turn role or punishment sync on or off network-wide" })
@Options(options)
export default class SyncSwitchesCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;
    const { registry } = context.runtime;

    if (ctx.options.roles !== undefined) {
      const res = await registry.setRoleSyncEnabled(ctx.options.roles);
      if (res.isErr()) {
        await replyEphemeral(ctx, describeError(res.error));
        return;
      }
    }
    if (ctx.options.punishments !== undefined) {
      const res = await registry.setPunishmentSyncEnabled(ctx.options.punishments);
      if (res.isErr()) {
        await replyEphemeral(ctx, describeError(res.error));
        return;
      }
    }

    const state = (on: boolean) => (on ? "on" : "off");
    await replyEphemeral(
      ctx,
      `Role sync: **${state(registry.roleSyncEnabled)}** · Punishment sync: **${state(registry.punishmentSyncEnabled)}**`,
    );
  }
}

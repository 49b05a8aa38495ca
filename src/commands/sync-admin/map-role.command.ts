import {
  Declare,
  Options,
  SubCommand,
  createRoleOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { describeError, replyEphemeral, requireGuild } from "@/commands/sync/shared";
import { normalizeSnowflake } from "@/utils/snowflake";
import { targetServer } from "./shared";

const options = {
  label: createStringOption({ description: "Shared label, e.g. Staff", required: true }),
  role: createRoleOption({ description: "Role of this server for the label", required: false }),
  server: createStringOption({ description: "Other server ID", required: false }),
  role_id: createStringOption({ description: "Role ID in that server", required: false }),
};

@Declare({ name: "map-role", description: "Map a role to a shared label" })
@Options(options)
export default class SyncMapRoleCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireGuild(ctx);
    if (!context) return;

    const serverId = await targetServer(ctx, ctx.options.server);
    if (!serverId) return;
    const remote = serverId !== context.guildId;
    const roleId = remote ? normalizeSnowflake(ctx.options.role_id) : ctx.options.role?.id;
    if (!roleId) {
      await replyEphemeral(
        ctx,
        remote
          ? "❌ Give a valid `role_id` when mapping a role of another server."
          : "❌ Pick the `role` to map.",
      );
      return;
    }

    const res = await context.runtime.registry.addRoleMapping(ctx.options.label, serverId, roleId);
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }
    await replyEphemeral(ctx, `✅ \`${res.value}\` → <@&${roleId}> in \`${serverId}\`.`);
  }
}

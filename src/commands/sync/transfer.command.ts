/**
 * `/sync transfer`: give every holder of one label another label across the network,
 * optionally removing the old one.
 */
import {
  Declare,
  Embed,
  Options,
  SubCommand,
  createBooleanOption,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { MessageFlags } from "seyfert/lib/types";
import { describeError, replyEphemeral, requireOperator } from "./shared";

const PAGE_SIZE = 1000;
const MAX_PAGES = 50;

const options = {
  from: createStringOption({ description: "Label members currently hold", required: true }),
  to: createStringOption({ description: "Label to give them", required: true }),
  remove_old: createBooleanOption({
    description: "Remove the old label once the new one is in place",
    required: false,
  }),
  limit: createIntegerOption({
    description: "Maximum members to move (0 = all)",
    required: false,
    min_value: 0,
  }),
};

@Declare({
  name: "transfer",
  description: "Move members from one role label to another on every server",
})
@Options(options)
export default class SyncTransferCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const context = await requireOperator(ctx);
    if (!context) return;
    const { runtime, guildId } = context;

    const from = ctx.options.from.trim();
    const to = ctx.options.to.trim();
    const fromRole = runtime.registry.roleFor(from, guildId);
    if (!fromRole) {
      await replyEphemeral(ctx, `❌ Label \`${from}\` has no role in this server.`);
      return;
    }

    await ctx.deferReply(true);
    const limit = ctx.options.limit ?? 0;
    const holders: string[] = [];
    let after: string | undefined;
    for (let page = 0; page < MAX_PAGES; page++) {
      const members = await ctx.client.members.list(guildId, { limit: PAGE_SIZE, after }, true);
      for (const member of members) {
        if (member.roles.keys.includes(fromRole)) holders.push(member.id);
      }
      if (members.length < PAGE_SIZE) break;
      after = members[members.length - 1]?.id;
      if (!after) break;
    }
    const selected = limit > 0 ? holders.slice(0, limit) : holders;

    const res = await runtime.roles.transferLabel(selected, from, to, {
      removeOld: ctx.options.remove_old ?? false,
    });
    if (res.isErr()) {
      await replyEphemeral(ctx, describeError(res.error));
      return;
    }

    const fields = Object.entries(res.value.servers).map(([serverId, perUser]) => {
      let moved = 0;
      let failed = 0;
      for (const outcomes of Object.values(perUser)) {
        if (outcomes.every((o) => o.status === "applied")) moved++;
        else failed++;
      }
      return { name: `Server ${serverId}`, value: `Moved: ${moved} · Not moved: ${failed}` };
    });

    await ctx.editOrReply({
      flags: MessageFlags.Ephemeral,
      embeds: [
        new Embed()
          .setTitle(`Transfer ${from} → ${to}`)
          .setDescription(`${selected.length} member(s) selected.`)
          .setColor(EmbedColors.Blurple)
          .addFields(fields.slice(0, 25)),
      ],
    });
  }
}

/**
 * Confirm / reject buttons on cross-server punishment prompts.
 *
 * Custom id: `syncp:<confirm|reject>:<token>`. Only administrators or sync operators of
 * the server the prompt was sent to may answer it.
 */
import { ComponentCommand, Embed, type ComponentContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { describeError } from "@/commands/sync/shared";
import type { ConfirmationOutcome } from "@/modules/sync";
import { CONFIRM_PREFIX, buildConfirmationButtons } from "@/modules/sync/notifications/embeds";

const OUTCOMES: Record<string, ConfirmationOutcome> = {
  confirm: "confirmed",
  reject: "rejected",
};

export default class SyncPunishmentButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    return ctx.customId.startsWith(CONFIRM_PREFIX);
  }

  async run(ctx: ComponentContext<"Button">) {
    if (!ctx.guildId) return;

    const [, action, token] = ctx.customId.split(":");
    const outcome = action ? OUTCOMES[action] : undefined;
    if (!outcome || !token) {
      await ctx.write({ content: "This action is no longer valid.", flags: MessageFlags.Ephemeral });
      return;
    }

    const punishments = ctx.client.sync.punishments;
    const ticket = await punishments.ticket(token);
    if (ticket.isErr()) {
      await ctx.write({ content: describeError(ticket.error), flags: MessageFlags.Ephemeral });
      return;
    }
    if (!ticket.value || ticket.value.subject.serverId !== ctx.guildId) {
      await ctx.write({
        content: "This request does not belong to this server.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    const roleIds = [...(ctx.member?.roles.keys ?? [])];
    const allowed =
      ctx.member?.permissions?.has?.(["Administrator"]) === true ||
      ctx.client.sync.registry.isOperator(roleIds);
    if (!allowed) {
      await ctx.write({
        content: "You need Administrator permission or a sync operator role.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    await ctx.deferUpdate();
    const res = await punishments.respond(token, outcome, ctx.author.id);
    if (res.isErr()) {
      await ctx.followup({ content: describeError(res.error), flags: MessageFlags.Ephemeral });
      if (res.error.code === "INVALID_STATE") await disableButtons(ctx, token, "Already resolved");
      return;
    }

    const result = res.value;
    const status =
      "phase" in result
        ? result.phase === "applied"
          ? `Confirmed by ${ctx.author.username} and applied`
          : `Confirmed by ${ctx.author.username}; applying failed (${result.error ?? "unknown error"})`
        : `Rejected by ${ctx.author.username}`;

    ctx.client.logger?.info?.("[sync:punishments] prompt answered", {
      token,
      outcome,
      guildId: ctx.guildId,
      actorId: ctx.author.id,
    });
    await disableButtons(ctx, token, status);
  }
}

async function disableButtons(ctx: ComponentContext<"Button">, token: string, status: string) {
  try {
    const resp = await ctx.fetchResponse();
    const embed = new Embed(resp.embeds?.[0]);
    embed.setFooter({ text: status });
    await ctx.editResponse({
      embeds: [embed],
      components: [buildConfirmationButtons(token, true)],
    });
  } catch (error) {
    ctx.client.logger?.warn?.("[sync:punishments] failed to update prompt", { error, token });
  }
}

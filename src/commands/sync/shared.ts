/**
 * Helpers shared by the `/sync` and `/sync-admin` commands: caller identity,
 * permission checks and rendering of engine errors.
 */
import type { GuildCommandContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import type { SyncActor, SyncError, SyncRuntime } from "@/modules/sync";
import { isValidPunishmentId } from "@/utils/punishmentId";

export const GUILD_ONLY_MESSAGE = "This command can only be used inside a server.";

const ERROR_MESSAGES: Record<SyncError["code"], string> = {
  CONFIG_INVALID: "The sync configuration is invalid.",
  VALIDATION_FAILED: "Invalid input.",
  UNKNOWN_SERVER: "That server is not part of the sync network.",
  DUPLICATE_SERVER: "This server is already registered.",
  DUPLICATE_PUNISHMENT: "A punishment with that ID already exists.",
  INVALID_STATE: "That request was already resolved.",
  PERMISSION_DENIED: "You are not allowed to do that.",
  EFFECTOR_FAILURE: "The remote action failed.",
  PERSISTENCE_FAILURE: "Could not save the change. Try again later.",
  NOT_FOUND: "Nothing found with that ID.",
};

export function describeError(error: SyncError): string {
  return `❌ ${ERROR_MESSAGES[error.code]}\n-# ${error.message}`;
}

export function actorOf(ctx: GuildCommandContext): SyncActor {
  return { userId: ctx.author.id, roleIds: [...(ctx.member?.roles.keys ?? [])] };
}

/** Administrators always pass; everyone else needs one of the configured operator roles. */
export function isSyncOperator(ctx: GuildCommandContext, runtime: SyncRuntime): boolean {
  if (ctx.member?.permissions?.has?.(["Administrator"]) === true) return true;
  return runtime.registry.isOperator(actorOf(ctx).roleIds);
}

/**
 * Returns the runtime and guild id when the caller may run an operator command,
 * replying with the reason otherwise.
 */
export async function requireOperator(
  ctx: GuildCommandContext,
): Promise<{ runtime: SyncRuntime; guildId: string } | null> {
  if (!ctx.guildId) {
    await ctx.write({ content: GUILD_ONLY_MESSAGE, flags: MessageFlags.Ephemeral });
    return null;
  }
  const runtime = ctx.client.sync;
  if (!isSyncOperator(ctx, runtime)) {
    await ctx.write({
      content: "❌ Only administrators or sync operators can use this command.",
      flags: MessageFlags.Ephemeral,
    });
    return null;
  }
  return { runtime, guildId: ctx.guildId };
}

export async function requireGuild(
  ctx: GuildCommandContext,
): Promise<{ runtime: SyncRuntime; guildId: string } | null> {
  if (!ctx.guildId) {
    await ctx.write({ content: GUILD_ONLY_MESSAGE, flags: MessageFlags.Ephemeral });
    return null;
  }
  return { runtime: ctx.client.sync, guildId: ctx.guildId };
}

export function replyEphemeral(ctx: GuildCommandContext, content: string) {
  return ctx.editOrReply({ content, flags: MessageFlags.Ephemeral });
}

/** `<@&1>, <@&2>` or `123 456` → role ids. */
export function parseRoleList(input: string): string[] {
  return [...input.matchAll(/\d{17,20}/g)].map((m) => m[0]);
}

/** Lowercased id, or `null` after telling the caller the id is malformed. */
export async function readPunishmentId(
  ctx: GuildCommandContext,
  raw: string,
): Promise<string | null> {
  const id = raw.trim().toLowerCase();
  if (isValidPunishmentId(id)) return id;
  await replyEphemeral(ctx, `❌ \`${raw.trim()}\` is not a punishment ID.`);
  return null;
}

/**
 * Bot entry point: loads the environment, builds the sync runtime on top of the Seyfert
 * client, restores pending confirmations and uploads commands.
 */
import "module-alias/register";
import "dotenv/config";

import type { ClientOptions, ComponentContext, ParseClient } from "seyfert";
import { Client } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { loadSettings } from "@/configuration";
import { disconnectDb } from "@/db/mongo";
import { createSeyfertSyncRuntime, type SyncRuntime } from "@/modules/sync";

const FAILURE_REPLY = {
  content: "❌ Something went wrong. The error was logged.",
  flags: MessageFlags.Ephemeral,
} as const;

// Called for slash and context-menu commands alike.
type CommandRunErrorHandler = NonNullable<
  NonNullable<NonNullable<ClientOptions["commands"]>["defaults"]>["onRunError"]
>;

// Last line of defence: a handler that throws gets logged and a generic reply.
const onCommandError: CommandRunErrorHandler = async (ctx, error) => {
  ctx.client.logger.error("[commands] handler failed", { command: ctx.command.name, error });
  await ctx.editOrReply(FAILURE_REPLY).catch((replyError: unknown) => {
    ctx.client.logger.warn("[commands] could not report failure", { error: replyError });
  });
};

async function onComponentError(ctx: ComponentContext, error: unknown) {
  ctx.client.logger.error("[components] handler failed", { customId: ctx.customId, error });
  await ctx.followup(FAILURE_REPLY).catch((replyError: unknown) => {
    ctx.client.logger.warn("[components] could not report failure", { error: replyError });
  });
}

const client = new Client<true>({
  commands: { defaults: { onRunError: onCommandError } },
  components: { defaults: { onRunError: onComponentError } },
});

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  const settings = loadSettings();

  const runtime = await createSeyfertSyncRuntime(client, settings);
  if (runtime.isErr()) throw runtime.error;
  client.sync = runtime.value;

  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });

  const resumed = await client.sync.start();
  if (resumed.isOk()) {
    client.logger.info("[bootstrap] sync confirmations restored", resumed.value);
  }
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[bootstrap] ${signal} received, shutting down`);
  client.sync?.stop();
  await disconnectDb();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[bootstrap] shutdown failed:", error);
      process.exit(1);
    });
  });
}

bootstrap().catch((error: unknown) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exit(1);
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {
    sync: SyncRuntime;
  }
  interface Client<Ready extends boolean = boolean> {
    sync: SyncRuntime;
  }
}

/**
 * Mirrors labelled role changes made by hand (or by other bots) to the rest of the network.
 */
import { createEvent } from "seyfert";
import { loadSettings } from "@/configuration";

export default createEvent({
  data: { name: "guildMemberUpdate" },
  async run(update, client) {
    // Without the cached previous state there is nothing to diff against.
    const [current, previous] = update;
    if (!previous || current.user.bot) return;
    if (!loadSettings().mirrorMemberUpdates) return;
    if (!client.sync.registry.getServer(current.guildId)) return;

    const report = await client.sync.roles.mirrorMemberUpdate(
      current.guildId,
      current.id,
      [...previous.roles.keys],
      [...current.roles.keys],
    );
    const removed = Object.keys(report.removed);
    if (report.granted || removed.length) {
      client.logger.info("[sync:roles] mirrored member update", {
        guildId: current.guildId,
        userId: current.id,
        removed,
      });
    }
  },
});

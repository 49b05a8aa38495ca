/**
 * NotificationSink that writes to the channels configured per server.
 *
 * A server without the relevant channel is skipped with a debug log. Errors propagate
 * to the caller, which logs them; nothing here retries.
 */
import type { UsingClient } from "seyfert";
import {
  buildConfirmationButtons,
  buildConfirmationEmbed,
  buildFailureEmbed,
  buildOutcomeEmbed,
} from "./embeds";
import type {
  ConfirmationRequest,
  FailureReport,
  NotificationSink,
  OutcomeAnnouncement,
} from "./types";

export class SeyfertNotificationSink implements NotificationSink {
  constructor(private readonly client: UsingClient) {}

  async requestConfirmation({
    ticket,
    punishment,
    target,
    sourceName,
  }: ConfirmationRequest): Promise<void> {
    const channelId = target.confirmChannelRef;
    if (!channelId) {
      this.client.logger?.warn?.("[sync:notify] no confirm channel; request stays pending", {
        serverId: target.serverId,
        token: ticket.token,
      });
      return;
    }

    await this.client.messages.write(channelId, {
      content: `Punishment confirmation for <@${punishment.targetUserId}>`,
      embeds: [buildConfirmationEmbed(punishment, sourceName, ticket.expiresAt)],
      components: [buildConfirmationButtons(ticket.token)],
      allowed_mentions: { parse: [] },
    });
  }

  async announceOutcome({ punishment, server, outcome, actorId }: OutcomeAnnouncement): Promise<void> {
    const channelId = server.announceChannelRef;
    if (!channelId) {
      this.client.logger?.debug?.("[sync:notify] no announce channel", {
        serverId: server.serverId,
        outcome,
      });
      return;
    }

    await this.client.messages.write(channelId, {
      embeds: [buildOutcomeEmbed(punishment, outcome, actorId)],
      allowed_mentions: { parse: [] },
    });
  }

  async reportFailure({ punishment, server, action, error }: FailureReport): Promise<void> {
    const channelId = server.confirmChannelRef ?? server.announceChannelRef;
    if (!channelId) {
      this.client.logger?.warn?.("[sync:notify] failure with nowhere to report it", {
        serverId: server.serverId,
        punishmentId: punishment.id,
        action,
        error,
      });
      return;
    }

    await this.client.messages.write(channelId, {
      embeds: [buildFailureEmbed(punishment, action, error)],
      allowed_mentions: { parse: [] },
    });
  }
}

/**
 * Embeds and buttons for sync prompts and announcements. Pure builders, no I/O.
 */
import { ActionRow, Button, Embed } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { ButtonStyle } from "seyfert/lib/types";
import type { ConfirmationToken } from "@/db/types";
import { format as formatMs } from "@/utils/ms";
import { SYSTEM_ACTOR_ID, type PunishmentKind, type PunishmentRecord } from "../types";
import type { AnnouncedOutcome } from "./types";

export const CONFIRM_PREFIX = "syncp:";

export const KIND_LABEL: Record<PunishmentKind, string> = {
  timeout: "Timeout",
  ban: "Ban",
  warn: "Warning",
};

export const OUTCOME_LABEL: Record<AnnouncedOutcome, string> = {
  applied: "Applied",
  rejected: "Rejected",
  expired: "Expired, not applied",
  canceled: "Canceled",
  revoked: "Revoked",
};

const OUTCOME_COLOR: Record<AnnouncedOutcome, number> = {
  applied: EmbedColors.Red,
  rejected: EmbedColors.Grey,
  expired: EmbedColors.DarkGrey,
  canceled: EmbedColors.DarkGrey,
  revoked: EmbedColors.Green,
};

const timestamp = (date: Date, style: "R" | "f" = "f") =>
  `<t:${Math.floor(date.getTime() / 1000)}:${style}>`;

function punishmentFields(punishment: PunishmentRecord) {
  const fields: Array<{ name: string; value: string; inline?: boolean }> = [
    { name: "User", value: `<@${punishment.targetUserId}>`, inline: true },
    { name: "Type", value: KIND_LABEL[punishment.kind], inline: true },
    { name: "Issued by", value: `<@${punishment.issuedBy}>`, inline: true },
    { name: "Reason", value: punishment.reason.slice(0, 1024), inline: false },
  ];

  if (punishment.kind === "timeout" && punishment.durationMs) {
    fields.push({ name: "Duration", value: formatMs(punishment.durationMs), inline: true });
  }
  if (punishment.kind === "warn" && punishment.warnDays > 0) {
    fields.push({ name: "Warning valid for", value: `${punishment.warnDays} days`, inline: true });
  }
  if (punishment.expiry) {
    fields.push({ name: "Ends", value: timestamp(punishment.expiry, "R"), inline: true });
  }
  return fields;
}

export function buildConfirmationEmbed(
  punishment: PunishmentRecord,
  sourceName: string | null,
  expiresAt: Date,
): Embed {
  const embed = new Embed()
    .setTitle(`Cross-server ${KIND_LABEL[punishment.kind].toLowerCase()} request`)
    .setDescription(
      `Issued in **${sourceName ?? punishment.sourceServerId}**. Confirm to apply it here.\n` +
        `The request expires ${timestamp(expiresAt, "R")}.`,
    )
    .setColor(EmbedColors.Yellow)
    .addFields(punishmentFields(punishment))
    .setFooter({ text: `Punishment ID: ${punishment.id}` })
    .setTimestamp();

  if (punishment.evidenceRef) embed.setImage(punishment.evidenceRef);
  return embed;
}

export function buildConfirmationButtons(
  token: ConfirmationToken,
  disabled = false,
): ActionRow<Button> {
  const confirm = new Button()
    .setCustomId(`${CONFIRM_PREFIX}confirm:${token}`)
    .setLabel("Confirm")
    .setStyle(ButtonStyle.Danger)
    .setDisabled(disabled);

  const reject = new Button()
    .setCustomId(`${CONFIRM_PREFIX}reject:${token}`)
    .setLabel("Reject")
    .setStyle(ButtonStyle.Secondary)
    .setDisabled(disabled);

  return new ActionRow<Button>().addComponents(confirm, reject);
}

export function buildOutcomeEmbed(
  punishment: PunishmentRecord,
  outcome: AnnouncedOutcome,
  actorId: string,
): Embed {
  return new Embed()
    .setTitle(`${KIND_LABEL[punishment.kind]} · ${OUTCOME_LABEL[outcome]}`)
    .setColor(OUTCOME_COLOR[outcome])
    .addFields([
      ...punishmentFields(punishment),
      {
        name: "By",
        value: actorId === SYSTEM_ACTOR_ID ? "Automatic" : `<@${actorId}>`,
        inline: true,
      },
    ])
    .setFooter({ text: `Punishment ID: ${punishment.id}` })
    .setTimestamp();
}

export function buildFailureEmbed(
  punishment: PunishmentRecord,
  action: "apply" | "revoke",
  error: string,
): Embed {
  return new Embed()
    .setTitle(action === "apply" ? "Punishment could not be applied" : "Punishment could not be revoked")
    .setDescription(
      `\`${error.slice(0, 1000)}\`\n` +
        (action === "apply"
          ? `Nothing is retried automatically. Use \`/sync retry\` with ID \`${punishment.id}\`.`
          : `Run \`/sync revoke\` again with ID \`${punishment.id}\` to retry.`),
    )
    .setColor(EmbedColors.Orange)
    .addFields(punishmentFields(punishment))
    .setTimestamp();
}

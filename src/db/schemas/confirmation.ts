/**
 * Zod schema for confirmation tickets (`sync_confirmations`).
 * Purpose: persisted state and deadline of one accept/reject gate, so expiry survives restarts.
 */
import { z } from "zod";

export const ConfirmationStateSchema = z.enum([
  "pending",
  "confirmed",
  "rejected",
  "expired",
  "canceled",
]);

/** Subject of a punishment confirmation: which record, on which server. */
export const PunishmentSubjectSchema = z.object({
  punishmentId: z.string(),
  serverId: z.string(),
});

export const ConfirmationDocumentSchema = z.object({
  _id: z.string(),
  key: z.string(),
  subject: PunishmentSubjectSchema,
  state: ConfirmationStateSchema,
  requestedAt: z.date(),
  expiresAt: z.date(),
  respondedBy: z.string().nullable().default(null),
  respondedAt: z.date().nullable().default(null),
});

export type ConfirmationState = z.infer<typeof ConfirmationStateSchema>;
export type PunishmentSubject = z.infer<typeof PunishmentSubjectSchema>;
export type ConfirmationDocument = z.infer<typeof ConfirmationDocumentSchema>;

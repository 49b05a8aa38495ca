/**
 * Zod schema for punishment records (`sync_punishments`).
 * Purpose: the ledger entry of a punishment plus its append-only resolution history.
 */
import { z } from "zod";

export const PunishmentKindSchema = z.enum(["timeout", "ban", "warn"]);
export const PunishmentStatusSchema = z.enum(["active", "revoked"]);

export const ResolutionEventTypeSchema = z.enum([
  "proposed",
  "confirmed",
  "rejected",
  "expired",
  "canceled",
  "applied",
  "apply_failed",
  "revoked",
  "revoke_failed",
]);

export const ResolutionEventSchema = z.object({
  type: ResolutionEventTypeSchema,
  /** Server the event happened on. */
  serverId: z.string(),
  actorId: z.string(),
  at: z.date(),
  detail: z.string().nullable().default(null),
});

export const PunishmentDocumentSchema = z.object({
  _id: z.string(),
  kind: PunishmentKindSchema,
  targetUserId: z.string(),
  sourceServerId: z.string(),
  issuedBy: z.string(),
  reason: z.string(),
  evidenceRef: z.string().nullable().default(null),
  expiry: z.date().nullable().default(null),
  durationMs: z.number().int().positive().nullable().default(null),
  warnDays: z.number().int().min(0).default(0),
  status: PunishmentStatusSchema,
  createdAt: z.date(),
  history: z.array(ResolutionEventSchema).default([]),
});

export type PunishmentKind = z.infer<typeof PunishmentKindSchema>;
export type PunishmentStatus = z.infer<typeof PunishmentStatusSchema>;
export type ResolutionEventType = z.infer<typeof ResolutionEventTypeSchema>;
export type ResolutionEvent = z.infer<typeof ResolutionEventSchema>;
export type PunishmentDocument = z.infer<typeof PunishmentDocumentSchema>;

/**
 * Rendering side of the engine. The core calls these fire-and-forget: delivery
 * failures are logged and never change a punishment's state.
 */
import type { PunishmentRecord, PendingConfirmation, ServerEntry } from "../types";

export interface ConfirmationRequest {
  ticket: PendingConfirmation;
  punishment: PunishmentRecord;
  target: ServerEntry;
  /** Display name of the issuing server, when still registered. */
  sourceName: string | null;
}

export type AnnouncedOutcome = "applied" | "rejected" | "expired" | "canceled" | "revoked";

export interface OutcomeAnnouncement {
  punishment: PunishmentRecord;
  server: ServerEntry;
  outcome: AnnouncedOutcome;
  actorId: string;
  /** Set when the outcome closes a confirmation prompt. */
  ticket: PendingConfirmation | null;
}

export interface FailureReport {
  punishment: PunishmentRecord;
  server: ServerEntry;
  action: "apply" | "revoke";
  error: string;
}

export interface NotificationSink {
  requestConfirmation(request: ConfirmationRequest): Promise<void>;
  announceOutcome(announcement: OutcomeAnnouncement): Promise<void>;
  reportFailure(report: FailureReport): Promise<void>;
}

// Typed aliases for frequently-used identifiers to make intent explicit.
export type ServerId = string;
export type UserId = string;
export type RoleId = string;
export type ChannelId = string;
export type PunishmentId = string;
export type ConfirmationToken = string;

/**
 * Zod schema for the federation configuration document (`sync_config`).
 * Purpose: shape and defaults of the single document holding every server and role mapping.
 */
import { z } from "zod";

export const SYNC_CONFIG_ID = "global";

export const ServerEntrySchema = z.object({
  serverId: z.string().min(1),
  name: z.string().default(""),
  punishmentSyncEnabled: z.boolean().default(false),
  announceChannelRef: z.string().nullable().default(null),
  confirmChannelRef: z.string().nullable().default(null),
  warnedRoleId: z.string().nullable().default(null),
});

export const RoleMappingSchema = z.object({
  label: z.string(),
  perServerRoleId: z.record(z.string(), z.string()).default({}),
});

export const SyncConfigSchema = z.object({
  roleSyncEnabled: z.boolean().default(true),
  punishmentSyncEnabled: z.boolean().default(true),
  operatorRoleIds: z.array(z.string()).default([]),
  servers: z.array(ServerEntrySchema).default([]),
  roleMappings: z.array(RoleMappingSchema).default([]),
});

export type StoredServerEntry = z.infer<typeof ServerEntrySchema>;
export type RoleMapping = z.infer<typeof RoleMappingSchema>;
export type SyncConfig = z.infer<typeof SyncConfigSchema>;

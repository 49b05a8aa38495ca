/**
 * SyncRegistry: participating servers, role-label mappings and global switches.
 *
 * Invariants:
 * - Labels are unique and every mapping key references a registered server.
 * - Every mutation is applied to a copy and persisted whole; the in-memory config only
 *   changes after the write succeeded.
 * - Mutations are serialized, so two concurrent commands never overwrite each other.
 */
import { SyncConfigSchema, type SyncConfig } from "@/db/schemas/sync-config";
import type { SyncConfigSource } from "@/db/repositories/sync/config";
import type { ChannelId, ConfirmationToken, RoleId, ServerId } from "@/db/types";
import { KeyedMutex } from "@/utils/keyedMutex";
import { silentLogger, type SyncLogger } from "@/utils/logger";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  ConfigError,
  DuplicateServerError,
  ValidationError,
  asPersistenceError,
  type SyncError,
} from "../errors";
import type { ServerEntry } from "../types";

/** Returns the tokens of the confirmations it canceled. */
export type ServerRemovedHook = (
  serverId: ServerId,
) => Promise<Result<ConfirmationToken[], SyncError>>;

export interface RemoveServerReport {
  serverId: ServerId;
  /** Labels that lost their entry for the server. */
  affectedLabels: string[];
  /** Labels dropped because no server was left in them. */
  droppedLabels: string[];
  canceledConfirmations: ConfirmationToken[];
}

type MappingRemoval = Pick<RemoveServerReport, "affectedLabels" | "droppedLabels">;

/** Validates a stored configuration. `null` (nothing stored yet) yields the defaults. */
export function parseSyncConfig(raw: unknown): Result<SyncConfig, ConfigError> {
  const parsed = SyncConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return ErrResult(
      new ConfigError(
        "Malformed sync configuration",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      ),
    );
  }

  const config = parsed.data;
  const issues: string[] = [];
  const serverIds = new Set<string>();
  for (const server of config.servers) {
    if (serverIds.has(server.serverId)) issues.push(`duplicate server ${server.serverId}`);
    serverIds.add(server.serverId);
  }

  const labels = new Set<string>();
  for (const mapping of config.roleMappings) {
    if (!mapping.label.trim()) issues.push("empty role mapping label");
    if (labels.has(mapping.label)) issues.push(`duplicate label "${mapping.label}"`);
    labels.add(mapping.label);
    for (const serverId of Object.keys(mapping.perServerRoleId)) {
      if (!serverIds.has(serverId)) {
        issues.push(`label "${mapping.label}" references unknown server ${serverId}`);
      }
    }
  }

  if (issues.length) {
    return ErrResult(new ConfigError("Invalid sync configuration", issues));
  }
  return OkResult(config);
}

export class SyncRegistry {
  private readonly lock = new KeyedMutex();
  private readonly removalHooks: ServerRemovedHook[] = [];

  private constructor(
    private readonly source: SyncConfigSource,
    private config: SyncConfig,
    private readonly logger: SyncLogger,
  ) {}

  static async load(
    source: SyncConfigSource,
    logger: SyncLogger = silentLogger,
  ): Promise<Result<SyncRegistry, SyncError>> {
    const raw = await source.read();
    if (raw.isErr()) {
      return ErrResult(asPersistenceError(raw.error, "Failed to read sync config"));
    }
    const config = parseSyncConfig(raw.value);
    if (config.isErr()) return ErrResult(config.error);
    return OkResult(new SyncRegistry(source, config.value, logger));
  }

  /** Deep copy of the current configuration. */
  get snapshot(): SyncConfig {
    return structuredClone(this.config);
  }

  get roleSyncEnabled(): boolean {
    return this.config.roleSyncEnabled;
  }

  get punishmentSyncEnabled(): boolean {
    return this.config.punishmentSyncEnabled;
  }

  onServerRemoved(hook: ServerRemovedHook): void {
    this.removalHooks.push(hook);
  }

  getServer(serverId: ServerId): ServerEntry | null {
    const stored = this.config.servers.find((s) => s.serverId === serverId);
    if (!stored) return null;
    return {
      ...stored,
      roleMappingRefs: this.config.roleMappings
        .filter((m) => serverId in m.perServerRoleId)
        .map((m) => m.label)
        .sort(),
    };
  }

  listServers(): ServerEntry[] {
    return this.config.servers.flatMap((s) => {
      const entry = this.getServer(s.serverId);
      return entry ? [entry] : [];
    });
  }

  async addServer(serverId: ServerId, name: string): Promise<Result<ServerEntry, SyncError>> {
    const id = serverId.trim();
    if (!id) return ErrResult(new ValidationError("Server id must not be empty"));

    const res = await this.commit<undefined>((draft) => {
      if (draft.servers.some((s) => s.serverId === id)) {
        return ErrResult(new DuplicateServerError(id));
      }
      draft.servers.push({
        serverId: id,
        name: name.trim(),
        punishmentSyncEnabled: false,
        announceChannelRef: null,
        confirmChannelRef: null,
        warnedRoleId: null,
      });
      return OkResult(undefined);
    });
    return res.isErr() ? ErrResult(res.error) : this.entryResult(id);
  }

  /**
   * Removes a server, every mapping entry pointing at it and its open confirmations.
   * Confirmations are canceled after the config write; a failing hook is logged and its
   * tickets are left to expire.
   */
  async removeServer(serverId: ServerId): Promise<Result<RemoveServerReport, SyncError>> {
    const res = await this.commit<MappingRemoval>((draft) => {
      const index = draft.servers.findIndex((s) => s.serverId === serverId);
      if (index === -1) {
        return ErrResult(new ValidationError(`Unknown server ${serverId}`, "UNKNOWN_SERVER"));
      }
      draft.servers.splice(index, 1);

      const affectedLabels: string[] = [];
      const droppedLabels: string[] = [];
      draft.roleMappings = draft.roleMappings.filter((mapping) => {
        if (!(serverId in mapping.perServerRoleId)) return true;
        delete mapping.perServerRoleId[serverId];
        affectedLabels.push(mapping.label);
        if (Object.keys(mapping.perServerRoleId).length === 0) {
          droppedLabels.push(mapping.label);
          return false;
        }
        return true;
      });
      return OkResult({ affectedLabels, droppedLabels });
    });
    if (res.isErr()) return ErrResult(res.error);

    const canceledConfirmations: ConfirmationToken[] = [];
    for (const hook of this.removalHooks) {
      const canceled = await hook(serverId);
      if (canceled.isErr()) {
        this.logger.error("[sync:registry] removal hook failed", {
          serverId,
          error: canceled.error,
        });
        continue;
      }
      canceledConfirmations.push(...canceled.value);
    }

    return OkResult({ serverId, ...res.value, canceledConfirmations });
  }

  /** Upserts the role of `label` in `serverId`. */
  async addRoleMapping(
    label: string,
    serverId: ServerId,
    roleId: RoleId,
  ): Promise<Result<string, SyncError>> {
    const name = label.trim();
    if (!name) return ErrResult(new ValidationError("Label must not be empty"));
    if (!roleId.trim()) return ErrResult(new ValidationError("Role id must not be empty"));

    return this.commit<string>((draft) => {
      if (!draft.servers.some((s) => s.serverId === serverId)) {
        return ErrResult(new ValidationError(`Unknown server ${serverId}`, "UNKNOWN_SERVER"));
      }
      const existing = draft.roleMappings.find((m) => m.label === name);
      if (existing) {
        existing.perServerRoleId[serverId] = roleId;
      } else {
        draft.roleMappings.push({ label: name, perServerRoleId: { [serverId]: roleId } });
      }
      return OkResult(name);
    });
  }

  /** Without `serverId` the whole label goes; otherwise only that server's entry. */
  async removeRoleMapping(label: string, serverId?: ServerId): Promise<Result<void, SyncError>> {
    return this.commit<void>((draft) => {
      const mapping = draft.roleMappings.find((m) => m.label === label);
      if (!mapping) return ErrResult(new ValidationError(`Unknown label "${label}"`));

      if (serverId !== undefined) {
        if (!(serverId in mapping.perServerRoleId)) {
          return ErrResult(new ValidationError(`Label "${label}" has no role in ${serverId}`));
        }
        delete mapping.perServerRoleId[serverId];
      }
      if (serverId === undefined || Object.keys(mapping.perServerRoleId).length === 0) {
        draft.roleMappings = draft.roleMappings.filter((m) => m !== mapping);
      }
      return OkResult(undefined);
    });
  }

  toggleServerSync(serverId: ServerId, enabled: boolean): Promise<Result<ServerEntry, SyncError>> {
    return this.updateServer(serverId, (server) => {
      server.punishmentSyncEnabled = enabled;
    });
  }

  setAnnounceChannel(
    serverId: ServerId,
    channelId: ChannelId | null,
  ): Promise<Result<ServerEntry, SyncError>> {
    return this.updateServer(serverId, (server) => {
      server.announceChannelRef = channelId;
    });
  }

  setConfirmChannel(
    serverId: ServerId,
    channelId: ChannelId | null,
  ): Promise<Result<ServerEntry, SyncError>> {
    return this.updateServer(serverId, (server) => {
      server.confirmChannelRef = channelId;
    });
  }

  setWarnedRole(serverId: ServerId, roleId: RoleId | null): Promise<Result<ServerEntry, SyncError>> {
    return this.updateServer(serverId, (server) => {
      server.warnedRoleId = roleId;
    });
  }

  setRoleSyncEnabled(enabled: boolean): Promise<Result<void, SyncError>> {
    return this.commit<void>((draft) => {
      draft.roleSyncEnabled = enabled;
      return OkResult(undefined);
    });
  }

  setPunishmentSyncEnabled(enabled: boolean): Promise<Result<void, SyncError>> {
    return this.commit<void>((draft) => {
      draft.punishmentSyncEnabled = enabled;
      return OkResult(undefined);
    });
  }

  setOperatorRoles(roleIds: RoleId[]): Promise<Result<RoleId[], SyncError>> {
    const unique = [...new Set(roleIds.map((id) => id.trim()).filter(Boolean))].sort();
    return this.commit<RoleId[]>((draft) => {
      draft.operatorRoleIds = unique;
      return OkResult(unique);
    });
  }

  isOperator(roleIds: Iterable<RoleId>): boolean {
    const operators = new Set(this.config.operatorRoleIds);
    for (const roleId of roleIds) {
      if (operators.has(roleId)) return true;
    }
    return false;
  }

  /**
   * Target roles for a member holding `memberLabels`, grouped by server:
   * `{ serverId: { label: roleId } }`. Never contains `sourceServerId`.
   */
  resolveRolesForMember(
    memberLabels: Iterable<string>,
    sourceServerId: ServerId,
  ): Record<ServerId, Record<string, RoleId>> {
    const wanted = new Set(memberLabels);
    const result: Record<ServerId, Record<string, RoleId>> = {};
    const mappings = this.config.roleMappings
      .filter((m) => wanted.has(m.label))
      .sort((a, b) => a.label.localeCompare(b.label));

    for (const mapping of mappings) {
      for (const serverId of Object.keys(mapping.perServerRoleId).sort()) {
        if (serverId === sourceServerId) continue;
        const roleId = mapping.perServerRoleId[serverId];
        if (roleId === undefined) continue;
        result[serverId] ??= {};
        result[serverId][mapping.label] = roleId;
      }
    }
    return result;
  }

  /** Labels carried by `roleIds` in `serverId`. */
  labelsForRoles(serverId: ServerId, roleIds: Iterable<RoleId>): string[] {
    const held = new Set(roleIds);
    return this.config.roleMappings
      .filter((m) => {
        const roleId = m.perServerRoleId[serverId];
        return roleId !== undefined && held.has(roleId);
      })
      .map((m) => m.label)
      .sort();
  }

  /** Role of `label` in `serverId`, if mapped. */
  roleFor(label: string, serverId: ServerId): RoleId | null {
    return this.config.roleMappings.find((m) => m.label === label)?.perServerRoleId[serverId] ?? null;
  }

  private async updateServer(
    serverId: ServerId,
    mutate: (server: SyncConfig["servers"][number]) => void,
  ): Promise<Result<ServerEntry, SyncError>> {
    const res = await this.commit<undefined>((draft) => {
      const server = draft.servers.find((s) => s.serverId === serverId);
      if (!server) {
        return ErrResult(new ValidationError(`Unknown server ${serverId}`, "UNKNOWN_SERVER"));
      }
      mutate(server);
      return OkResult(undefined);
    });
    return res.isErr() ? ErrResult(res.error) : this.entryResult(serverId);
  }

  private entryResult(serverId: ServerId): Result<ServerEntry, SyncError> {
    const entry = this.getServer(serverId);
    return entry
      ? OkResult(entry)
      : ErrResult(new ValidationError(`Unknown server ${serverId}`, "UNKNOWN_SERVER"));
  }

  private commit<T>(
    mutate: (draft: SyncConfig) => Result<T, SyncError>,
  ): Promise<Result<T, SyncError>> {
    return this.lock.run("config", async () => {
      const draft = structuredClone(this.config);
      const applied = mutate(draft);
      if (applied.isErr()) return applied;

      const written = await this.source.write(draft);
      if (written.isErr()) {
        this.logger.error("[sync:registry] failed to persist config", { error: written.error });
        return ErrResult(asPersistenceError(written.error, "Failed to persist sync config"));
      }
      this.config = draft;
      return applied;
    });
  }
}

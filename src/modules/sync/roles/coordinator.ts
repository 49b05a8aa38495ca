/**
 * RoleSyncCoordinator: mirrors labelled roles of a member into the other servers.
 *
 * Per target server the member's current roles are read first, so a role already held
 * (or already absent, for removals) costs no write. Targets run concurrently and fail
 * independently; nothing is rolled back.
 */
import type { RoleId, ServerId, UserId } from "@/db/types";
import { silentLogger, type SyncLogger } from "@/utils/logger";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { ValidationError, type SyncError } from "../errors";
import { callRemote, type RemoteCallPolicy } from "../effector/call";
import type { GuildEffector, GuildInspector, RoleHierarchy } from "../effector/types";
import type { SyncRegistry } from "../registry/service";
import type {
  RoleSyncDisabledReason,
  RoleSyncOutcome,
  RoleSyncReport,
  SyncMember,
} from "../types";
import { evaluateHierarchy, type HierarchyGuard } from "./hierarchy";

type Direction = "grant" | "revoke";

export interface TransferOptions {
  removeOld: boolean;
}

export interface TransferReport {
  fromLabel: string;
  toLabel: string;
  /** `{ serverId: { userId: outcomes } }` */
  servers: Record<ServerId, Record<UserId, RoleSyncOutcome[]>>;
}

/** Labels gained and lost by one member update in one server. */
export interface MemberUpdateReport {
  granted: RoleSyncReport | null;
  removed: Record<string, RoleSyncReport>;
}

export interface RoleSyncCoordinatorDeps {
  registry: SyncRegistry;
  effector: GuildEffector;
  inspector: GuildInspector;
  guard: HierarchyGuard;
  /** Policy for reads and role writes; role changes are safe to repeat. */
  policy: RemoteCallPolicy;
  logger?: SyncLogger;
}

const disabledReport = (reason: RoleSyncDisabledReason): RoleSyncReport => ({
  disabled: reason,
  targets: {},
});

export class RoleSyncCoordinator {
  private readonly logger: SyncLogger;

  constructor(private readonly deps: RoleSyncCoordinatorDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /** Grants, in every other server, the mapped roles of the labels `member` holds in the source. */
  async syncMemberRoles(member: SyncMember, sourceServerId: ServerId): Promise<RoleSyncReport> {
    const disabled = this.disabledReason(sourceServerId);
    if (disabled) return disabledReport(disabled);

    const { registry } = this.deps;
    const labels = registry.labelsForRoles(sourceServerId, member.roleIds);
    const targets = registry.resolveRolesForMember(labels, sourceServerId);

    const entries = await Promise.all(
      Object.entries(targets).map(
        async ([serverId, roles]) =>
          [serverId, await this.syncTarget(serverId, member.userId, roles, "grant")] as const,
      ),
    );
    const report: RoleSyncReport = { disabled: null, targets: Object.fromEntries(entries) };
    this.logReport("[sync:roles] member sync finished", member.userId, report);
    return report;
  }

  /** Mirrors the removal of `label` from `userId` in the source server. */
  async syncRoleRemoval(
    userId: UserId,
    sourceServerId: ServerId,
    label: string,
  ): Promise<RoleSyncReport> {
    const disabled = this.disabledReason(sourceServerId);
    if (disabled) return disabledReport(disabled);

    const targets = this.deps.registry.resolveRolesForMember([label], sourceServerId);
    const entries = await Promise.all(
      Object.entries(targets).map(
        async ([serverId, roles]) =>
          [serverId, await this.syncTarget(serverId, userId, roles, "revoke")] as const,
      ),
    );
    const report: RoleSyncReport = { disabled: null, targets: Object.fromEntries(entries) };
    this.logReport("[sync:roles] removal sync finished", userId, report);
    return report;
  }

  /**
   * Mirrors a member's role change seen in `serverId`. Only labelled roles count: gained
   * labels go through `syncMemberRoles`, lost ones through `syncRoleRemoval`. Writes this
   * causes elsewhere come back as updates that find nothing left to do.
   */
  async mirrorMemberUpdate(
    serverId: ServerId,
    userId: UserId,
    before: RoleId[],
    after: RoleId[],
  ): Promise<MemberUpdateReport> {
    const { registry } = this.deps;
    const previous = new Set(registry.labelsForRoles(serverId, before));
    const current = registry.labelsForRoles(serverId, after);
    const gained = current.filter((label) => !previous.has(label));
    const lost = [...previous].filter((label) => !current.includes(label));

    const granted = gained.length
      ? await this.syncMemberRoles({ userId, roleIds: after }, serverId)
      : null;
    const removed: Record<string, RoleSyncReport> = {};
    for (const label of lost) {
      removed[label] = await this.syncRoleRemoval(userId, serverId, label);
    }
    return { granted, removed };
  }

  /**
   * Gives `toLabel` to each user in every server that maps both labels, optionally taking
   * `fromLabel` away. Servers run concurrently; users within a server run in order.
   */
  async transferLabel(
    userIds: UserId[],
    fromLabel: string,
    toLabel: string,
    options: TransferOptions,
  ): Promise<Result<TransferReport, SyncError>> {
    if (fromLabel === toLabel) {
      return ErrResult(new ValidationError("Source and destination labels must differ"));
    }
    const { registry } = this.deps;
    const servers = registry.listServers().filter((server) => {
      const refs = server.roleMappingRefs;
      return refs.includes(fromLabel) && refs.includes(toLabel);
    });
    if (!servers.length) {
      return ErrResult(
        new ValidationError(`No server maps both "${fromLabel}" and "${toLabel}"`),
      );
    }

    const entries = await Promise.all(
      servers.map(async ({ serverId }) => {
        const toRole = registry.roleFor(toLabel, serverId);
        const fromRole = registry.roleFor(fromLabel, serverId);
        const perUser: Record<UserId, RoleSyncOutcome[]> = {};
        for (const userId of userIds) {
          const outcomes: RoleSyncOutcome[] = toRole
            ? await this.syncTarget(serverId, userId, { [toLabel]: toRole }, "grant")
            : [];
          const granted = !outcomes.some((o) => o.status !== "applied");
          if (options.removeOld && fromRole && granted) {
            outcomes.push(
              ...(await this.syncTarget(serverId, userId, { [fromLabel]: fromRole }, "revoke")),
            );
          }
          perUser[userId] = outcomes;
        }
        return [serverId, perUser] as const;
      }),
    );

    return OkResult({ fromLabel, toLabel, servers: Object.fromEntries(entries) });
  }

  private disabledReason(sourceServerId: ServerId): RoleSyncDisabledReason | null {
    const { registry } = this.deps;
    if (!registry.roleSyncEnabled) return "ROLE_SYNC_DISABLED";
    if (!registry.getServer(sourceServerId)) return "SOURCE_NOT_REGISTERED";
    return null;
  }

  private async syncTarget(
    serverId: ServerId,
    userId: UserId,
    roles: Record<string, RoleId>,
    direction: Direction,
  ): Promise<RoleSyncOutcome[]> {
    const { effector, inspector, guard, policy } = this.deps;
    const wanted = Object.entries(roles);

    const held = await callRemote(
      serverId,
      "getMemberRoles",
      () => inspector.getMemberRoles(serverId, userId),
      policy,
    );
    if (held.isErr()) {
      return wanted.map(([label, roleId]): RoleSyncOutcome => ({
        status: "failed",
        label,
        roleId,
        reason: held.error.message,
      }));
    }
    if (held.value === null) {
      return wanted.map(([label, roleId]): RoleSyncOutcome => ({
        status: "skipped",
        label,
        roleId,
        reason: "NOT_MEMBER",
      }));
    }

    const heldRoles = new Set(held.value);
    let hierarchy: RoleHierarchy | null = null;
    const outcomes: RoleSyncOutcome[] = [];

    for (const [label, roleId] of wanted) {
      const inWantedState = direction === "grant" ? heldRoles.has(roleId) : !heldRoles.has(roleId);
      if (inWantedState) {
        outcomes.push({ status: "applied", label, roleId, changed: false });
        continue;
      }

      if (!hierarchy) {
        const fetched = await guard.fetch(serverId);
        if (fetched.isErr()) {
          outcomes.push({ status: "failed", label, roleId, reason: fetched.error.message });
          continue;
        }
        hierarchy = fetched.value;
      }

      const verdict = evaluateHierarchy(hierarchy, roleId);
      if (!verdict.allowed) {
        this.logger.debug("[sync:roles] skipped role", { serverId, userId, roleId, ...verdict });
        outcomes.push({ status: "skipped", label, roleId, reason: verdict.reason });
        continue;
      }

      const reason = `Role sync (${label})`;
      const write = await callRemote(
        serverId,
        direction === "grant" ? "grantRole" : "revokeRole",
        () =>
          direction === "grant"
            ? effector.grantRole(serverId, userId, roleId, reason)
            : effector.revokeRole(serverId, userId, roleId, reason),
        policy,
      );
      if (write.isErr()) {
        this.logger.warn("[sync:roles] role write failed", {
          serverId,
          userId,
          roleId,
          direction,
          error: write.error.message,
        });
        outcomes.push({ status: "failed", label, roleId, reason: write.error.message });
        continue;
      }
      if (direction === "grant") heldRoles.add(roleId);
      else heldRoles.delete(roleId);
      outcomes.push({ status: "applied", label, roleId, changed: true });
    }

    return outcomes;
  }

  private logReport(message: string, userId: UserId, report: RoleSyncReport): void {
    const counts = { applied: 0, skipped: 0, failed: 0 };
    for (const outcomes of Object.values(report.targets)) {
      for (const outcome of outcomes) counts[outcome.status] += 1;
    }
    this.logger.info(message, { userId, ...counts });
  }
}

/**
 * HierarchyGuard: may the bot touch `roleId` in a server?
 *
 * Rule: the bot's highest role must sit strictly above the role. Equal positions are
 * denied, the same way the platform refuses them.
 */
import type { RoleId, ServerId } from "@/db/types";
import type { Result } from "@/utils/result";
import type { EffectorFailure } from "../errors";
import { callRemote, type RemoteCallPolicy } from "../effector/call";
import type { GuildInspector, RoleHierarchy } from "../effector/types";

export type HierarchyVerdict =
  | { allowed: true }
  | { allowed: false; reason: "ROLE_MISSING" | "PERMISSION_DENIED"; detail: string };

export function evaluateHierarchy(hierarchy: RoleHierarchy, roleId: RoleId): HierarchyVerdict {
  const rolePosition = hierarchy.positions[roleId];
  if (rolePosition === undefined) {
    return { allowed: false, reason: "ROLE_MISSING", detail: `role ${roleId} does not exist` };
  }
  if (hierarchy.botHighestPosition === null) {
    return { allowed: false, reason: "PERMISSION_DENIED", detail: "bot has no role in server" };
  }
  if (hierarchy.botHighestPosition <= rolePosition) {
    return {
      allowed: false,
      reason: "PERMISSION_DENIED",
      detail: `bot rank ${hierarchy.botHighestPosition} does not exceed role rank ${rolePosition}`,
    };
  }
  return { allowed: true };
}

export class HierarchyGuard {
  constructor(
    private readonly inspector: GuildInspector,
    private readonly policy: RemoteCallPolicy,
  ) {}

  /** Fetches the hierarchy once; evaluate many roles against it with `evaluateHierarchy`. */
  fetch(serverId: ServerId): Promise<Result<RoleHierarchy, EffectorFailure>> {
    return callRemote(
      serverId,
      "getRoleHierarchy",
      () => this.inspector.getRoleHierarchy(serverId),
      this.policy,
    );
  }
}

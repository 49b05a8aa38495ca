import type { ServerId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { withTimeout } from "@/utils/withTimeout";
import { EffectorFailure } from "../errors";

export interface RemoteCallPolicy {
  timeoutMs: number;
  /** Extra attempts after the first. Keep at 0 for calls that must not repeat. */
  retries: number;
}

/** Runs one remote call, time-bounded, with at most `retries` extra attempts. */
export async function callRemote<T>(
  serverId: ServerId,
  label: string,
  task: () => Promise<T>,
  policy: RemoteCallPolicy,
): Promise<Result<T, EffectorFailure>> {
  let lastError: unknown = null;
  for (let attempt = 0; attempt <= policy.retries; attempt++) {
    try {
      return OkResult(await withTimeout(task, policy.timeoutMs, label));
    } catch (error) {
      lastError = error;
    }
  }

  const message = lastError instanceof Error ? lastError.message : String(lastError);
  return ErrResult(new EffectorFailure(serverId, `${label}: ${message}`, { cause: lastError }));
}

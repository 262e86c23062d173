import type { Blocker, ResourceSnapshot } from "./types.js";

export type DeployErrorCode =
  | "IDENTITY_MISMATCH"
  | "CLUSTER_UNAVAILABLE"
  | "ARTIFACT_FETCH_FAILED"
  | "NAMESPACE_MISSING"
  | "NAMESPACE_CREATE_FAILED"
  | "NAMESPACE_DELETE_FAILED"
  | "INSPECT_FAILED"
  | "INSTALL_FAILED"
  | "APPLY_FAILED"
  | "POST_APPLY_FAILED"
  | "READINESS_TIMEOUT"
  | "USER_ABORTED"
  | "INVALID_USER_INPUT"
  | "COMMAND_FAILED";

/**
 * Terminal failure of a reconciliation run. Carries the last namespace
 * snapshot seen before the failure, when one was taken.
 */
export class DeployError extends Error {
  readonly code: DeployErrorCode;
  snapshot?: ResourceSnapshot;

  constructor(code: DeployErrorCode, message: string, snapshot?: ResourceSnapshot) {
    super(message);
    this.name = "DeployError";
    this.code = code;
    this.snapshot = snapshot;
  }

  toBlocker(): Blocker {
    return { code: this.code, message: this.message };
  }
}

export function isDeployError(err: unknown): err is DeployError {
  return err instanceof DeployError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

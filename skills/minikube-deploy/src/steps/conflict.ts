import { DeployError } from "../errors.js";
import type { RunContext } from "../context.js";
import type { ConflictDecision, DeploymentTarget, ResourceSnapshot } from "../types.js";
import { foreignRecords, renderSnapshot, snapshot } from "./inspect.js";

const CHOICES = ["continue", "recreate", "abort"] as const;

const ALIASES: Record<string, ConflictDecision> = {
  continue: "continue",
  "1": "continue",
  recreate: "recreate",
  delete: "recreate",
  "2": "recreate",
  abort: "abort",
  "3": "abort",
};

export function parseDecision(answer: string): ConflictDecision | undefined {
  return ALIASES[answer.trim().toLowerCase()];
}

/**
 * Show the namespace to the operator and ask what to do about resources
 * this tool does not own.
 */
export async function resolveConflict(
  ctx: RunContext,
  target: DeploymentTarget,
  snap: ResourceSnapshot
): Promise<ConflictDecision> {
  const { onInvalidInput, maxAttempts } = ctx.settings.conflict;
  const foreign = foreignRecords(snap, target.isOwned);
  // Recreating a shared namespace would delete the component it belongs to.
  const choices: ReadonlyArray<ConflictDecision> = target.requires ? ["continue", "abort"] : CHOICES;

  ctx.reporter.warn(`Unexpected resources found in namespace '${target.namespace}':`);
  ctx.reporter.section(`Resources Running Under '${target.namespace}' Namespace`, renderSnapshot(snap));
  ctx.reporter.info(`Not owned by ${target.name}: ${foreign.map((r) => r.name).join(", ")}`);
  ctx.reporter.info("Options:");
  ctx.reporter.info("  1) continue - deploy alongside the existing resources");
  if (target.requires) {
    ctx.reporter.info(`  -) recreate - not offered, '${target.namespace}' belongs to ${target.requires}`);
  } else {
    ctx.reporter.info("  2) recreate - delete the namespace and deploy fresh");
  }
  ctx.reporter.info("  3) abort    - leave everything as it is");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const answer = await ctx.prompter.ask("How do you want to proceed?", choices);
    const decision = parseDecision(answer);
    if (decision && choices.includes(decision)) return decision;

    if (onInvalidInput === "abort") {
      throw new DeployError("USER_ABORTED", `Unrecognised answer '${answer}'. Deployment aborted.`, snap);
    }
    if (attempt < maxAttempts) {
      ctx.reporter.warn(`Invalid input '${answer}'. Please answer ${choices.join(", ")}.`);
    }
  }

  throw new DeployError(
    "INVALID_USER_INPUT",
    `No valid answer after ${maxAttempts} attempt(s). Deployment aborted.`,
    snap
  );
}

/**
 * Delete the namespace, wait until it is really gone, and create it again.
 * Returns the (empty) snapshot of the fresh namespace.
 */
export async function recreateNamespace(ctx: RunContext, target: DeploymentTarget): Promise<ResourceSnapshot> {
  const { namespace } = target;
  const { attempts, intervalSeconds } = target.namespaceDeletion;

  ctx.reporter.step(`Deleting namespace '${namespace}'...`);
  const deleted = await ctx.cluster.deleteNamespace(namespace);
  if (!deleted.ok) {
    throw new DeployError(
      "NAMESPACE_DELETE_FAILED",
      `Failed to delete namespace '${namespace}': ${deleted.stderr || `exit code ${deleted.exitCode}`}`
    );
  }

  await waitForNamespaceGone(ctx, namespace, attempts, intervalSeconds);

  const created = await ctx.cluster.createNamespace(namespace);
  if (!created.ok) {
    throw new DeployError(
      "NAMESPACE_CREATE_FAILED",
      `Failed to re-create namespace '${namespace}': ${created.stderr || `exit code ${created.exitCode}`}`
    );
  }
  ctx.reporter.ok(`Namespace '${namespace}' re-created for fresh deployment`);

  const fresh = await snapshot(ctx.cluster, namespace);
  if (fresh.records.length > 0) {
    throw new DeployError(
      "NAMESPACE_DELETE_FAILED",
      `Namespace '${namespace}' still holds ${fresh.records.length} resource(s) after re-creation`,
      fresh
    );
  }
  return fresh;
}

export async function waitForNamespaceGone(
  ctx: RunContext,
  namespace: string,
  attempts: number,
  intervalSeconds: number
): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (!(await ctx.cluster.namespaceExists(namespace))) {
      ctx.reporter.ok(`Namespace '${namespace}' deleted`);
      return;
    }
    await ctx.sleep(intervalSeconds * 1000);
  }
  throw new DeployError(
    "NAMESPACE_DELETE_FAILED",
    `Namespace '${namespace}' still exists after ${attempts} checks ${intervalSeconds}s apart`
  );
}

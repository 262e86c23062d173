import { DeployError, errorMessage, isDeployError } from "./errors.js";
import type { RunContext } from "./context.js";
import { applyManifests, runAfterApply, runInstallSteps, type ApplyProgress } from "./steps/apply.js";
import {
  ensureNamespace,
  verifyArtifacts,
  verifyClusterReachable,
  verifyIdentity,
  verifyNamespacePresent,
} from "./steps/checks.js";
import { recreateNamespace, resolveConflict } from "./steps/conflict.js";
import { classify, missingMarkers, renderSnapshot, snapshot, withoutNeighbours } from "./steps/inspect.js";
import { waitForReady, type ReadinessOutcome } from "./steps/readiness.js";
import type { Blocker, Classification, ConflictDecision, DeploymentTarget, ResourceSnapshot, WaitFor } from "./types.js";

export type DeployResult = {
  status: "deployed" | "already_deployed" | "aborted" | "error";
  component: string;
  namespace: string;
  fetched: string[];
  classification?: Classification;
  decision?: ConflictDecision;
  applied: string[];
  /** One entry per waited step: a manifest file or an install step description. */
  readiness: Array<{ step: string; outcome: ReadinessOutcome }>;
  /** Final namespace state, or the last state seen before a failure. */
  snapshot?: ResourceSnapshot;
  blockers: Blocker[];
};

/**
 * Bring the target's namespace to the deployed state: check preconditions,
 * inspect what is already there, settle conflicts with the operator, run the
 * install steps, apply manifests in order and wait for each workload to
 * become Ready.
 */
export async function runDeploy(ctx: RunContext, target: DeploymentTarget): Promise<DeployResult> {
  const result: DeployResult = {
    status: "error",
    component: target.name,
    namespace: target.namespace,
    fetched: [],
    applied: [],
    readiness: [],
    blockers: [],
  };
  const progress: ApplyProgress = { applied: result.applied };
  let clusterReachable = false;

  try {
    // Preconditions. Nothing in the cluster changes before all of them pass,
    // apart from the namespace itself.
    verifyIdentity(ctx, ctx.settings.expectedUser);
    await verifyClusterReachable(ctx);
    clusterReachable = true;
    result.fetched = await verifyArtifacts(ctx, target);
    if (target.requires) {
      await verifyNamespacePresent(ctx, target);
    } else {
      await ensureNamespace(ctx, target.namespace);
    }

    const initial = await snapshot(ctx.cluster, target.namespace);
    result.snapshot = initial;
    const own = withoutNeighbours(initial, target.isOwned, target.isNeighbour);
    result.classification = classify(own, target.isOwned);

    if (result.classification === "all_owned") {
      const missing = missingMarkers(own, target.deployedWhen);
      if (missing.length === 0) {
        ctx.reporter.section(`Resources Running Under '${target.namespace}' Namespace`, renderSnapshot(initial));
        ctx.reporter.ok(`${target.name} is already deployed in '${target.namespace}'. Nothing to do.`);
        result.status = "already_deployed";
        return result;
      }
      ctx.reporter.warn(`'${target.namespace}' has no ${missing.join(", ")} yet. Completing the deployment of ${target.name}.`);
    }

    if (result.classification === "mixed") {
      result.decision = await resolveConflict(ctx, target, own);
      if (result.decision === "abort") {
        throw new DeployError("USER_ABORTED", "Deployment aborted by operator. No changes were made.", initial);
      }
      if (result.decision === "recreate") {
        result.snapshot = await recreateNamespace(ctx, target);
      }
    }

    const settle = async (step: string, waitFor: WaitFor) => {
      const outcome = await waitForReady(ctx, target.namespace, waitFor, target.readiness);
      result.readiness.push({ step, outcome });
      if (outcome.state === "timed_out") {
        throw new DeployError(
          "READINESS_TIMEOUT",
          `${step}: ${outcome.reason ?? "workload did not become Ready"}. Applied resources are left in place.`
        );
      }
    };

    await runInstallSteps(ctx, target, async (step) => {
      if (step.waitFor) await settle(step.description, step.waitFor);
    });

    await applyManifests(ctx, target, progress, async (manifest) => {
      if (manifest.waitFor) await settle(manifest.file, manifest.waitFor);
      await runAfterApply(ctx, target, manifest);
    });

    const final = await snapshot(ctx.cluster, target.namespace);
    result.snapshot = final;
    ctx.reporter.section(`Resources Running Under '${target.namespace}' Namespace`, renderSnapshot(final));
    ctx.reporter.ok(`Deployment of ${target.name} in '${target.namespace}' was successful.`);
    result.status = "deployed";
    return result;
  } catch (err) {
    if (!isDeployError(err)) throw err;

    result.status = err.code === "USER_ABORTED" ? "aborted" : "error";
    result.blockers.push(err.toBlocker());
    if (err.snapshot) {
      result.snapshot = err.snapshot;
    } else if (clusterReachable && err.code !== "ARTIFACT_FETCH_FAILED" && err.code !== "NAMESPACE_MISSING") {
      result.snapshot = await lastKnownState(ctx, target.namespace, result.snapshot);
    }

    ctx.reporter.fail(`[${err.code}] ${err.message}`);
    if (result.snapshot) {
      ctx.reporter.section(`State of '${target.namespace}' Namespace`, renderSnapshot(result.snapshot));
    }
    return result;
  }
}

async function lastKnownState(
  ctx: RunContext,
  namespace: string,
  fallback: ResourceSnapshot | undefined
): Promise<ResourceSnapshot | undefined> {
  try {
    return await snapshot(ctx.cluster, namespace);
  } catch (err) {
    ctx.reporter.warn(`Could not capture namespace state: ${errorMessage(err)}`);
    return fallback;
  }
}

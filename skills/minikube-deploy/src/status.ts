import type { RunContext } from "./context.js";
import { classify, foreignRecords, missingMarkers, snapshot, withoutNeighbours } from "./steps/inspect.js";
import { activePods, isPodReady } from "./steps/readiness.js";
import type { Classification, DeploymentTarget, ResourceSnapshot } from "./types.js";

export type StatusResult = {
  timestamp: string;
  component: string;
  namespace: string;
  clusterRunning: boolean;
  namespaceExists: boolean;
  classification?: Classification;
  pods: { ready: number; total: number };
  foreign: string[];
  snapshot?: ResourceSnapshot;
  nextSteps: string[];
};

/**
 * Read-only view of a component's namespace. Never changes anything.
 */
export async function runStatus(ctx: RunContext, target: DeploymentTarget): Promise<StatusResult> {
  const result: StatusResult = {
    timestamp: new Date().toISOString(),
    component: target.name,
    namespace: target.namespace,
    clusterRunning: false,
    namespaceExists: false,
    pods: { ready: 0, total: 0 },
    foreign: [],
    nextSteps: [],
  };

  const cluster = await ctx.cluster.clusterStatus();
  result.clusterRunning = cluster.running;
  if (!cluster.running) {
    result.nextSteps.push("Start minikube: minikube start");
    return result;
  }

  result.namespaceExists = await ctx.cluster.namespaceExists(target.namespace);
  if (!result.namespaceExists) {
    if (target.requires) result.nextSteps.push(`Deploy ${target.requires} first: mkdeploy deploy ${target.requires}`);
    result.nextSteps.push(`Deploy: mkdeploy deploy ${target.name}`);
    return result;
  }

  const snap = await snapshot(ctx.cluster, target.namespace);
  result.snapshot = snap;
  const own = withoutNeighbours(snap, target.isOwned, target.isNeighbour);
  result.classification = classify(own, target.isOwned);
  result.foreign = foreignRecords(own, target.isOwned).map((r) => r.name);

  const pods = activePods(own).filter((r) => r.kind === "pod" && target.isOwned(r));
  result.pods = { ready: pods.filter(isPodReady).length, total: pods.length };

  if (result.classification === "empty") {
    result.nextSteps.push(`Deploy: mkdeploy deploy ${target.name}`);
  } else if (result.classification === "mixed") {
    result.nextSteps.push(`Namespace holds resources not owned by ${target.name}; deploy will ask how to proceed`);
  } else if (missingMarkers(own, target.deployedWhen).length > 0) {
    result.nextSteps.push(`Deployment incomplete: mkdeploy deploy ${target.name}`);
  } else if (result.pods.ready < result.pods.total) {
    result.nextSteps.push(`Some pods are not ready: kubectl get pods -n ${target.namespace}`);
  }
  return result;
}

import { DeployError, isDeployError } from "./errors.js";
import type { RunContext } from "./context.js";
import { verifyIdentity } from "./steps/checks.js";
import { waitForNamespaceGone } from "./steps/conflict.js";
import type { Blocker, DeploymentTarget } from "./types.js";

export type UninstallResult = {
  status: "removed" | "deleting" | "not_found" | "error";
  component: string;
  namespace: string;
  removed: string[];
  blockers: Blocker[];
};

export async function runUninstall(ctx: RunContext, target: DeploymentTarget): Promise<UninstallResult> {
  const result: UninstallResult = {
    status: "error",
    component: target.name,
    namespace: target.namespace,
    removed: [],
    blockers: [],
  };

  try {
    verifyIdentity(ctx, ctx.settings.expectedUser);

    ctx.reporter.step(`Initiating removal of ${target.name} from '${target.namespace}'...`);
    if (!(await ctx.cluster.namespaceExists(target.namespace))) {
      ctx.reporter.info(`Namespace '${target.namespace}' does not exist. Nothing to remove.`);
      result.status = "not_found";
      return result;
    }

    if (target.removal === "manifests") {
      await removeManifests(ctx, target, result.removed);
      result.status = "removed";
      ctx.reporter.ok(`${target.name} removed from '${target.namespace}'`);
      return result;
    }

    const deleted = await ctx.cluster.deleteNamespace(target.namespace);
    if (!deleted.ok) {
      throw new DeployError(
        "NAMESPACE_DELETE_FAILED",
        `Failed to delete namespace '${target.namespace}': ${deleted.stderr || `exit code ${deleted.exitCode}`}`
      );
    }
    result.removed.push(`namespace/${target.namespace}`);

    if (!ctx.settings.uninstall.waitForDeletion) {
      ctx.reporter.ok(`Deletion of namespace '${target.namespace}' requested`);
      result.status = "deleting";
      return result;
    }

    const { attempts, intervalSeconds } = target.namespaceDeletion;
    await waitForNamespaceGone(ctx, target.namespace, attempts, intervalSeconds);
    result.status = "removed";
    return result;
  } catch (err) {
    if (!isDeployError(err)) throw err;
    result.status = "error";
    result.blockers.push(err.toBlocker());
    ctx.reporter.fail(`[${err.code}] ${err.message}`);
    return result;
  }
}

// Reverse order, so dependents go before what they depend on.
async function removeManifests(ctx: RunContext, target: DeploymentTarget, removed: string[]): Promise<void> {
  for (const manifest of [...target.manifests].reverse()) {
    const result = await ctx.cluster.deleteManifest(manifest.file, target.namespace, target.workingDir);
    if (!result.ok) {
      throw new DeployError(
        "NAMESPACE_DELETE_FAILED",
        `Failed to delete resources from ${manifest.file}: ${result.stderr || `exit code ${result.exitCode}`}`
      );
    }
    removed.push(manifest.file);
    ctx.reporter.ok(`Deleted resources from ${manifest.file}`);
  }
}

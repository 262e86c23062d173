import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { DeployError } from "../errors.js";
import type { RunContext } from "../context.js";
import type { DeploymentTarget } from "../types.js";

export function verifyIdentity(ctx: RunContext, expectedUser: string | undefined): void {
  if (!expectedUser) return;
  const current = ctx.currentUser();
  if (current !== expectedUser) {
    throw new DeployError(
      "IDENTITY_MISMATCH",
      `This tool must be run by '${expectedUser}'. Current user: ${current}`
    );
  }
  ctx.reporter.ok(`Running as '${current}'`);
}

export async function verifyClusterReachable(ctx: RunContext): Promise<void> {
  const status = await ctx.cluster.clusterStatus();
  if (!status.running) {
    throw new DeployError(
      "CLUSTER_UNAVAILABLE",
      `Minikube is not running. Start it with 'minikube start' and try again.${status.detail ? `\n${status.detail}` : ""}`
    );
  }
  ctx.reporter.ok("Minikube is running");
}

export function missingArtifacts(required: ReadonlyArray<string>, workingDir: string): string[] {
  return required.filter((f) => !existsSync(join(workingDir, f)));
}

/**
 * Make sure every required file is in the working directory, fetching the
 * missing ones from the component's artifact source. Returns the files that
 * had to be fetched.
 */
export async function verifyArtifacts(ctx: RunContext, target: DeploymentTarget): Promise<string[]> {
  await mkdir(target.workingDir, { recursive: true });

  const missing = missingArtifacts(target.requiredArtifacts, target.workingDir);
  if (missing.length === 0) {
    ctx.reporter.ok(`All required files present in ${target.workingDir}`);
    return [];
  }

  if (!target.artifactSource) {
    throw new DeployError(
      "ARTIFACT_FETCH_FAILED",
      `Missing files in ${target.workingDir}: ${missing.join(", ")} (no artifact source configured)`
    );
  }

  ctx.reporter.step(`Missing files (${missing.join(", ")}). Fetching from ${target.artifactSource.repo}...`);
  const fetched = await ctx.artifacts(target.artifactSource).fetch(missing, target.workingDir);
  if (!fetched.ok) {
    throw new DeployError("ARTIFACT_FETCH_FAILED", fetched.error);
  }

  const stillMissing = missingArtifacts(target.requiredArtifacts, target.workingDir);
  if (stillMissing.length > 0) {
    throw new DeployError(
      "ARTIFACT_FETCH_FAILED",
      `Files still missing after fetch: ${stillMissing.join(", ")}`
    );
  }
  ctx.reporter.ok(`Fetched ${missing.length} file(s)`);
  return missing;
}

/**
 * Idempotent create. Returns true when this call created the namespace.
 */
export async function ensureNamespace(ctx: RunContext, namespace: string): Promise<boolean> {
  if (await ctx.cluster.namespaceExists(namespace)) {
    ctx.reporter.ok(`Namespace '${namespace}' already exists`);
    return false;
  }

  const created = await ctx.cluster.createNamespace(namespace);
  if (!created.ok && !created.stderr.includes("already exists")) {
    throw new DeployError(
      "NAMESPACE_CREATE_FAILED",
      `Failed to create namespace '${namespace}': ${created.stderr || `exit code ${created.exitCode}`}`
    );
  }
  if (!created.ok) {
    // Created by someone else between the check and the create.
    ctx.reporter.ok(`Namespace '${namespace}' already exists`);
    return false;
  }
  ctx.reporter.ok(`Created namespace '${namespace}'`);
  return true;
}

/**
 * A component that deploys into another component's namespace must not
 * create it: the owner has to be deployed first.
 */
export async function verifyNamespacePresent(ctx: RunContext, target: DeploymentTarget): Promise<void> {
  if (!target.requires) return;
  if (!(await ctx.cluster.namespaceExists(target.namespace))) {
    throw new DeployError(
      "NAMESPACE_MISSING",
      `Namespace '${target.namespace}' does not exist. Deploy ${target.requires} first: mkdeploy deploy ${target.requires}`
    );
  }
  ctx.reporter.ok(`Namespace '${target.namespace}' exists`);
}

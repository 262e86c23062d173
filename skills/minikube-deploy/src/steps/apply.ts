import { DeployError } from "../errors.js";
import type { RunContext } from "../context.js";
import type { ClusterCommand, DeploymentTarget, InstallStep, ManifestSpec } from "../types.js";

export type ApplyProgress = {
  applied: string[];
};

/**
 * Apply manifests in order, calling `afterEach` once a manifest is accepted
 * so the caller can wait for it before the next one goes in. Stops at the
 * first failure; earlier manifests stay applied.
 */
export async function applyManifests(
  ctx: RunContext,
  target: DeploymentTarget,
  progress: ApplyProgress,
  afterEach?: (manifest: ManifestSpec) => Promise<void>
): Promise<void> {
  for (const manifest of target.manifests) {
    ctx.reporter.step(`Applying ${manifest.file} to namespace '${target.namespace}'...`);
    const result = await ctx.cluster.apply(manifest.file, target.namespace, target.workingDir);
    if (!result.ok) {
      const partial = progress.applied.length > 0 ? ` (already applied: ${progress.applied.join(", ")})` : "";
      throw new DeployError(
        "APPLY_FAILED",
        `Failed to apply ${manifest.file}: ${result.stderr || `exit code ${result.exitCode}`}${partial}`
      );
    }
    progress.applied.push(manifest.file);
    if (result.stdout) ctx.reporter.info(result.stdout);
    ctx.reporter.ok(`Applied ${manifest.file}`);

    if (afterEach) await afterEach(manifest);
  }
}

/**
 * Run the component's install commands in order, before any manifest. The
 * caller waits on each step's workload in `afterEach`.
 */
export async function runInstallSteps(
  ctx: RunContext,
  target: DeploymentTarget,
  afterEach?: (step: InstallStep) => Promise<void>
): Promise<void> {
  for (const step of target.install) {
    await runClusterCommand(ctx, target, step, "INSTALL_FAILED");
    if (afterEach) await afterEach(step);
  }
}

export async function runAfterApply(ctx: RunContext, target: DeploymentTarget, manifest: ManifestSpec): Promise<void> {
  for (const hook of target.afterApply.filter((h) => h.afterManifest === manifest.file)) {
    await runClusterCommand(ctx, target, hook, "POST_APPLY_FAILED");
  }
}

async function runClusterCommand(
  ctx: RunContext,
  target: DeploymentTarget,
  cmd: ClusterCommand,
  code: "INSTALL_FAILED" | "POST_APPLY_FAILED"
): Promise<void> {
  ctx.reporter.step(`${cmd.description}...`);
  const result = await ctx.cluster.run(cmd.command, cmd.args, target.workingDir);
  if (!result.ok) {
    if (cmd.tolerateExisting && result.stderr.includes("already exists")) {
      ctx.reporter.ok(`${cmd.description}: already exists`);
      return;
    }
    throw new DeployError(code, `${cmd.description} failed: ${result.stderr || `exit code ${result.exitCode}`}`);
  }
  if (cmd.showOutput && result.stdout) ctx.reporter.info(result.stdout);
  ctx.reporter.ok(cmd.description);
}

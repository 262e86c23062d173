import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { ZodError } from "zod";
import { ConfigSchema, type DeployConfig } from "./schema.js";
import { ownershipPredicate } from "./steps/inspect.js";
import type { DeploymentTarget, ReadinessPolicy } from "./types.js";

export type ConfigLoadResult = { ok: true; config: DeployConfig } | { ok: false; error: string };

export function parseConfig(raw: unknown): ConfigLoadResult {
  try {
    return { ok: true, config: ConfigSchema.parse(raw) };
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`);
      return { ok: false, error: `Invalid configuration:\n${issues.join("\n")}` };
    }
    throw err;
  }
}

export async function loadConfig(path: string): Promise<ConfigLoadResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "";
    if (code === "ENOENT") {
      return { ok: false, error: `Config file not found: ${path}` };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  return parseConfig(raw);
}

export type TargetOverrides = {
  readiness?: Partial<ReadinessPolicy>;
};

/**
 * Build the frozen target for one run of the named component.
 */
export function toDeploymentTarget(
  name: string,
  config: DeployConfig,
  overrides: TargetOverrides = {}
): DeploymentTarget | undefined {
  const component = config.components[name];
  if (!component) return undefined;

  const dir = component.workingDir ?? component.namespace;
  const workingDir = isAbsolute(dir) ? dir : join(config.baseDir, dir);
  const manifests = component.manifests.map((m) =>
    Object.freeze({ file: m.file, ...(m.waitFor ? { waitFor: Object.freeze({ ...m.waitFor }) } : {}) })
  );

  return Object.freeze({
    name,
    namespace: component.namespace,
    workingDir,
    manifests: Object.freeze(manifests),
    ownership: Object.freeze([...component.ownership.match]),
    isOwned: ownershipPredicate(component.ownership.match),
    isNeighbour: ownershipPredicate(component.ownership.neighbours),
    deployedWhen: Object.freeze([...component.ownership.deployedWhen]),
    ...(component.requires ? { requires: component.requires } : {}),
    requiredArtifacts: Object.freeze(component.requiredArtifacts ?? manifests.map((m) => m.file)),
    ...(component.artifactSource ? { artifactSource: Object.freeze({ ...component.artifactSource }) } : {}),
    readiness: Object.freeze({
      intervalSeconds: overrides.readiness?.intervalSeconds ?? component.readiness.intervalSeconds,
      timeoutSeconds: overrides.readiness?.timeoutSeconds ?? component.readiness.timeoutSeconds,
    }),
    namespaceDeletion: Object.freeze({ ...component.namespaceDeletion }),
    install: Object.freeze(
      component.install.map(({ waitFor, ...step }) =>
        Object.freeze({ ...step, args: [...step.args], ...(waitFor ? { waitFor: Object.freeze({ ...waitFor }) } : {}) })
      )
    ),
    afterApply: Object.freeze(component.afterApply.map((hook) => Object.freeze({ ...hook, args: [...hook.args] }))),
    removal: component.removal,
  });
}

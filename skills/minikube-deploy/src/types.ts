export type ReadyRatio = {
  ready: number;
  total: number;
};

export type ResourceRecord = {
  /** Kind-qualified name as printed by kubectl, e.g. `pod/mysql-0`. */
  name: string;
  kind: string;
  ready?: ReadyRatio;
  status?: string;
};

export type ResourceSnapshot = {
  namespace: string;
  takenAt: string;
  records: ReadonlyArray<ResourceRecord>;
};

export type Classification = "empty" | "all_owned" | "mixed";

export type ConflictDecision = "continue" | "recreate" | "abort";

export type OwnershipPredicate = (record: ResourceRecord) => boolean;

export type WaitFor = {
  selector: string;
  minReady: number;
  rollout?: string;
};

export type ManifestSpec = {
  file: string;
  waitFor?: WaitFor;
};

export type ClusterCommand = {
  description: string;
  command: string;
  args: string[];
  /** Treat an "already exists" failure as success. */
  tolerateExisting: boolean;
  /** Print the command's stdout to the operator. */
  showOutput: boolean;
};

export type AfterApplyCommand = ClusterCommand & {
  afterManifest: string;
};

/** A command run before the manifests, e.g. a helm or velero install. */
export type InstallStep = ClusterCommand & {
  waitFor?: WaitFor;
};

export type ReadinessPolicy = {
  intervalSeconds: number;
  timeoutSeconds: number;
};

export type DeletionPolicy = {
  attempts: number;
  intervalSeconds: number;
};

export type ArtifactSourceRef = {
  repo: string;
  subdir?: string;
};

/**
 * One reconciliation unit. Built fresh per invocation and frozen.
 */
export type DeploymentTarget = Readonly<{
  name: string;
  namespace: string;
  workingDir: string;
  manifests: ReadonlyArray<ManifestSpec>;
  ownership: ReadonlyArray<string>;
  isOwned: OwnershipPredicate;
  /** Resources of other components sharing the namespace; ignored when classifying. */
  isNeighbour: OwnershipPredicate;
  /** Name fragments that must all be present before the component counts as deployed. */
  deployedWhen: ReadonlyArray<string>;
  /** Component whose namespace this one deploys into; it must exist beforehand. */
  requires?: string;
  requiredArtifacts: ReadonlyArray<string>;
  artifactSource?: ArtifactSourceRef;
  readiness: ReadinessPolicy;
  namespaceDeletion: DeletionPolicy;
  install: ReadonlyArray<InstallStep>;
  afterApply: ReadonlyArray<AfterApplyCommand>;
  removal: "namespace" | "manifests";
}>;

export type ExecutionResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type Blocker = { code: string; message: string };

import { userInfo } from "node:os";
import { FileAuditSink, type AuditSink } from "./tools/audit.js";
import { GitArtifactSource, type ArtifactSource } from "./tools/artifacts.js";
import { KubectlClusterClient, type ClusterClient } from "./tools/kubectl.js";
import { readlinePrompter, type Prompter } from "./tools/prompt.js";
import { createReporter, type Reporter } from "./tools/reporter.js";
import { createExecutor } from "./tools/shell.js";
import { Spinner } from "./tools/spinner.js";
import type { DeployConfig } from "./schema.js";
import type { ArtifactSourceRef } from "./types.js";

export type RunSettings = {
  expectedUser?: string;
  conflict: {
    onInvalidInput: "reprompt" | "abort";
    maxAttempts: number;
  };
  uninstall: {
    waitForDeletion: boolean;
  };
};

/**
 * Everything a run touches, passed explicitly to each step.
 */
export type RunContext = {
  cluster: ClusterClient;
  prompter: Prompter;
  reporter: Reporter;
  audit: AuditSink;
  artifacts: (ref: ArtifactSourceRef) => ArtifactSource;
  sleep: (ms: number) => Promise<void>;
  currentUser: () => string;
  settings: RunSettings;
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function settingsFromConfig(config: DeployConfig, overrides: { expectedUser?: string } = {}): RunSettings {
  return {
    expectedUser: overrides.expectedUser ?? config.expectedUser,
    conflict: { ...config.conflict },
    uninstall: { ...config.uninstall },
  };
}

export function createRunContext(
  config: DeployConfig,
  options: { prompter?: Prompter; expectedUser?: string; auditLog?: string } = {}
): RunContext {
  const audit = new FileAuditSink(options.auditLog ?? config.auditLog);
  const exec = createExecutor({ audit, spinner: new Spinner() });

  return {
    cluster: new KubectlClusterClient(exec),
    prompter: options.prompter ?? readlinePrompter,
    reporter: createReporter(),
    audit,
    artifacts: (ref) => new GitArtifactSource(exec, ref),
    sleep,
    currentUser: () => userInfo().username,
    settings: settingsFromConfig(config, { expectedUser: options.expectedUser }),
  };
}

import type { Executor } from "./shell.js";
import type { ExecutionResult } from "../types.js";

export type ClusterStatus = {
  running: boolean;
  detail: string;
};

/**
 * Everything the reconciler needs from the cluster. The kubectl-backed
 * implementation below is the production one; tests supply an in-memory one.
 */
export interface ClusterClient {
  clusterStatus(): Promise<ClusterStatus>;
  namespaceExists(namespace: string): Promise<boolean>;
  createNamespace(namespace: string): Promise<ExecutionResult>;
  deleteNamespace(namespace: string): Promise<ExecutionResult>;
  /** Raw `get all` table for the namespace. */
  listResources(namespace: string): Promise<ExecutionResult>;
  /** Raw `get pods` table, optionally restricted by a label selector. */
  listPods(namespace: string, selector?: string): Promise<ExecutionResult>;
  apply(file: string, namespace: string, cwd?: string): Promise<ExecutionResult>;
  deleteManifest(file: string, namespace: string, cwd?: string): Promise<ExecutionResult>;
  rolloutStatus(resource: string, namespace: string, timeoutSeconds: number): Promise<ExecutionResult>;
  run(command: string, args: string[], cwd?: string): Promise<ExecutionResult>;
}

export class KubectlClusterClient implements ClusterClient {
  constructor(private readonly exec: Executor) {}

  kubectl(args: string[], cwd?: string): Promise<ExecutionResult> {
    return this.exec.execute("kubectl", args, { cwd });
  }

  async clusterStatus(): Promise<ClusterStatus> {
    const result = await this.exec.execute("minikube", ["status"]);
    const detail = result.stdout || result.stderr;
    // `minikube status` exits non-zero when any component is stopped.
    const stopped = /(host|kubelet|apiserver):\s*(Stopped|Paused)/i.test(result.stdout);
    return { running: result.stdout.includes("Running") && !stopped, detail };
  }

  async namespaceExists(namespace: string): Promise<boolean> {
    const result = await this.kubectl(["get", "namespace", namespace]);
    return result.ok;
  }

  createNamespace(namespace: string): Promise<ExecutionResult> {
    return this.kubectl(["create", "namespace", namespace]);
  }

  deleteNamespace(namespace: string): Promise<ExecutionResult> {
    // Completion is polled by the caller, so the delete itself returns at once.
    return this.kubectl(["delete", "namespace", namespace, "--wait=false"]);
  }

  listResources(namespace: string): Promise<ExecutionResult> {
    return this.kubectl(["get", "all", "-n", namespace]);
  }

  listPods(namespace: string, selector?: string): Promise<ExecutionResult> {
    const args = ["get", "pods", "-n", namespace];
    if (selector) {
      args.push("-l", selector);
    }
    return this.kubectl(args);
  }

  apply(file: string, namespace: string, cwd?: string): Promise<ExecutionResult> {
    return this.kubectl(["apply", "-f", file, "-n", namespace], cwd);
  }

  deleteManifest(file: string, namespace: string, cwd?: string): Promise<ExecutionResult> {
    return this.kubectl(["delete", "-f", file, "-n", namespace, "--ignore-not-found"], cwd);
  }

  rolloutStatus(resource: string, namespace: string, timeoutSeconds: number): Promise<ExecutionResult> {
    return this.kubectl(["rollout", "status", resource, "-n", namespace, `--timeout=${timeoutSeconds}s`]);
  }

  run(command: string, args: string[], cwd?: string): Promise<ExecutionResult> {
    return this.exec.execute(command, args, { cwd });
  }
}

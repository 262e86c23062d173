import type { RunContext } from "../context.js";
import type { ReadinessPolicy, ResourceRecord, ResourceSnapshot, WaitFor } from "../types.js";
import { makeSnapshot, podSnapshot } from "./inspect.js";

export type ReadinessOutcome = {
  state: "ready" | "timed_out";
  polls: number;
  elapsedSeconds: number;
  /** Last pod listing observed, for diagnostics. */
  snapshot: ResourceSnapshot;
  reason?: string;
};

// Pods that finished or are going away do not count towards readiness.
const INACTIVE_STATUSES = new Set(["Completed", "Succeeded", "Terminating", "Evicted"]);

export function activePods(snap: ResourceSnapshot): ResourceRecord[] {
  return snap.records.filter((r) => !(r.status && INACTIVE_STATUSES.has(r.status)));
}

export function isPodReady(pod: ResourceRecord): boolean {
  return pod.ready !== undefined && pod.ready.total >= 1 && pod.ready.ready === pod.ready.total;
}

export function allPodsReady(snap: ResourceSnapshot, minReady = 1): boolean {
  const pods = activePods(snap);
  return pods.length >= minReady && pods.every(isPodReady);
}

function formatClock(seconds: number): string {
  return `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s`;
}

/**
 * Poll the pods matching `waitFor.selector` until every one of them reports
 * all containers ready, or until the timeout elapses. Elapsed time advances
 * by one interval per poll; once an outcome is returned nothing is polled
 * again.
 */
export async function waitForReady(
  ctx: RunContext,
  namespace: string,
  waitFor: WaitFor,
  policy: ReadinessPolicy
): Promise<ReadinessOutcome> {
  const { intervalSeconds, timeoutSeconds } = policy;
  const description = `pods '${waitFor.selector}' in namespace '${namespace}'`;

  if (waitFor.rollout) {
    ctx.reporter.step(`Waiting for ${waitFor.rollout} rollout (max ${timeoutSeconds}s)...`);
    const rollout = await ctx.cluster.rolloutStatus(waitFor.rollout, namespace, timeoutSeconds);
    if (!rollout.ok) {
      return {
        state: "timed_out",
        polls: 0,
        elapsedSeconds: 0,
        snapshot: makeSnapshot(namespace, []),
        reason: `Rollout of ${waitFor.rollout} did not complete: ${rollout.stderr || `exit code ${rollout.exitCode}`}`,
      };
    }
    ctx.reporter.ok(`${waitFor.rollout} rolled out`);
  }

  ctx.reporter.step(`Waiting for ${description} to be Ready (max ${formatClock(timeoutSeconds)})...`);

  let elapsed = 0;
  let polls = 0;
  let last: ResourceSnapshot = makeSnapshot(namespace, []);
  let lastSummary = "";

  while (true) {
    const snap = await podSnapshot(ctx.cluster, namespace, waitFor.selector);
    polls++;

    if (snap) {
      last = snap;
      const pods = activePods(snap);
      if (allPodsReady(snap, waitFor.minReady)) {
        ctx.reporter.ok(`All ${pods.length} pod(s) Ready after ${formatClock(elapsed)}`);
        return { state: "ready", polls, elapsedSeconds: elapsed, snapshot: snap };
      }

      const notReady = pods.filter((p) => !isPodReady(p)).map((p) => `${p.name} (${p.ready ? `${p.ready.ready}/${p.ready.total}` : "?"})`);
      const summary =
        pods.length === 0
          ? "No pods found yet"
          : `${pods.length - notReady.length}/${pods.length} pods ready${notReady.length ? `. Waiting for: ${notReady.join(", ")}` : ""}`;
      if (summary !== lastSummary) {
        ctx.reporter.info(`   [${formatClock(elapsed)} elapsed, ${formatClock(Math.max(0, timeoutSeconds - elapsed))} remaining] ${summary}`);
        lastSummary = summary;
      }
    } else {
      ctx.reporter.warn(`[${formatClock(elapsed)}] Listing pods failed, retrying...`);
    }

    if (elapsed >= timeoutSeconds) {
      return {
        state: "timed_out",
        polls,
        elapsedSeconds: elapsed,
        snapshot: last,
        reason: `Timeout waiting for ${description} after ${timeoutSeconds}s`,
      };
    }

    await ctx.sleep(intervalSeconds * 1000);
    elapsed += intervalSeconds;
  }
}

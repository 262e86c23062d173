import { describe, expect, it } from "vitest";
import { allPodsReady, waitForReady } from "../steps/readiness.js";
import { makeSnapshot } from "../steps/inspect.js";
import { FakeCluster, makeContext } from "./helpers/fakes.js";

const HEADER = "NAME    READY   STATUS    RESTARTS   AGE";
const pods = (...rows: string[]) => [HEADER, ...rows].join("\n");

const policy = { intervalSeconds: 1, timeoutSeconds: 10 };
const waitFor = { selector: "app=web", minReady: 1 };

function setup(replies: string[]) {
  const cluster = new FakeCluster().withNamespace("demo");
  cluster.podReplies.set("app=web", replies);
  return makeContext({ cluster });
}

describe("waitForReady", () => {
  it("returns ready on the poll that first sees every pod ready", async () => {
    const ctx = setup([pods("web-0   0/1   Pending   0   1s"), pods("web-0   1/1   Running   0   2s")]);

    const outcome = await waitForReady(ctx, "demo", waitFor, policy);

    expect(outcome.state).toBe("ready");
    expect(outcome.polls).toBe(2);
    expect(outcome.elapsedSeconds).toBe(1);
    expect(outcome.snapshot.records.map((r) => r.name)).toEqual(["web-0"]);
    expect(ctx.sleep.mock.calls).toEqual([[1000]]);
  });

  it("times out after polling once per interval up to and including the timeout", async () => {
    const ctx = setup([pods("web-0   0/1   CrashLoopBackOff   3   1m")]);

    const outcome = await waitForReady(ctx, "demo", waitFor, policy);

    expect(outcome.state).toBe("timed_out");
    expect(outcome.polls).toBe(11);
    expect(outcome.elapsedSeconds).toBe(10);
    expect(outcome.reason).toBe("Timeout waiting for pods 'app=web' in namespace 'demo' after 10s");
    expect(ctx.sleep).toHaveBeenCalledTimes(10);
  });

  it("logs the progress summary only when it changes", async () => {
    const ctx = setup([pods("web-0   0/1   Pending   0   1s")]);

    await waitForReady(ctx, "demo", waitFor, { intervalSeconds: 1, timeoutSeconds: 3 });

    expect(ctx.lines.filter((l) => l.startsWith("   ["))).toEqual([
      "   [0m 0s elapsed, 0m 3s remaining] 0/1 pods ready. Waiting for: web-0 (0/1)",
    ]);
  });

  it("keeps waiting while no pods exist yet", async () => {
    const ctx = setup(["", pods("web-0   1/1   Running   0   2s")]);

    const outcome = await waitForReady(ctx, "demo", waitFor, policy);

    expect(outcome.state).toBe("ready");
    expect(outcome.polls).toBe(2);
    expect(ctx.lines).toContain("   [0m 0s elapsed, 0m 10s remaining] No pods found yet");
  });

  it("ignores completed pods", async () => {
    const ctx = setup([pods("init-job-x   0/1   Completed   0   1m", "web-0   1/1   Running   0   1m")]);

    const outcome = await waitForReady(ctx, "demo", waitFor, policy);

    expect(outcome).toMatchObject({ state: "ready", polls: 1, elapsedSeconds: 0 });
    expect(ctx.sleep).not.toHaveBeenCalled();
  });

  it("requires at least minReady active pods", async () => {
    const ctx = setup([pods("web-0   1/1   Running   0   1m")]);

    const outcome = await waitForReady(ctx, "demo", { selector: "app=web", minReady: 2 }, { intervalSeconds: 1, timeoutSeconds: 2 });

    expect(outcome).toMatchObject({ state: "timed_out", polls: 3, elapsedSeconds: 2 });
  });

  it("waits for the rollout before polling pods", async () => {
    const ctx = setup([pods("kafka-0   1/1   Running   0   1m")]);

    const outcome = await waitForReady(ctx, "demo", { ...waitFor, rollout: "statefulset/kafka" }, policy);

    expect(outcome.state).toBe("ready");
    expect(ctx.cluster.calls).toEqual(["rollout status statefulset/kafka -n demo", "get pods -n demo -l app=web"]);
  });

  it("reports a failed rollout without polling", async () => {
    const ctx = setup([]);
    ctx.cluster.rolloutError = "timed out waiting for the condition";

    const outcome = await waitForReady(ctx, "demo", { ...waitFor, rollout: "statefulset/kafka" }, policy);

    expect(outcome).toMatchObject({
      state: "timed_out",
      polls: 0,
      reason: "Rollout of statefulset/kafka did not complete: timed out waiting for the condition",
    });
    expect(ctx.cluster.calls).toEqual(["rollout status statefulset/kafka -n demo"]);
  });
});

describe("allPodsReady", () => {
  it("is false for a pod reporting 0/0 containers", () => {
    const snap = makeSnapshot("demo", [{ name: "web-0", kind: "pod", ready: { ready: 0, total: 0 }, status: "Pending" }]);
    expect(allPodsReady(snap)).toBe(false);
  });

  it("is false when any active pod is not ready", () => {
    const snap = makeSnapshot("demo", [
      { name: "web-0", kind: "pod", ready: { ready: 1, total: 1 }, status: "Running" },
      { name: "web-1", kind: "pod", ready: { ready: 1, total: 2 }, status: "Running" },
    ]);
    expect(allPodsReady(snap)).toBe(false);
  });
});

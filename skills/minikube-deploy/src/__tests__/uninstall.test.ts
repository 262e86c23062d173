import { describe, expect, it } from "vitest";
import { runUninstall } from "../uninstall.js";
import { FakeCluster, demoTarget, makeContext } from "./helpers/fakes.js";

const target = demoTarget("/tmp/mkdeploy-unused");

describe("runUninstall", () => {
  it("is a no-op when the namespace does not exist", async () => {
    const cluster = new FakeCluster();

    const result = await runUninstall(makeContext({ cluster }), target);

    expect(result).toEqual({ status: "not_found", component: "demo", namespace: "demo", removed: [], blockers: [] });
    expect(cluster.calls).toEqual(["get namespace demo"]);
  });

  it("deletes the namespace and waits until it is gone", async () => {
    const cluster = new FakeCluster().withNamespace("demo", [{ name: "pod/demo-app-web-0", ready: "1/1", status: "Running" }]);
    cluster.deleteLag = 1;
    const ctx = makeContext({ cluster });

    const result = await runUninstall(ctx, target);

    expect(result.status).toBe("removed");
    expect(result.removed).toEqual(["namespace/demo"]);
    expect(ctx.sleep.mock.calls).toEqual([[2000]]);
    expect(cluster.namespaces.has("demo")).toBe(false);
  });

  it("returns as soon as deletion is requested when not waiting", async () => {
    const cluster = new FakeCluster().withNamespace("demo");
    cluster.deleteLag = 3;
    const ctx = makeContext({ cluster, settings: { uninstall: { waitForDeletion: false } } });

    const result = await runUninstall(ctx, target);

    expect(result.status).toBe("deleting");
    expect(cluster.calls).toEqual(["get namespace demo", "delete namespace demo"]);
    expect(ctx.sleep).not.toHaveBeenCalled();
  });

  it("removes only the manifests' resources from a shared namespace, newest first", async () => {
    const shared = demoTarget("/tmp/mkdeploy-unused", { manifests: ["db.yaml", "app.yaml"], removal: "manifests" });
    const cluster = new FakeCluster().withNamespace("demo", [
      { name: "pod/demo-app-web-0", ready: "1/1", status: "Running" },
      { name: "pod/mysql-0", ready: "1/1", status: "Running" },
    ]);
    cluster.manifestRows.set("app.yaml", [{ name: "pod/demo-app-web-0" }]);

    const result = await runUninstall(makeContext({ cluster }), shared);

    expect(result.status).toBe("removed");
    expect(result.removed).toEqual(["app.yaml", "db.yaml"]);
    expect(cluster.calls.filter((c) => c.startsWith("delete"))).toEqual(["delete -f app.yaml -n demo", "delete -f db.yaml -n demo"]);
    expect(cluster.namespaces.get("demo")).toEqual([{ name: "pod/mysql-0", ready: "1/1", status: "Running" }]);
  });

  it("reports a refused delete", async () => {
    const cluster = new FakeCluster().withNamespace("demo");
    cluster.deleteNamespaceError = "forbidden";

    const result = await runUninstall(makeContext({ cluster }), target);

    expect(result.status).toBe("error");
    expect(result.blockers).toEqual([{ code: "NAMESPACE_DELETE_FAILED", message: "Failed to delete namespace 'demo': forbidden" }]);
  });

  it("refuses to run as the wrong user", async () => {
    const cluster = new FakeCluster().withNamespace("demo");

    const result = await runUninstall(makeContext({ cluster, user: "root" }), target);

    expect(result.blockers.map((b) => b.code)).toEqual(["IDENTITY_MISMATCH"]);
    expect(cluster.calls).toEqual([]);
  });
});

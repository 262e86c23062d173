import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import { DeployError } from "../errors.js";
import { FileAuditSink, MemoryAuditSink, formatCommand } from "../tools/audit.js";
import type { ExecResult } from "../tools/exec.js";
import { createExecutor, type RunFn } from "../tools/shell.js";
import { tempDir } from "./helpers/fakes.js";

const replying = (result: ExecResult) => vi.fn<RunFn>(async () => result);

describe("createExecutor", () => {
  it("records every command in the audit trail", async () => {
    const audit = new MemoryAuditSink();
    const run = replying({ code: 0, stdout: "configured", stderr: "" });
    const exec = createExecutor({ audit, run });

    const result = await exec.execute("kubectl", ["apply", "-f", "my app.yaml"], { input: "data", cwd: "/srv" });

    expect(result).toEqual({ ok: true, exitCode: 0, stdout: "configured", stderr: "" });
    expect(run).toHaveBeenCalledWith("kubectl", ["apply", "-f", "my app.yaml"], { input: "data", cwd: "/srv", spinner: undefined });
    expect(audit.records).toHaveLength(1);
    expect(audit.records[0]).toMatchObject({
      command: 'kubectl apply -f "my app.yaml"',
      exitCode: 0,
      stdout: "configured",
      input: "data",
    });
  });

  it("returns failures unless told they are fatal", async () => {
    const exec = createExecutor({ audit: new MemoryAuditSink(), run: replying({ code: 1, stdout: "", stderr: "boom" }) });

    await expect(exec.execute("kubectl", ["get", "ns"])).resolves.toMatchObject({ ok: false, exitCode: 1, stderr: "boom" });
  });

  it("throws COMMAND_FAILED for a fatal failure after auditing it", async () => {
    const audit = new MemoryAuditSink();
    const exec = createExecutor({ audit, run: replying({ code: 1, stdout: "", stderr: "boom" }) });

    const err = await exec.execute("kubectl", ["get", "ns"], { fatal: true }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DeployError);
    expect(err instanceof DeployError && err.code).toBe("COMMAND_FAILED");
    expect(err instanceof DeployError && err.message).toBe("Command failed with code 1: kubectl get ns\nboom");
    expect(audit.commands()).toEqual(["kubectl get ns"]);
  });
});

describe("FileAuditSink", () => {
  it("appends one JSON line per command, creating the directory", async () => {
    const path = join(await tempDir(), "logs", "audit.log");
    const sink = new FileAuditSink(path);
    const first = { at: "2026-01-01T00:00:00.000Z", command: "minikube status", exitCode: 0, stdout: "host: Running", stderr: "" };

    await sink.record(first);
    await sink.record({ ...first, command: "kubectl get all -n demo" });

    const lines = (await readFile(path, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "")).toEqual(first);
  });
});

describe("formatCommand", () => {
  it("quotes arguments with spaces or quotes", () => {
    expect(formatCommand("git", ["commit", "-m", "it's done"])).toBe('git commit -m "it\'s done"');
    expect(formatCommand("kubectl", ["get", "pods"])).toBe("kubectl get pods");
  });
});

import { spawn } from "node:child_process";
import type { Spinner } from "./spinner.js";

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  input?: string;
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  spinner?: Spinner;
};

const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;
const LONG_RUNNING_TIMEOUT_MS = 20 * 60 * 1000;

function isLongRunning(cmd: string, args: string[]): boolean {
  if (cmd === "git" && args[0] === "clone") return true;
  if (cmd === "kubectl" && args[0] === "rollout" && args[1] === "status") return true;
  if (cmd === "kubectl" && args[0] === "delete" && args[1] === "namespace") return true;
  return false;
}

export function execCmd(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      env: { ...process.env, ...(opts.env ?? {}) },
      cwd: opts.cwd,
      stdio: [opts.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    const longRunning = isLongRunning(cmd, args);
    const timeoutMs = opts.timeoutMs ?? (longRunning ? LONG_RUNNING_TIMEOUT_MS : DEFAULT_TIMEOUT_MS);
    let timedOut = false;
    const killTimeout = setTimeout(() => {
      if (child.kill()) {
        timedOut = true;
      }
    }, timeoutMs);

    const spinner = longRunning ? undefined : opts.spinner;
    spinner?.start(`Running ${cmd} ${args.slice(0, 2).join(" ")}${args.length > 2 ? "..." : ""}`);

    let stdout = "";
    let stderr = "";
    child.stdout?.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr?.on("data", (d: Buffer) => (stderr += d.toString()));

    if (opts.input !== undefined && child.stdin) {
      child.stdin.end(opts.input);
    }

    const finish = () => {
      clearTimeout(killTimeout);
      spinner?.stop();
    };

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish();
      if (err.code === "ENOENT") {
        resolve({
          code: 127,
          stdout: "",
          stderr: `Command not found: ${cmd}. Install it and make sure it is on PATH.`,
        });
      } else {
        reject(err);
      }
    });

    child.on("close", (code) => {
      finish();
      if (timedOut) {
        stderr += `${stderr ? "\n" : ""}Command timed out after ${timeoutMs / 1000}s and was killed: ${cmd} ${args.join(" ")}`;
      }
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
}

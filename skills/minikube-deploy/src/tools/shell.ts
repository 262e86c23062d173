import { execCmd, type ExecOptions, type ExecResult } from "./exec.js";
import { formatCommand, type AuditSink } from "./audit.js";
import type { Spinner } from "./spinner.js";
import { DeployError } from "../errors.js";
import type { ExecutionResult } from "../types.js";

export type RunFn = (cmd: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

export type ExecuteOptions = {
  input?: string;
  cwd?: string;
  /** Throw COMMAND_FAILED on non-zero exit instead of returning the failure. */
  fatal?: boolean;
};

export interface Executor {
  execute(cmd: string, args: string[], opts?: ExecuteOptions): Promise<ExecutionResult>;
}

export function createExecutor(deps: { audit: AuditSink; run?: RunFn; spinner?: Spinner }): Executor {
  const run = deps.run ?? execCmd;

  return {
    async execute(cmd, args, opts = {}) {
      const result = await run(cmd, args, { input: opts.input, cwd: opts.cwd, spinner: deps.spinner });
      const commandLine = formatCommand(cmd, args);

      await deps.audit.record({
        at: new Date().toISOString(),
        command: commandLine,
        exitCode: result.code,
        stdout: result.stdout,
        stderr: result.stderr,
        ...(opts.input !== undefined ? { input: opts.input } : {}),
      });

      const outcome: ExecutionResult = {
        ok: result.code === 0,
        exitCode: result.code,
        stdout: result.stdout,
        stderr: result.stderr,
      };

      if (!outcome.ok && opts.fatal) {
        throw new DeployError(
          "COMMAND_FAILED",
          `Command failed with code ${outcome.exitCode}: ${commandLine}${outcome.stderr ? `\n${outcome.stderr}` : ""}`
        );
      }
      return outcome;
    },
  };
}

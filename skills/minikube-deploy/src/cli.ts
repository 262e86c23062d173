import { fileURLToPath } from "node:url";
import { loadConfig, toDeploymentTarget, type TargetOverrides } from "./config.js";
import { createRunContext } from "./context.js";
import { runDeploy } from "./deploy.js";
import { runStatus, type StatusResult } from "./status.js";
import { runUninstall } from "./uninstall.js";
import { showHelp } from "./tools/help.js";
import { presetPrompter } from "./tools/prompt.js";
import { parseDecision } from "./steps/conflict.js";
import { renderSnapshot } from "./steps/inspect.js";

export type ParsedArgs = {
  command?: string;
  positionals: string[];
  flags: Record<string, string>;
};

// Flags that never take a value, so `--json deploy x` keeps `deploy` as the command.
const BOOLEAN_FLAGS = new Set(["json", "help"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      positionals.push(a);
      continue;
    }
    const eq = a.indexOf("=");
    if (eq > 2) {
      flags[a.slice(2, eq)] = a.slice(eq + 1);
      continue;
    }
    const name = a.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags[name] = "true";
      continue;
    }
    const next = argv[i + 1];
    flags[name] = next !== undefined && !next.startsWith("--") ? argv[++i] : "true";
  }
  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

function positiveNumber(flags: Record<string, string>, key: string): number | undefined {
  const raw = flags[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`--${key} must be a positive number of seconds, got '${raw}'`);
  }
  return value;
}

export function defaultConfigPath(): string {
  return process.env.MKDEPLOY_CONFIG ?? fileURLToPath(new URL("../components.json", import.meta.url));
}

const GREEN = "\x1b[0;32m";
const YELLOW = "\x1b[1;33m";
const RED = "\x1b[0;31m";
const NC = "\x1b[0m";

function formatStatusOutput(result: StatusResult) {
  const colour = (ok: boolean, text: string) => `${ok ? GREEN : RED}${text}${NC}`;

  console.log("");
  console.log("=".repeat(80));
  console.log(`Component Status: ${result.component} (namespace '${result.namespace}')`);
  console.log("=".repeat(80));
  console.log(`${"Minikube".padEnd(30)} ${colour(result.clusterRunning, result.clusterRunning ? "Running" : "NOT RUNNING")}`);
  console.log(`${"Namespace".padEnd(30)} ${colour(result.namespaceExists, result.namespaceExists ? "EXISTS" : "NOT FOUND")}`);
  if (result.classification) {
    const label =
      result.classification === "all_owned" ? `${GREEN}deployed${NC}` : result.classification === "empty" ? `${YELLOW}empty${NC}` : `${YELLOW}mixed${NC}`;
    console.log(`${"Contents".padEnd(30)} ${label}`);
    console.log(`${"Pods ready".padEnd(30)} ${colour(result.pods.ready === result.pods.total, `${result.pods.ready}/${result.pods.total}`)}`);
  }
  if (result.foreign.length > 0) {
    console.log(`${"Not owned".padEnd(30)} ${result.foreign.join(", ")}`);
  }
  if (result.snapshot) {
    console.log("-".repeat(80));
    console.log(renderSnapshot(result.snapshot));
  }
  if (result.nextSteps.length > 0) {
    console.log("-".repeat(80));
    result.nextSteps.forEach((s) => console.log(`Next: ${s}`));
  }
  console.log("=".repeat(80));
}

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const { command, positionals, flags } = parseArgs(argv);

  if (!command || command === "help" || flags.help === "true") {
    return showHelp(command === "help" ? positionals[0] : command) ? 0 : 1;
  }

  const configPath = flags.config ?? defaultConfigPath();
  const loaded = await loadConfig(configPath);
  if (!loaded.ok) {
    console.error(`❌ ${loaded.error}`);
    return 1;
  }
  const config = loaded.config;

  if (command === "list") {
    for (const [name, component] of Object.entries(config.components)) {
      console.log(`${name.padEnd(16)} ${component.namespace.padEnd(16)} ${component.description ?? ""}`.trimEnd());
    }
    return 0;
  }

  if (!["deploy", "uninstall", "status"].includes(command)) {
    console.error(`Unknown command: ${command}`);
    console.error("Run 'mkdeploy help' for available commands");
    return 1;
  }

  const name = positionals[0];
  if (!name) {
    console.error(`❌ Missing component. Usage: mkdeploy ${command} <component>`);
    return 1;
  }

  let overrides: TargetOverrides;
  try {
    overrides = {
      readiness: { intervalSeconds: positiveNumber(flags, "interval"), timeoutSeconds: positiveNumber(flags, "timeout") },
    };
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const target = toDeploymentTarget(name, config, overrides);
  if (!target) {
    console.error(`❌ Unknown component '${name}'. Configured: ${Object.keys(config.components).join(", ")}`);
    return 1;
  }

  if (flags.answer !== undefined && !parseDecision(flags.answer)) {
    console.error(`❌ --answer must be one of continue, recreate, abort (got '${flags.answer}')`);
    return 1;
  }

  const ctx = createRunContext(config, {
    prompter: flags.answer !== undefined ? presetPrompter(flags.answer) : undefined,
    expectedUser: flags.user,
  });
  const json = flags.json === "true";

  if (command === "status") {
    const result = await runStatus(ctx, target);
    if (json) console.log(JSON.stringify(result, null, 2));
    else formatStatusOutput(result);
    return 0;
  }

  if (command === "uninstall") {
    const result = await runUninstall(ctx, target);
    if (json) console.log(JSON.stringify(result, null, 2));
    return result.status === "error" ? 1 : 0;
  }

  const result = await runDeploy(ctx, target);
  if (json) console.log(JSON.stringify(result, null, 2));
  switch (result.status) {
    case "deployed":
    case "already_deployed":
      return 0;
    case "aborted":
      return 2;
    default:
      return 1;
  }
}

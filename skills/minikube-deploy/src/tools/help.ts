/**
 * Show general help or command-specific help. Returns false for an unknown
 * command.
 */
export function showHelp(command?: string, write: (line: string) => void = (l) => console.error(l)): boolean {
  if (!command) {
    write(generalHelp().trim());
    return true;
  }

  const helpText = getCommandHelp(command);
  if (!helpText) {
    write(`Unknown command: ${command}`);
    write("Run 'mkdeploy help' to see all commands");
    return false;
  }

  write(helpText.trim());
  return true;
}

function generalHelp(): string {
  return `
Minikube Component Deployer
${"=".repeat(60)}

Usage:
  mkdeploy <command> [component] [options]

Commands:
  deploy <comp>      Deploy a component into its namespace
  uninstall <comp>   Remove a component
  status <comp>      Show what is running in the component's namespace
  list               List configured components
  help [cmd]         Show help for a command

Global options:
  --config <path>    Component catalog (default: components.json next to the tool)
  --json             Print the result as JSON on stdout

Examples:
  mkdeploy list
  mkdeploy deploy database
  mkdeploy status streaming --json

For detailed help on a command: mkdeploy help <command>
`;
}

export function getCommandHelp(command: string): string | null {
  const helpTexts: Record<string, string> = {
    deploy: `
mkdeploy deploy <component> - Deploy a component

Description:
  Checks that the tool runs as the configured user and that minikube is
  running, fetches any missing manifest files, and makes sure the namespace
  exists. A component that shares another's namespace (the bridge lives in
  'database') requires that namespace to exist already. Then it inspects the
  namespace, ignoring resources of the components it shares it with:

    empty          the component is installed
    already ours   nothing is applied; reported as already deployed
    foreign items  you are asked to continue, recreate or abort
                   (recreate is not offered in a shared namespace)

  Install commands (helm, velero) run first, then each manifest is applied
  in order. Pods are polled until Ready after each step that waits.

Options:
  --interval <s>       Seconds between readiness polls (default: 10)
  --timeout <s>        Seconds before a readiness wait gives up (default: 300)
  --answer <choice>    Answer the conflict prompt non-interactively
                       (continue | recreate | abort)
  --user <name>        Expected user, overriding the catalog

Example:
  mkdeploy deploy streaming --timeout 600
`,
    uninstall: `
mkdeploy uninstall <component> - Remove a component

Description:
  Deletes the component's namespace (or, for components that share a
  namespace, the resources in its manifests). A missing namespace is not an
  error.

Example:
  mkdeploy uninstall database
`,
    status: `
mkdeploy status <component> - Show component status

Description:
  Lists the resources in the component's namespace, whether they all belong
  to the component, and how many pods are ready. Changes nothing.

Options:
  --json               Output raw JSON

Example:
  mkdeploy status database
`,
    list: `
mkdeploy list - List configured components

Example:
  mkdeploy list --config ./components.json
`,
  };

  return helpTexts[command] ?? null;
}

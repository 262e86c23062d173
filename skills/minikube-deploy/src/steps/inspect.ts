import { DeployError } from "../errors.js";
import type { ClusterClient } from "../tools/kubectl.js";
import type {
  Classification,
  OwnershipPredicate,
  ReadyRatio,
  ResourceRecord,
  ResourceSnapshot,
} from "../types.js";

const RATIO = /^(\d+)\/(\d+)$/;

function parseRatio(token: string): ReadyRatio | undefined {
  const m = RATIO.exec(token);
  if (!m) return undefined;
  return { ready: Number(m[1]), total: Number(m[2]) };
}

/**
 * Parse kubectl's tabular output. `get all` prints one table per kind, each
 * with its own header, separated by blank lines; `get pods` prints bare pod
 * names, which take `defaultKind`.
 */
export function parseResourceTable(text: string, defaultKind = ""): ResourceRecord[] {
  const records: ResourceRecord[] = [];

  for (const line of text.split(/\r?\n/)) {
    const tokens = line.trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) continue;
    if (tokens[0] === "NAME") continue;
    if (line.trim().startsWith("No resources found")) continue;

    const name = tokens[0];
    const slash = name.indexOf("/");
    const kind = slash > 0 ? name.slice(0, slash) : defaultKind;

    const record: ResourceRecord = { name, kind };
    const ready = tokens.length > 1 ? parseRatio(tokens[1]) : undefined;
    if (ready) {
      record.ready = ready;
      if (kind === "pod" && tokens.length > 2) {
        record.status = tokens[2];
      }
    }
    records.push(record);
  }

  return records;
}

export function makeSnapshot(namespace: string, records: ResourceRecord[]): ResourceSnapshot {
  return Object.freeze({
    namespace,
    takenAt: new Date().toISOString(),
    records: Object.freeze(records.map((r) => Object.freeze({ ...r }))),
  });
}

export async function snapshot(cluster: ClusterClient, namespace: string): Promise<ResourceSnapshot> {
  const result = await cluster.listResources(namespace);
  if (!result.ok) {
    throw new DeployError(
      "INSPECT_FAILED",
      `Failed to list resources in namespace '${namespace}': ${result.stderr || `exit code ${result.exitCode}`}`
    );
  }
  return makeSnapshot(namespace, parseResourceTable(result.stdout));
}

export async function podSnapshot(
  cluster: ClusterClient,
  namespace: string,
  selector?: string
): Promise<ResourceSnapshot | undefined> {
  const result = await cluster.listPods(namespace, selector);
  if (!result.ok) return undefined;
  return makeSnapshot(namespace, parseResourceTable(result.stdout, "pod"));
}

/**
 * Case-insensitive substring match on the kind-qualified name. Resources
 * this tool creates carry one of the fragments in their name.
 */
export function ownershipPredicate(fragments: ReadonlyArray<string>): OwnershipPredicate {
  const needles = fragments.map((f) => f.toLowerCase());
  return (record) => {
    const name = record.name.toLowerCase();
    return needles.some((n) => name.includes(n));
  };
}

export function classify(snap: ResourceSnapshot, isOwned: OwnershipPredicate): Classification {
  if (snap.records.length === 0) return "empty";
  return snap.records.every(isOwned) ? "all_owned" : "mixed";
}

/**
 * Drop the records of other components sharing the namespace. A record that
 * matches both predicates stays, so `mysql-to-kafka` is not hidden by `mysql`.
 */
export function withoutNeighbours(
  snap: ResourceSnapshot,
  isOwned: OwnershipPredicate,
  isNeighbour: OwnershipPredicate
): ResourceSnapshot {
  return Object.freeze({
    ...snap,
    records: Object.freeze(snap.records.filter((r) => isOwned(r) || !isNeighbour(r))),
  });
}

/** Fragments of `deployedWhen` with no matching record in the snapshot. */
export function missingMarkers(snap: ResourceSnapshot, fragments: ReadonlyArray<string>): string[] {
  return fragments.filter((f) => {
    const needle = f.toLowerCase();
    return !snap.records.some((r) => r.name.toLowerCase().includes(needle));
  });
}

export function foreignRecords(snap: ResourceSnapshot, isOwned: OwnershipPredicate): ResourceRecord[] {
  return snap.records.filter((r) => !isOwned(r));
}

export function renderSnapshot(snap: ResourceSnapshot): string {
  if (snap.records.length === 0) {
    return `No resources found in namespace '${snap.namespace}'.`;
  }
  const width = Math.max(4, ...snap.records.map((r) => r.name.length)) + 2;
  const rows = snap.records.map((r) => {
    const ready = r.ready ? `${r.ready.ready}/${r.ready.total}` : "-";
    return `${r.name.padEnd(width)}${ready.padEnd(8)}${r.status ?? ""}`.trimEnd();
  });
  return [`${"NAME".padEnd(width)}${"READY".padEnd(8)}STATUS`, ...rows].join("\n");
}

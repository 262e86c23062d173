import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type AuditRecord = {
  at: string;
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  input?: string;
};

export interface AuditSink {
  record(entry: AuditRecord): Promise<void>;
}

/**
 * Appends one JSON line per executed command.
 */
export class FileAuditSink implements AuditSink {
  private ready?: Promise<void>;

  constructor(readonly path: string) {}

  async record(entry: AuditRecord): Promise<void> {
    this.ready ??= mkdir(dirname(this.path), { recursive: true }).then(() => undefined);
    await this.ready;
    await appendFile(this.path, JSON.stringify(entry) + "\n", "utf8");
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async record(entry: AuditRecord): Promise<void> {
    this.records.push(entry);
  }

  commands(): string[] {
    return this.records.map((r) => r.command);
  }
}

export function formatCommand(cmd: string, args: ReadonlyArray<string>): string {
  return [cmd, ...args.map((a) => (/[\s"']/.test(a) ? JSON.stringify(a) : a))].join(" ");
}

export interface Reporter {
  step(message: string): void;
  ok(message: string): void;
  warn(message: string): void;
  fail(message: string): void;
  info(message: string): void;
  section(title: string, body: string): void;
}

export const SEPARATOR = "-".repeat(98);

export function createReporter(write: (line: string) => void = (line) => console.error(line)): Reporter {
  return {
    step: (message) => write(`⏳ ${message}`),
    ok: (message) => write(`✓ ${message}`),
    warn: (message) => write(`⚠️  ${message}`),
    fail: (message) => write(`❌ ${message}`),
    info: (message) => write(message),
    section(title, body) {
      write(SEPARATOR);
      write(`## ${title}`);
      write(SEPARATOR);
      write(body);
      write(SEPARATOR);
    },
  };
}

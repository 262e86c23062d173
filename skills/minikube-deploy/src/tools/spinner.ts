/**
 * Spinner for showing command activity on stderr.
 * Only draws when the stream is a TTY; otherwise every call is a no-op so
 * piped output stays clean.
 */

const SPINNER_LINE_WIDTH = 80;
const SPINNER_PREFIX_MAX_LEN = 60;
const spinnerFrames = ["|", "/", "-", "\\"];

export type SpinnerStream = {
  isTTY?: boolean;
  write(chunk: string): boolean;
};

export class Spinner {
  private interval: NodeJS.Timeout | null = null;
  private frame = 0;

  constructor(private readonly stream: SpinnerStream = process.stderr) {}

  get active(): boolean {
    return this.interval !== null;
  }

  start(message?: string): void {
    if (this.stream.isTTY !== true) {
      return;
    }
    if (this.interval) {
      this.stop();
    }

    this.frame = 0;
    let prefix = message ? `${message} ` : "";
    if (prefix.length > SPINNER_PREFIX_MAX_LEN) {
      prefix = prefix.slice(0, SPINNER_PREFIX_MAX_LEN - 2) + ".. ";
    }

    this.interval = setInterval(() => {
      const line = `${prefix}${spinnerFrames[this.frame]}`;
      this.stream.write(`\r${line.padEnd(SPINNER_LINE_WIDTH)}\r`);
      this.frame = (this.frame + 1) % spinnerFrames.length;
    }, 100);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.stream.write("\r" + " ".repeat(SPINNER_LINE_WIDTH) + "\r");
    }
  }
}

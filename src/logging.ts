export type LogLevel = "info" | "success" | "warn" | "error";

export type LogSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function wantsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stdout.isTTY);
}

const GLYPHS: Record<LogLevel, string> = {
  info: "ℹ",
  success: "✔",
  warn: "⚠",
  error: "✗",
};

function color(level: LogLevel, text: string): string {
  if (!wantsColor()) return text;
  const reset = "\x1b[0m";
  const code =
    level === "error"
      ? "\x1b[31m"
      : level === "warn"
        ? "\x1b[33m"
        : level === "success"
          ? "\x1b[32m"
          : "\x1b[36m";
  return `${code}${text}${reset}`;
}

export function formatStatus(level: LogLevel, message: string): string {
  return `${color(level, GLYPHS[level])} ${message}`;
}

export class StatusLogger {
  readonly verbose: boolean;
  private sink: LogSink;

  constructor(options: { verbose?: boolean; sink?: LogSink } = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  info(message: string): void {
    this.sink.out(formatStatus("info", message));
  }

  success(message: string): void {
    this.sink.out(formatStatus("success", message));
  }

  warn(message: string): void {
    this.sink.out(formatStatus("warn", message));
  }

  error(message: string): void {
    this.sink.err(formatStatus("error", message));
  }

  /** Info line shown only with --verbose. */
  detail(message: string): void {
    if (this.verbose) this.info(message);
  }

  plain(line: string): void {
    this.sink.out(line);
  }
}

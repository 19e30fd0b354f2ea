export type LogLevel = "info" | "success" | "warn" | "error";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  // Unlabelled output (lists, summaries). Suppressed in quiet mode.
  plain(message: string): void;
}

export interface LoggerOptions {
  quiet?: boolean;
  color?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

const LABELS: Record<LogLevel, { text: string; ansi: string }> = {
  info: { text: "[INFO]", ansi: "\x1b[0;34m" },
  success: { text: "[SUCCESS]", ansi: "\x1b[0;32m" },
  warn: { text: "[WARNING]", ansi: "\x1b[1;33m" },
  error: { text: "[ERROR]", ansi: "\x1b[0;31m" },
};

const RESET = "\x1b[0m";

export function formatLine(level: LogLevel, message: string, color: boolean): string {
  const label = LABELS[level];
  const prefix = color ? `${label.ansi}${label.text}${RESET}` : label.text;
  return `${prefix} ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const quiet = options.quiet ?? false;
  const color = options.color ?? (process.stdout.isTTY === true && !process.env.NO_COLOR);
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  const emit = (level: LogLevel, message: string) => {
    if (quiet && level !== "error") return;
    const line = formatLine(level, message, color);
    if (level === "error") {
      err(line);
    } else {
      out(line);
    }
  };

  return {
    info: (message) => emit("info", message),
    success: (message) => emit("success", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    plain: (message) => {
      if (!quiet) out(message);
    },
  };
}

// Collects uncoloured lines in memory.
export function createMemoryLogger(options: Omit<LoggerOptions, "out" | "err"> = {}): Logger & { lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    ...options,
    color: options.color ?? false,
    out: (line) => lines.push(line),
    err: (line) => lines.push(line),
  });
  return Object.assign(logger, { lines });
}

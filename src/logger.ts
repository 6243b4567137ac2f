type Level = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  debugEnabled?: boolean;
  write?: (line: string) => void;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? false;
    this.write = options.write ?? ((line) => process.stdout.write(line));
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  private print(level: Level, message: string): void {
    const ts = new Date().toISOString();
    // Unified, grep-friendly log format.
    this.write(`[${ts}] [${level.toUpperCase()}] ${message}\n`);
  }
}

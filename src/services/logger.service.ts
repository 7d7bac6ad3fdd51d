export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  scope?: string;
  debug?: boolean;
  outputFn?: LogOutputFn;
}

export class Logger {
  private scope?: string;
  private debugEnabled: boolean;
  private outputFn?: LogOutputFn;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope;
    this.debugEnabled = options.debug ?? false;
    this.outputFn = options.outputFn;
  }

  /** Same sink and debug setting, nested scope: `[fleet:acme/demo]`. */
  child(scope: string): Logger {
    return new Logger({
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      debug: this.debugEnabled,
      outputFn: this.outputFn,
    });
  }

  private prefix(): string {
    return this.scope ? `[${this.scope}] ` : "";
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    this.emit("debug", this.prefix() + this.formatMessage(message, args));
  }

  info(message: string, ...args: unknown[]): void {
    this.emit("info", this.prefix() + this.formatMessage(message, args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit("warn", this.prefix() + this.formatMessage(message, args));
  }

  /** The sink gets the error's message appended; the console gets the error itself. */
  error(message: string, error?: Error | unknown): void {
    if (this.outputFn) {
      const detail = error instanceof Error ? error.message : error ? String(error) : "";
      this.outputFn(this.prefix() + message + (detail ? ` ${detail}` : ""), "error");
    } else if (error) {
      console.error(this.prefix() + message, error);
    } else {
      console.error(this.prefix() + message);
    }
  }

  table(content: string): void {
    this.emit("info", `\n${content}\n`);
  }

  private emit(level: Exclude<LogLevel, "error">, line: string): void {
    if (this.outputFn) {
      this.outputFn(line, level);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(scope?: string, debug?: boolean): Logger {
    return new Logger({ scope, debug });
  }
}

type ColorName = "reset" | "red" | "green" | "yellow" | "blue" | "cyan" | "gray";

const COLORS: Record<ColorName, string> = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

export type LogLevel = "error" | "warn" | "info" | "success" | "verbose";

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  success: 3,
  verbose: 4,
};

const LEVEL_COLORS: Record<LogLevel, ColorName> = {
  error: "red",
  warn: "yellow",
  info: "blue",
  success: "green",
  verbose: "cyan",
};

export type LogSink = (line: string) => void;

/**
 * Levelled logger for the command line. Diagnostics go to stderr so that
 * command output on stdout stays machine-readable.
 */
export class Logger {
  private level: number = LEVELS.info;
  private useColors: boolean;
  private sink: LogSink;
  private out: LogSink;

  constructor(
    sink: LogSink = (line) => process.stderr.write(`${line}\n`),
    out: LogSink = (line) => process.stdout.write(`${line}\n`),
    useColors: boolean = process.stderr.isTTY ?? false
  ) {
    this.sink = sink;
    this.out = out;
    this.useColors = useColors;
  }

  setLevel(level: LogLevel | number): void {
    this.level = typeof level === "number" ? level : LEVELS[level];
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] <= this.level;
  }

  private _colorize(text: string, color: ColorName): string {
    if (!this.useColors) {
      return text;
    }
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private _write(level: LogLevel, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString().substring(11, 19);
    const prefix = this._colorize(`[${timestamp}]`, "gray");
    const tag = this._colorize(`[${level.toUpperCase()}]`, LEVEL_COLORS[level]);
    const body = args
      .map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg)))
      .join(" ");

    this.sink(`${prefix} ${tag} ${body}`);
  }

  error(...args: unknown[]): void {
    this._write("error", args);
  }

  warn(...args: unknown[]): void {
    this._write("warn", args);
  }

  info(...args: unknown[]): void {
    this._write("info", args);
  }

  success(...args: unknown[]): void {
    this._write("success", args);
  }

  verbose(...args: unknown[]): void {
    this._write("verbose", args);
  }

  /** Command output, written regardless of level. */
  raw(text: string): void {
    this.out(text);
  }
}

export const logger = new Logger();

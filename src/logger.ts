/**
 * Structured JSON-line logger.
 *
 * One JSON object per line with timestamp, level and message, plus any
 * extra fields. Lines go to stdout in HTTP mode and to stderr in stdio
 * mode, where stdout carries the MCP protocol.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Write every line to stderr. */
  stderr?: boolean;
}

interface LoggerSettings {
  level: LogLevel;
  stderr: boolean;
}

export class Logger {
  private readonly settings: LoggerSettings;

  constructor(
    options: LoggerOptions | LoggerSettings = {},
    private readonly bound: LogFields = {},
  ) {
    this.settings = isSettings(options)
      ? options
      : { level: options.level ?? "info", stderr: options.stderr ?? false };
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.settings.level = options.level;
    if (options.stderr !== undefined) this.settings.stderr = options.stderr;
  }

  /** A logger that stamps `fields` on every line and follows this one's settings. */
  child(fields: LogFields): Logger {
    return new Logger(this.settings, { ...this.bound, ...fields });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields: LogFields = {}): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.settings.level]) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bound,
      ...fields,
    });

    if (this.settings.stderr) console.error(line);
    else console.log(line);
  }
}

export const logger = new Logger();

function isSettings(options: LoggerOptions | LoggerSettings): options is LoggerSettings {
  return options.level !== undefined && options.stderr !== undefined;
}

export function errorFields(error: unknown): LogFields {
  return error instanceof Error
    ? { error: error.message, errorName: error.name }
    : { error: String(error) };
}

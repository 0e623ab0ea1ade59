/**
 * Diagnostics for map construction and lazy lookups. An IndexMap
 * logs nothing unless it is given a logger.
 */

export type LogLevel = "debug" | "warn" | "silent";

type Fields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
}

const formatFields = (fields: Fields) =>
  Object.entries(fields)
    .map(([key, value]) => ` ${key}=${JSON.stringify(value)}`)
    .join("");

/**
 * Writes one `[prefix] level: message key=value ...` line per event
 * to stderr, leaving stdout to the program using the library.
 */
export class ConsoleLogger implements Logger {
  constructor(
    readonly level: LogLevel = "warn",
    private readonly prefix = "alphabet-range"
  ) {}
  debug(message: string, fields?: Fields): void {
    if (this.level === "debug") this.write("debug", message, fields);
  }
  warn(message: string, fields?: Fields): void {
    if (this.level !== "silent") this.write("warn", message, fields);
  }
  private write(level: string, message: string, fields: Fields = {}) {
    process.stderr.write(
      `[${this.prefix}] ${level}: ${message}${formatFields(fields)}\n`
    );
  }
}

export class SilentLogger implements Logger {
  debug(): void {}
  warn(): void {}
}

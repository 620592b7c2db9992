export type LogFields = Record<string, unknown>;
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minimum = LEVEL_ORDER[options.level ?? "info"];
  const write = options.write ?? ((line: string) => console.log(line));

  const log = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < minimum) return;
    const payload = fields
      ? { ...normalize(fields), level, message, timestamp: new Date().toISOString() }
      : { level, message, timestamp: new Date().toISOString() };
    // Keep JSON flat for easier querying.
    write(JSON.stringify(payload));
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
  };
}

function normalize(fields: LogFields): LogFields {
  if ("error" in fields && fields.error instanceof Error) {
    const { message, stack, name } = fields.error;
    return { ...fields, error: { message, stack, name } };
  }
  return fields;
}

export const silentLogger: Logger = createLogger({ write: () => {} });

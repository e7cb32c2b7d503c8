type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogMeta {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bound: LogMeta): Logger;
}

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLevelName(raw)) {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
}

function stringify(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return ` ${JSON.stringify(meta)}`;
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_ORDER[level] < threshold()) {
    return;
  }

  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}${stringify(meta)}`;
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

function createLogger(bound: LogMeta): Logger {
  const merge = (meta?: LogMeta): LogMeta | undefined =>
    meta ? { ...bound, ...meta } : Object.keys(bound).length > 0 ? bound : undefined;

  return {
    debug(message, meta) {
      emit("debug", message, merge(meta));
    },
    info(message, meta) {
      emit("info", message, merge(meta));
    },
    warn(message, meta) {
      emit("warn", message, merge(meta));
    },
    error(message, meta) {
      emit("error", message, merge(meta));
    },
    child(extra) {
      return createLogger({ ...bound, ...extra });
    },
  };
}

export const logger: Logger = createLogger({});

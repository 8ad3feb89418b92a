export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogFields): void;
  info(msg: string, meta?: LogFields): void;
  warn(msg: string, meta?: LogFields): void;
  error(msg: string, meta?: LogFields | Error): void;
  child(bindings: { category?: string; meta?: LogFields }): Logger;
}

const PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoOpLogger(),
  };
}

function errorFields(err: Error): LogFields {
  return { error: { name: err.name, message: err.message } };
}

/**
 * Logger writing one JSON object per line to stderr, so stdout stays
 * reserved for command output.
 */
export function createConsoleLogger(level: LogLevel, context: LogFields = {}): Logger {
  const baseContext = { ...context };
  const shouldLog = (target: LogLevel): boolean => PRIORITY[target] <= PRIORITY[level];

  const emit = (target: Exclude<LogLevel, "silent">, message: string, fields?: LogFields) => {
    if (!shouldLog(target)) {
      return;
    }
    const payload = {
      level: target,
      message,
      ts: new Date().toISOString(),
      ...baseContext,
      ...fields,
    };
    console.error(JSON.stringify(payload));
  };

  return {
    debug: (msg, meta) => emit("debug", msg, meta),
    info: (msg, meta) => emit("info", msg, meta),
    warn: (msg, meta) => emit("warn", msg, meta),
    error: (msg, metaOrError) => {
      emit("error", msg, metaOrError instanceof Error ? errorFields(metaOrError) : metaOrError);
    },
    child: (bindings) => {
      const merged: LogFields = { ...baseContext };
      if (bindings.category) {
        merged.category = bindings.category;
      }
      if (bindings.meta) {
        Object.assign(merged, bindings.meta);
      }
      return createConsoleLogger(level, merged);
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(PRIORITY, value);
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.ARGKIT_LOG_LEVEL ?? env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

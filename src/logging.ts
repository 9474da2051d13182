// ---------------------------------------------------------------------------
// Logging – winston-backed subsystem loggers
// ---------------------------------------------------------------------------
// One root winston logger per process. Modules ask for a child bound to a
// `module` (or `subsystem`) name; services receive a plain `ServiceLog` so
// tests can capture lines without touching winston.
// ---------------------------------------------------------------------------

import winston from "winston";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export type SubsystemLogger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => SubsystemLogger;
};

/** Minimal logger shape injected into services. */
export type ServiceLog = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LoggingOptions = {
  level?: LogLevel;
  file?: string;
};

const { combine, timestamp, printf, errors } = winston.format;

const IS_TEST_ENV = process.env.NODE_ENV === "test";

// ---------------------------------------------------------------------------
// Format
// ---------------------------------------------------------------------------

/**
 * Render one log line: `<ts> [level] (module) message {meta}`.
 * Exported for tests; winston calls it through `printf`.
 */
export function formatLogLine(info: {
  level: string;
  message: unknown;
  timestamp?: unknown;
  [key: string]: unknown;
}): string {
  const { level, message, timestamp: ts, stack, module, subsystem, ...rest } = info;
  const scope = module ?? subsystem;
  const scopePart = typeof scope === "string" && scope ? ` (${scope})` : "";
  const meta = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  const stackPart = typeof stack === "string" ? `\n${stack}` : "";
  const tsPart = typeof ts === "string" ? `${ts} ` : "";
  return `${tsPart}[${level}]${scopePart} ${String(message)}${meta}${stackPart}`;
}

// ---------------------------------------------------------------------------
// Root logger
// ---------------------------------------------------------------------------

let root: winston.Logger | null = null;

function createRoot(opts: LoggingOptions): winston.Logger {
  const level = opts.level ?? normaliseLevel(process.env.LOG_LEVEL) ?? "info";
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ["error", "warn"] }),
  ];
  if (opts.file) {
    transports.push(new winston.transports.File({ filename: opts.file }));
  }
  return winston.createLogger({
    level,
    silent: IS_TEST_ENV,
    format: combine(
      errors({ stack: true }),
      timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
      printf(formatLogLine),
    ),
    transports,
  });
}

function rootLogger(): winston.Logger {
  if (!root) {
    root = createRoot({});
  }
  return root;
}

/** Replace the root logger (called once the configuration is known). */
export function configureLogging(opts: LoggingOptions): void {
  root?.close();
  root = createRoot(opts);
}

export function normaliseLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) {
    return undefined;
  }
  const lowered = raw.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === lowered);
}

// ---------------------------------------------------------------------------
// Child loggers
// ---------------------------------------------------------------------------

function wrap(bindings: LogMeta): SubsystemLogger {
  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    rootLogger().log({ level, message, ...bindings, ...meta });
  };
  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (more) => wrap({ ...bindings, ...more }),
  };
}

export function getChildLogger(bindings: LogMeta): SubsystemLogger {
  return wrap(bindings);
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap({ subsystem });
}

/** Adapt a subsystem logger to the `ServiceLog` dependency shape. */
export function toServiceLog(logger: SubsystemLogger): ServiceLog {
  return {
    info: (msg) => logger.info(msg),
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
  };
}

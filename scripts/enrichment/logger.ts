export type LogLevel = "debug" | "info" | "warn" | "error";

const DEFAULT_SOURCE = "enrichment";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface StructuredLogEntry {
  event: string;
  level?: LogLevel;
  source?: string;
  message?: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

/**
 * Event logger bound to one run. Context fields (list id, generator) are
 * merged into the `data` of every entry it writes.
 */
export interface RunLogger {
  event(entry: StructuredLogEntry): void;
  child(context: Record<string, unknown>): RunLogger;
}

export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const normalised = value?.trim().toLowerCase();
  switch (normalised) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return normalised;
    default:
      return "info";
  }
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[resolveLogLevel()];
}

function formatTimestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function formatLogLine(message: string, source: string): string {
  return `${formatTimestamp()} [${source}] ${message}`;
}

function write(level: LogLevel, line: string): void {
  switch (level) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.log(line);
  }
}

export function log(message: string, source: string = DEFAULT_SOURCE): void {
  if (isEnabled("info")) {
    write("info", formatLogLine(message, source));
  }
}

// Walks the `cause` chain.
function describeError(error: unknown): string {
  if (error instanceof Error) {
    const base = error.stack ?? `${error.name}: ${error.message}`;
    return error.cause === undefined ? base : `${base}\nCaused by: ${describeError(error.cause)}`;
  }

  if (typeof error === "object" && error !== null) {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

function emit(entry: StructuredLogEntry, context: Record<string, unknown>): void {
  const { event, level = "info", source = DEFAULT_SOURCE, message, data, error } = entry;
  if (!isEnabled(level)) {
    return;
  }

  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    source,
    event,
  };

  if (message) {
    payload.message = message;
  }

  const merged = { ...context, ...data };
  if (Object.keys(merged).length) {
    payload.data = merged;
  }

  if (error !== undefined) {
    payload.error = describeError(error);
  }

  write(level, JSON.stringify(payload));
}

export function createRunLogger(context: Record<string, unknown> = {}): RunLogger {
  return {
    event: (entry) => emit(entry, context),
    child: (extra) => createRunLogger({ ...context, ...extra }),
  };
}

export function logError(error: unknown, source: string = DEFAULT_SOURCE): void {
  write("error", formatLogLine(describeError(error), source));
}

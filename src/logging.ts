import type { LogLevel } from "./config/config.js";

export const LOG_LEVEL_ENV = "MARKETLORE_LOG_LEVEL";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, fields?: Record<string, unknown>) => void;
  info: (message: string, fields?: Record<string, unknown>) => void;
  warn: (message: string, fields?: Record<string, unknown>) => void;
  error: (message: string, fields?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

let configuredLevel: LogLevel | null = null;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level ?? null;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (configuredLevel) {
    return configuredLevel;
  }
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return "info";
}

function formatFields(fields: Record<string, unknown> | undefined): string {
  if (!fields) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    const rendered = typeof value === "string" ? value : JSON.stringify(value);
    parts.push(`${key}=${rendered}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  function emit(level: Exclude<LogLevel, "silent">, message: string, fields?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveLogLevel()]) {
      return;
    }
    const line = `${new Date().toISOString()} [${subsystem}] ${message}${formatFields(fields)}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
  return {
    subsystem,
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}

import { type ILogObj, Logger as TsLogger } from "tslog";

export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

export type ConsoleStyle = "pretty" | "json";

export type LoggerSettings = {
  level?: LogLevel;
  consoleStyle?: ConsoleStyle;
};

type ResolvedSettings = Required<LoggerSettings>;

const DEFAULT_LOG_LEVEL: LogLevel = "info";

// tslog numbering: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal.
const MIN_LEVEL: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
  silent: 7,
};

let configuredSettings: LoggerSettings | null = null;
let overrideSettings: LoggerSettings | null = null;
let cachedLogger: TsLogger<ILogObj> | null = null;
let cachedSettingsKey = "";
const childLoggers = new Map<string, TsLogger<ILogObj>>();

export function normalizeLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== "string") return undefined;
  const lower = value.trim().toLowerCase();
  return ALLOWED_LOG_LEVELS.find((level) => level === lower);
}

function resolveSettings(): ResolvedSettings {
  const envLevel = normalizeLogLevel(process.env.AGENT_GATEWAY_LOG_LEVEL);
  const level = overrideSettings?.level ?? envLevel ?? configuredSettings?.level ?? DEFAULT_LOG_LEVEL;
  const consoleStyle = overrideSettings?.consoleStyle ?? configuredSettings?.consoleStyle ?? "pretty";
  return { level, consoleStyle };
}

function buildLogger(settings: ResolvedSettings): TsLogger<ILogObj> {
  return new TsLogger<ILogObj>({
    name: "gateway",
    minLevel: MIN_LEVEL[settings.level],
    type: settings.level === "silent" ? "hidden" : settings.consoleStyle,
  });
}

export function getLogger(): TsLogger<ILogObj> {
  const settings = resolveSettings();
  const key = `${settings.level}:${settings.consoleStyle}`;
  if (!cachedLogger || cachedSettingsKey !== key) {
    cachedLogger = buildLogger(settings);
    cachedSettingsKey = key;
    childLoggers.clear();
  }
  return cachedLogger;
}

export function getResolvedLogLevel(): LogLevel {
  return resolveSettings().level;
}

export function getChildLogger(bindings: { module: string }): TsLogger<ILogObj> {
  const root = getLogger();
  const existing = childLoggers.get(bindings.module);
  if (existing) return existing;
  const child = root.getSubLogger({ name: bindings.module });
  childLoggers.set(bindings.module, child);
  return child;
}

/** Apply the `logging` section of the loaded config. Overrides still win. */
export function configureLogger(settings: LoggerSettings) {
  configuredSettings = { ...settings };
}

export function setLoggerOverride(settings: LoggerSettings | null) {
  overrideSettings = settings ? { ...settings } : null;
}

export function resetLogger() {
  overrideSettings = null;
  configuredSettings = null;
  cachedLogger = null;
  cachedSettingsKey = "";
  childLoggers.clear();
}

type SubsystemLevel = Exclude<LogLevel, "silent">;

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
};

/**
 * Logger bound to a subsystem name. Resolves the underlying tslog instance on
 * every call so overrides applied after import (tests, config reloads) take effect.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: SubsystemLevel, message: string, meta?: Record<string, unknown>) => {
    const logger = getChildLogger({ module: subsystem });
    if (meta && Object.keys(meta).length > 0) {
      logger[level](message, meta);
    } else {
      logger[level](message);
    }
  };
  return {
    subsystem,
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    fatal: (message, meta) => emit("fatal", message, meta),
  };
}

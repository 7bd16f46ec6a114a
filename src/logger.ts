import chalk from "chalk";

export const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Interprète un niveau de log (ex: valeur de LOG_LEVEL). Valeur inconnue → `fallback`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = (value ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === v) ?? fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

function format(level: LogLevel, scope: string | null, message: unknown, args: unknown[]): string {
  const ts = new Date().toISOString();
  const base = scope ? `[${ts}] [${level.toUpperCase()}] ${scope}:` : `[${ts}] [${level.toUpperCase()}]`;
  const text = [message, ...args].map(String).join(" ");
  switch (level) {
    case "error":
      return chalk.red.bold(`${base} ${text}`);
    case "warn":
      return chalk.yellow(`${base} ${text}`);
    case "info":
      return chalk.cyan(`${base} ${text}`);
    case "debug":
      return chalk.gray(`${base} ${text}`);
    case "trace":
      return chalk.magenta(`${base} ${text}`);
  }
}

export interface Logger {
  error(message: unknown, ...args: unknown[]): void;
  warn(message: unknown, ...args: unknown[]): void;
  info(message: unknown, ...args: unknown[]): void;
  debug(message: unknown, ...args: unknown[]): void;
  trace(message: unknown, ...args: unknown[]): void;
}

/**
 * Crée un logger préfixé par un nom de composant (ex: "actuator", "router").
 * Le niveau est global et partagé par tous les loggers.
 */
export function createLogger(scope: string | null = null): Logger {
  const emit = (level: LogLevel, message: unknown, args: unknown[]): void => {
    if (!shouldLog(level)) return;
    const line = format(level, scope, message, args);
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };
  return {
    error: (message, ...args) => emit("error", message, args),
    warn: (message, ...args) => emit("warn", message, args),
    info: (message, ...args) => emit("info", message, args),
    debug: (message, ...args) => emit("debug", message, args),
    trace: (message, ...args) => emit("trace", message, args),
  };
}

export const logger: Logger = createLogger();

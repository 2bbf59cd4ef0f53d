import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Bound on every line, e.g. a request id from the calling service */
  bindings?: Record<string, string>;
}

/**
 * Root structured logger. Components derive children with
 * `componentLogger(logger, "<name>")` so every line carries its origin.
 */
export function createLogger({ level, bindings }: LoggerOptions = {}): Logger {
  return pino({
    name: "framevault",
    level: level ?? readLevel(process.env.FRAMEVAULT_LOG_LEVEL) ?? "info",
    base: { pid: process.pid, ...bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function componentLogger(
  logger: Logger | undefined,
  component: string
): Logger {
  return (logger ?? defaultLogger()).child({ component });
}

let sharedLogger: Logger | undefined;

function defaultLogger(): Logger {
  sharedLogger ??= createLogger();
  return sharedLogger;
}

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function readLevel(value: string | undefined): LevelWithSilent | undefined {
  return LEVELS.find((level) => level === value);
}

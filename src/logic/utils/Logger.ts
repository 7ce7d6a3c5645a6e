import pino from "pino";

const LOG_LEVEL_ENV = "CS_FLOWCHART_LOG_LEVEL";

// Diagnostics go to stderr; stdout is reserved for CLI output.
const rootLogger = pino(
  {
    name: "cs-flowchart",
    level: process.env[LOG_LEVEL_ENV] ?? "warn",
  },
  pino.destination({ fd: 2, sync: true })
);

export function setLogLevel(level: pino.LevelWithSilent): void {
  rootLogger.level = level;
}

export function getLogger(component: string): pino.Logger {
  return rootLogger.child({ component });
}

export function logDebug(message: string, error?: unknown): void {
  if (error instanceof Error) {
    rootLogger.debug({ err: error }, message);
  } else {
    rootLogger.debug(message);
  }
}

export function logInfo(message: string): void {
  rootLogger.info(message);
}

export function logWarn(message: string): void {
  rootLogger.warn(message);
}

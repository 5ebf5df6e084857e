import { Logger, type ILogObj } from "tslog";

/** tslog numeric levels are the index in this list. */
const LEVEL_NAMES = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevelName = (typeof LEVEL_NAMES)[number];

/** Level names as they appear in the document's `log.level` key. */
const DOCUMENT_LEVELS: Record<string, LogLevelName> = {
  warning: "warn",
  critical: "fatal",
};

export function parseLogLevel(raw: string | undefined): LogLevelName | undefined {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  return LEVEL_NAMES.find((name) => name === normalized) ?? DOCUMENT_LEVELS[normalized];
}

function levelIndex(level: LogLevelName): number {
  return LEVEL_NAMES.indexOf(level);
}

/** Overrides the document's `log.level` when set. */
export const LOG_LEVEL_ENV = "CHATBOT_POLICY_LOG_LEVEL";

const rootLogger = new Logger<ILogObj>({
  name: "policy",
  type: "pretty",
  minLevel: levelIndex(parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? "info"),
});

export function setLogLevel(level: LogLevelName): void {
  rootLogger.settings.minLevel = levelIndex(level);
}

export function getLogLevel(): LogLevelName {
  return LEVEL_NAMES[rootLogger.settings.minLevel] ?? "info";
}

export function logDebug(message: string): void {
  rootLogger.debug(message);
}

export function logInfo(message: string): void {
  rootLogger.info(message);
}

export function logWarn(message: string): void {
  rootLogger.warn(message);
}

export function logError(message: string, error?: unknown): void {
  if (error === undefined) {
    rootLogger.error(message);
    return;
  }
  rootLogger.error(message, error);
}

import log, { type Logger, type LogLevelDesc } from "loglevel";

const LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;

function isLogLevel(level: string): level is (typeof LEVELS)[number] {
  return (LEVELS as readonly string[]).includes(level);
}

export function parseLogLevel(value: string | undefined): LogLevelDesc {
  const level = (value ?? "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

const logger: Logger = log.getLogger("lnrelay");
logger.setLevel(parseLogLevel(process.env.LOG_LEVEL));

export type { Logger };
export default logger;

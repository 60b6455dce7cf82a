import pino, { type DestinationStream, type Logger } from "pino";

export interface MonitorLogger {
  readonly info: (msg: string) => void;
  readonly warn: (msg: string) => void;
  readonly error: (msg: string) => void;
}

const REDACTED_PATHS = [
  "accessToken",
  "access_token",
  "*.accessToken",
  "*.access_token",
];

export function createLogger(level: string, destination?: DestinationStream): Logger {
  return pino(
    {
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    },
    destination,
  );
}

/**
 * File destination used while the terminal owns stdout. Writes are
 * synchronous so the shutdown lines land before process.exit().
 */
export function createFileDestination(path: string): DestinationStream {
  return pino.destination({ dest: path, mkdir: true, sync: true });
}

export function toMonitorLogger(logger: Logger): MonitorLogger {
  return {
    info: (msg) => logger.info(msg),
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
  };
}

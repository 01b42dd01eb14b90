import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export type SubsystemLogger = Pick<
  winston.Logger,
  "error" | "warn" | "info" | "debug"
>;

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "inbox-bridge" },
  transports: [
    new winston.transports.Console({
      // CLI output goes to stdout; keep logs on stderr.
      stderrLevels: ["error", "warn", "info", "debug"],
    }),
  ],
});

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return rootLogger.child({ subsystem });
}

/** Logger that drops everything; handy for tests and embedding. */
export function createSilentLogger(): SubsystemLogger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}

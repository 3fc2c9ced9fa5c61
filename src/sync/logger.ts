import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

const SERVICE = "salon-calendar-sync";

// stdout belongs to command output (the --once report); every log level goes to stderr.
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  defaultMeta: { service: SERVICE },
  format: isProduction
    ? winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.timestamp(),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, service: _service, ...rest }) => {
          const ctx = context ? `[${String(context)}]` : "";
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
          return `${String(timestamp)} ${level} ${ctx} ${String(message)}${extra}`;
        })
      ),
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});

/** Logger tagged with the module it logs for, e.g. `createChildLogger("sync-engine")`. */
export function createChildLogger(context: string): winston.Logger {
  return logger.child({ context });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

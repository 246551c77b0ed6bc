import winston, { format } from "winston";

const logger = winston.createLogger({
  level: process.env.NODE_ENV === "production" ? "warn" : "info",
  silent: process.env.NODE_ENV === "test",
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.printf(({ timestamp, level, message, stack }) => {
      const line = `${String(timestamp)} ${level}: ${String(message)}`;
      return typeof stack === "string" ? `${line}\n${stack}` : line;
    })
  ),
  transports: [new winston.transports.Console()],
});

export function setLogLevel(level: string) {
  logger.level = level;
}

export default logger;

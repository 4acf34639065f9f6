import * as winston from "winston";
import { getConfig } from "../config";

export const logger = winston.createLogger({
  level: getConfig().logLevel,
  // Jest output stays readable; tests assert on thrown errors, not log lines
  silent: process.env.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, stack }) =>
      stack ? `${timestamp} [${level}]: ${message}\n${stack}` : `${timestamp} [${level}]: ${message}`,
    ),
  ),
  transports: [new winston.transports.Console()],
});

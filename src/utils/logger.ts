import { createLogger, format, transports } from "winston";
import morgan from "morgan";

const { combine, timestamp, json, colorize, printf } = format;

const isTest = process.env.NODE_ENV === "test";

// Custom format for console logging with colors
const consoleLogFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} ${level}: ${message}`;
});

// Create a Winston logger
export const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp(), json()),
  silent: isTest,
  transports: [
    new transports.Console({
      format: combine(colorize(), timestamp(), consoleLogFormat),
    }),
    ...(isTest ? [] : [new transports.File({ filename: "logs/app.log" })]),
  ],
});

// ✅ Integrate Morgan with Winston
export const morganMiddleware = morgan("combined", {
  stream: {
    write: (message) => logger.info(message.trim()), // Sends logs directly to Winston
  },
});
